/**
 * EntityReader Contract
 *
 * The read-only surface that adapters (sensors, dashboards, switches)
 * consume. Implementations never block and never mutate on read.
 */

import type { EntityRecord } from "./EntityRecord.js";

/**
 * Immutable snapshot of the registry keyed by entity id.
 */
export type EntitySnapshot = ReadonlyMap<string, EntityRecord>;

export interface EntityReader {
    /**
     * Current record for an entity.
     *
     * @param entityId - The entity identifier
     * @returns The record, or undefined when unknown
     */
    get(entityId: string): EntityRecord | undefined;

    /**
     * Copy of every record currently held. Mutating the returned
     * collection does not affect the reader.
     */
    listAll(): EntitySnapshot;

    /** Number of entities currently held */
    readonly size: number;
}
