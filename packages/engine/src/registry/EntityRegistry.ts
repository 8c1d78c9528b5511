/**
 * @fileoverview Entity Registry
 *
 * In-memory store of the latest EntityRecord per entity id. The record's
 * lastUpdated doubles as the entity's last-seen time. All operations are
 * synchronous and run on the event loop, so no locking is involved.
 *
 * @module @entity-receiver/engine/registry/EntityRegistry
 */

import type { EntityRecord, UpsertOutcome } from "../contracts/EntityRecord.js";
import type { EntityReader, EntitySnapshot } from "../contracts/EntityReader.js";

/**
 * Entity Registry.
 *
 * Invariants:
 * - At most one record per entity id; upserts replace wholesale
 * - lastUpdated never decreases for a given entity
 * - sweep() is the only operation that removes entries
 *
 * @example
 * ```typescript
 * const registry = new EntityRegistry();
 * registry.upsert(record);                  // "added"
 * registry.upsert({ ...record, state: 2 }); // "updated"
 * registry.sweep(new Date(), 10 * 60_000);  // ids evicted
 * ```
 */
export class EntityRegistry implements EntityReader {
    private readonly records: Map<string, EntityRecord> = new Map();

    /**
     * Store a record, replacing any previous record for the same id.
     *
     * If the record's lastUpdated is earlier than the stored one (wall
     * clock stepped back), the stored timestamp is kept.
     *
     * @param record - The record to store
     * @returns "added" for a new id, "updated" for a replacement
     */
    upsert(record: EntityRecord): UpsertOutcome {
        const previous = this.records.get(record.entityId);

        const lastUpdated = previous && previous.lastUpdated.getTime() > record.lastUpdated.getTime()
            ? previous.lastUpdated
            : record.lastUpdated;

        this.records.set(record.entityId, Object.freeze({
            ...record,
            attributes: Object.freeze({ ...record.attributes }),
            lastUpdated,
        }));

        return previous ? "updated" : "added";
    }

    get(entityId: string): EntityRecord | undefined {
        return this.records.get(entityId);
    }

    listAll(): EntitySnapshot {
        return new Map(this.records);
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Remove every entity whose last update precedes `now - stalenessMs`.
     *
     * @param now - Reference time
     * @param stalenessMs - Staleness threshold in milliseconds
     * @returns Evicted entity ids, in insertion order
     */
    sweep(now: Date, stalenessMs: number): string[] {
        const cutoff = now.getTime() - stalenessMs;
        const evicted: string[] = [];

        for (const [entityId, record] of this.records) {
            if (record.lastUpdated.getTime() < cutoff) {
                evicted.push(entityId);
            }
        }

        for (const entityId of evicted) {
            this.records.delete(entityId);
        }

        return evicted;
    }
}
