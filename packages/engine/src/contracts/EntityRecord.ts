/**
 * EntityRecord Contract
 *
 * The latest known value of one remote entity, as held by the registry.
 * Records are replaced wholesale on every admitted datagram; fields are
 * never merged.
 */

/**
 * Opaque entity state: any JSON value. No semantic validation is applied.
 */
export type EntityState =
    | string
    | number
    | boolean
    | null
    | readonly EntityState[]
    | { readonly [key: string]: EntityState };

/**
 * Opaque attribute payload. Insertion order is irrelevant.
 */
export type EntityAttributes = Readonly<Record<string, unknown>>;

/**
 * Broadcaster name used when the inbound message does not name one.
 */
export const UNKNOWN_BROADCASTER = "Unknown";

/**
 * One row per distinct entity identifier.
 *
 * @example
 * ```typescript
 * const record: EntityRecord = {
 *     entityId       : "sensor.temp1",
 *     state          : "21.5",
 *     attributes     : { unit_of_measurement: "°C" },
 *     broadcasterName: "Unknown",
 *     sourceIp       : "192.168.1.20",
 *     lastUpdated    : new Date(),
 * };
 * ```
 */
export interface EntityRecord {
    /** Unique, non-empty identifier of the source entity */
    readonly entityId: string;

    /** Current reported state */
    readonly state: EntityState;

    /** Attribute mapping (may be empty) */
    readonly attributes: EntityAttributes;

    /** Origin publisher */
    readonly broadcasterName: string;

    /** Network-layer source address of the datagram */
    readonly sourceIp: string;

    /** Set on every admitted upsert */
    readonly lastUpdated: Date;
}

/**
 * Outcome of a registry upsert.
 */
export type UpsertOutcome = "added" | "updated";
