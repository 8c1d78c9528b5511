/**
 * @fileoverview Message Decoder
 *
 * Turns raw datagram bytes into an EntityRecord.
 *
 * Wire format (UTF-8 JSON object):
 * ```json
 * {
 *     "entity_id": "sensor.temp1",
 *     "state": "21.5",
 *     "attributes": { "unit_of_measurement": "°C" },
 *     "broadcaster_name": "Upstairs"
 * }
 * ```
 *
 * Only `entity_id` is required. Everything else is opaque.
 *
 * @module @entity-receiver/engine/codec/MessageDecoder
 */

import type {
    EntityAttributes,
    EntityRecord,
    EntityState,
} from "../contracts/EntityRecord.js";
import { UNKNOWN_BROADCASTER } from "../contracts/EntityRecord.js";
import { DecodeError, ValidationError, describeError } from "../contracts/errors.js";

/**
 * Where a datagram came from.
 */
export interface DatagramSource {
    /** Source IP address */
    readonly address: string;

    /** Source UDP port */
    readonly port: number;
}

// A leading byte-order mark is kept, so JSON.parse rejects it
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEntityState(value: unknown): value is EntityState {
    if (
        value === null
        || typeof value === "string"
        || typeof value === "number"
        || typeof value === "boolean"
    ) {
        return true;
    }
    if (Array.isArray(value)) {
        return value.every(isEntityState);
    }
    return isPlainObject(value) && Object.values(value).every(isEntityState);
}

function toState(value: unknown): EntityState {
    return isEntityState(value) ? value : null;
}

/**
 * Decode datagram bytes as UTF-8 JSON.
 *
 * @param payload - Raw datagram bytes
 * @returns The parsed JSON value
 * @throws DecodeError for invalid UTF-8 or invalid JSON
 */
export function parseDatagram(payload: Uint8Array): unknown {
    let text: string;
    try {
        text = utf8.decode(payload);
    }
    catch (error) {
        throw new DecodeError("Datagram is not valid UTF-8", { cause: error });
    }

    try {
        return JSON.parse(text);
    }
    catch (error) {
        throw new DecodeError(`Datagram is not valid JSON: ${describeError(error)}`, { cause: error });
    }
}

/**
 * Build an EntityRecord from a parsed message.
 *
 * `state` is kept as sent, whatever its JSON type; a missing one becomes
 * null. Missing `attributes` (or a non-object value) become an empty
 * mapping. A missing or non-string `broadcaster_name` becomes "Unknown".
 *
 * @param message - Parsed JSON value
 * @param source - Datagram origin
 * @param now - Receive time
 * @throws ValidationError when `entity_id` is missing, not a string, or blank
 */
export function toEntityRecord(message: unknown, source: DatagramSource, now: Date): EntityRecord {
    if (!isPlainObject(message)) {
        throw new ValidationError("Message is not a JSON object");
    }

    const entityId = message["entity_id"];
    if (typeof entityId !== "string" || entityId.trim() === "") {
        throw new ValidationError(`Invalid entity_id: ${JSON.stringify(entityId ?? null)}`);
    }

    const rawAttributes = message["attributes"];
    const attributes: EntityAttributes = isPlainObject(rawAttributes) ? { ...rawAttributes } : {};

    const rawBroadcaster = message["broadcaster_name"];

    return {
        entityId,
        state          : toState(message["state"]),
        attributes,
        broadcasterName: typeof rawBroadcaster === "string" ? rawBroadcaster : UNKNOWN_BROADCASTER,
        sourceIp       : source.address,
        lastUpdated    : now,
    };
}

/**
 * Decode one datagram into an EntityRecord.
 *
 * @param payload - Raw datagram bytes
 * @param source - Datagram origin
 * @param now - Receive time (default: current time)
 * @throws DecodeError | ValidationError
 *
 * @example
 * ```typescript
 * const record = decodeDatagram(
 *     Buffer.from('{"entity_id":"sensor.temp1","state":"21.5"}'),
 *     { address: "192.168.1.20", port: 50000 },
 * );
 * record.broadcasterName; // "Unknown"
 * ```
 */
export function decodeDatagram(
    payload: Uint8Array,
    source: DatagramSource,
    now: Date = new Date()
): EntityRecord {
    return toEntityRecord(parseDatagram(payload), source, now);
}
