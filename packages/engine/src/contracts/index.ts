/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the receiver engine contract.
 *
 * @module @entity-receiver/engine/contracts
 */

// Entity record
export type {
    EntityRecord,
    EntityState,
    EntityAttributes,
    UpsertOutcome,
} from "./EntityRecord.js";
export { UNKNOWN_BROADCASTER } from "./EntityRecord.js";

// Read surface for adapters
export type { EntityReader, EntitySnapshot } from "./EntityReader.js";

// Logger
export type { EngineLogger } from "./Logger.js";

// Errors
export {
    ReceiverError,
    DecodeError,
    ValidationError,
    StartError,
    ReceiveError,
    describeError,
    type ReceiverErrorCode,
} from "./errors.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EventDataMap,
    EntityEventType,
    LifecycleEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
