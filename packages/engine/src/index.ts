/**
 * @fileoverview Entity Receiver Engine
 *
 * UDP entity-state ingestion: listens for JSON datagrams describing
 * named entities, keeps the latest value per entity, evicts entities that
 * go silent and notifies observers of every change.
 *
 * The engine provides:
 * - Event-driven datagram ingestion with per-datagram validation
 * - An in-memory registry with last-write-wins semantics
 * - Fixed-interval eviction of stale entities
 * - A typed, synchronous observer hub
 * - An enable/disable lifecycle with status notifications
 *
 * @module @entity-receiver/engine
 * @example
 * ```typescript
 * import { EntityReceiverEngine } from "@entity-receiver/engine";
 *
 * const engine = new EntityReceiverEngine({ port: 8888 });
 * engine.subscribe("entity:updated", (event) => render(event.data.record));
 * await engine.start();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Entity record
export type {
    EntityRecord,
    EntityState,
    EntityAttributes,
    UpsertOutcome,
    EntityReader,
    EntitySnapshot,
} from "./contracts/index.js";
export { UNKNOWN_BROADCASTER } from "./contracts/index.js";

// Logger
export type { EngineLogger } from "./contracts/index.js";

// Errors
export {
    ReceiverError,
    DecodeError,
    ValidationError,
    StartError,
    ReceiveError,
    describeError,
    type ReceiverErrorCode,
} from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EventDataMap,
    EntityEventType,
    LifecycleEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    createConsoleLogger,
    defaultLogger,
    type ConsoleLoggerOptions,
} from "./impl/index.js";

export {
    decodeDatagram,
    parseDatagram,
    toEntityRecord,
    type DatagramSource,
} from "./codec/index.js";

export {
    EntityRegistry,
    EvictionSweeper,
    DEFAULT_CLEANUP_INTERVAL_MS,
    DEFAULT_STALENESS_MS,
    type EvictionSweeperConfig,
} from "./registry/index.js";

export {
    DatagramListener,
    DEFAULT_BUFFER_SIZE,
    DEFAULT_RETRY_DELAY_MS,
    type DatagramCallback,
    type DatagramListenerConfig,
} from "./listener/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    EntityReceiverEngine,
    DEFAULT_UDP_PORT,
    DEFAULT_BROADCASTER_NAME,
    type EngineConfig,
} from "./engine/index.js";
