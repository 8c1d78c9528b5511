/**
 * @fileoverview EventBus Contract
 *
 * Defines the observer protocol between the receiver and its adapters.
 * Four event kinds exist: three for registry changes and one for the
 * listener lifecycle.
 *
 * Design decisions:
 * - Synchronous dispatch, in subscription order
 * - Each kind has its own typed payload
 * - A failing handler never reaches the publisher or the other handlers
 *
 * @module @entity-receiver/engine/contracts/EventBus
 */

import type { EntityRecord } from "./EntityRecord.js";

/**
 * Registry event types.
 */
export type EntityEventType =
    | "entity:added"
    | "entity:updated"
    | "entity:removed";

/**
 * Listener lifecycle event types.
 */
export type LifecycleEventType = "listener:statusChanged";

/**
 * All known event types.
 */
export type EventType = EntityEventType | LifecycleEventType;

/**
 * Data carried by each event type.
 */
export interface EventDataMap {
    "entity:added": {
        readonly entityId: string;
        readonly record: EntityRecord;
    };
    "entity:updated": {
        readonly entityId: string;
        readonly record: EntityRecord;
    };
    "entity:removed": {
        readonly entityId: string;
    };
    "listener:statusChanged": {
        readonly enabled: boolean;
        readonly listening: boolean;
    };
}

/**
 * Event payload. All events have a type and timestamp.
 */
export interface EventPayload<K extends EventType = EventType> {
    /** Event type identifier */
    readonly type: K;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Event-specific data */
    readonly data: EventDataMap[K];
}

/**
 * Event handler signature. Handlers run inline and are assumed fast.
 */
export type EventHandler<K extends EventType = EventType> = (event: EventPayload<K>) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("entity:added", (event) => {
 *     console.log("New entity:", event.data.entityId);
 * });
 *
 * bus.emit(createEvent("entity:removed", { entityId: "sensor.temp1" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers of its type.
     *
     * @param event - The event payload to emit
     */
    emit<K extends EventType>(event: EventPayload<K>): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Remove one registration of a handler.
     *
     * @returns true if a registration was removed
     */
    unsubscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): boolean;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Remove all subscriptions for a specific event type, or all of them.
     */
    clear(eventType?: EventType): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Event data
 * @param now - Emission time (default: current time)
 * @returns Event payload with timestamp
 */
export function createEvent<K extends EventType>(
    type: K,
    data: EventDataMap[K],
    now: Date = new Date()
): EventPayload<K> {
    return {
        type,
        timestamp: now.toISOString(),
        data,
    };
}
