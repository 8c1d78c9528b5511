/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus. This is the observer hub
 * between the registry/lifecycle and the adapters.
 *
 * @module @entity-receiver/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/errors.js";
import { defaultLogger } from "./ConsoleLogger.js";

type HandlerLists = { [K in EventType]: EventHandler<K>[] };

const EVENT_TYPES: readonly EventType[] = [
    "entity:added",
    "entity:updated",
    "entity:removed",
    "listener:statusChanged",
];

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch in subscription order
 * - Dispatch iterates a snapshot, so handlers may (un)subscribe mid-publish
 * - One-time subscriptions via once()
 * - Handler failures are logged and isolated
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("entity:updated", (event) => {
 *     console.log("Updated:", event.data.entityId, event.data.record.state);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: HandlerLists = {
        "entity:added"          : [],
        "entity:updated"        : [],
        "entity:removed"        : [],
        "listener:statusChanged": [],
    };

    constructor(private readonly logger: EngineLogger = defaultLogger) {}

    /**
     * Emit an event to all subscribers.
     *
     * Handlers registered at the moment of the call are invoked, each
     * exactly once, even if the list changes while dispatching.
     *
     * @param event - The event payload to emit
     */
    emit<K extends EventType>(event: EventPayload<K>): void {
        const snapshot = [...this.handlers[event.type]];

        for (const handler of snapshot) {
            try {
                handler(event);
            }
            catch (error) {
                // One handler failure shouldn't break others
                this.logger.error(`EventBus handler error for ${event.type}`, {
                    error: describeError(error),
                });
            }
        }
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription {
        this.handlers[eventType].push(handler);

        let active = true;
        return {
            unsubscribe: () => {
                if (active) {
                    active = false;
                    this.unsubscribe(eventType, handler);
                }
            },
        };
    }

    /**
     * Remove the earliest registration of a handler.
     *
     * @returns true if a registration was removed
     */
    unsubscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): boolean {
        const list = this.handlers[eventType];
        const index = list.indexOf(handler);
        if (index === -1) {
            return false;
        }

        list.splice(index, 1);
        return true;
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for manual unsubscription if needed
     */
    once<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription {
        const wrappedHandler: EventHandler<K> = (event) => {
            subscription.unsubscribe();
            handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (undefined clears everything)
     */
    clear(eventType?: EventType): void {
        const types = eventType === undefined ? EVENT_TYPES : [eventType];
        for (const type of types) {
            this.handlers[type].length = 0;
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     *
     * @param eventType - The event type to check
     */
    handlerCount(eventType: EventType): number {
        return this.handlers[eventType].length;
    }
}
