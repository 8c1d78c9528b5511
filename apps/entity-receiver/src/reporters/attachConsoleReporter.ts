/**
 * @fileoverview Console reporter
 *
 * Subscribes to the engine's event bus and logs entity and listener
 * changes. New and removed entities log at info; updates log at debug
 * since every datagram produces one.
 *
 * @module reporters/attachConsoleReporter
 */

import type { EngineLogger, EventBus, Subscription } from "@entity-receiver/engine";

/**
 * Attach the reporter.
 *
 * @returns Function that detaches every subscription
 */
export function attachConsoleReporter(eventBus: EventBus, logger: EngineLogger): () => void {
    const subscriptions: Subscription[] = [
        eventBus.subscribe("entity:added", ({ data }) => {
            logger.info(`[ADDED] ${data.entityId}`, {
                state      : data.record.state,
                broadcaster: data.record.broadcasterName,
                source     : data.record.sourceIp,
            });
        }),

        eventBus.subscribe("entity:updated", ({ data }) => {
            logger.debug(`[UPDATED] ${data.entityId}`, {
                state : data.record.state,
                source: data.record.sourceIp,
            });
        }),

        eventBus.subscribe("entity:removed", ({ data }) => {
            logger.info(`[REMOVED] ${data.entityId}`);
        }),

        eventBus.subscribe("listener:statusChanged", ({ data }) => {
            const status = !data.enabled ? "disabled" : data.listening ? "listening" : "not listening";
            logger.info(`[STATUS] Receiver ${status}`);
        }),
    ];

    return () => {
        for (const subscription of subscriptions) {
            subscription.unsubscribe();
        }
    };
}
