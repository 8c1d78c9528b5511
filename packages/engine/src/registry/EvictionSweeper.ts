/**
 * @fileoverview Eviction Sweeper
 *
 * Periodically removes entities that have gone silent and publishes an
 * "entity:removed" event for each one. Runs on its own fixed timer,
 * independent of inbound traffic.
 *
 * @module @entity-receiver/engine/registry/EvictionSweeper
 */

import type { EventBus } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { EntityRegistry } from "./EntityRegistry.js";

/**
 * Default tick interval (30 seconds).
 */
export const DEFAULT_CLEANUP_INTERVAL_MS = 30_000;

/**
 * Default staleness threshold (10 minutes).
 */
export const DEFAULT_STALENESS_MS = 10 * 60_000;

export interface EvictionSweeperConfig {
    readonly registry: EntityRegistry;
    readonly eventBus: EventBus;
    readonly logger: EngineLogger;

    /** Tick interval in milliseconds (default: 30000) */
    readonly intervalMs?: number;

    /** Staleness threshold in milliseconds (default: 600000) */
    readonly stalenessMs?: number;

    /** Time source (default: () => new Date()) */
    readonly clock?: () => Date;
}

export class EvictionSweeper {
    private readonly registry: EntityRegistry;
    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;
    private readonly clock: () => Date;
    private timer: NodeJS.Timeout | null = null;

    readonly intervalMs: number;
    readonly stalenessMs: number;

    constructor(config: EvictionSweeperConfig) {
        this.registry = config.registry;
        this.eventBus = config.eventBus;
        this.logger = config.logger;
        this.intervalMs = config.intervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
        this.stalenessMs = config.stalenessMs ?? DEFAULT_STALENESS_MS;
        this.clock = config.clock ?? (() => new Date());
    }

    /**
     * Start ticking. The first sweep happens one interval from now.
     */
    start(): void {
        if (this.timer) {
            return;
        }

        this.timer = setInterval(() => this.sweepNow(), this.intervalMs);
    }

    /**
     * Stop ticking. Takes effect immediately; no tick runs afterwards.
     */
    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    get isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * Run one eviction pass now.
     *
     * @returns Evicted entity ids
     */
    sweepNow(): string[] {
        const now = this.clock();
        const evicted = this.registry.sweep(now, this.stalenessMs);

        for (const entityId of evicted) {
            this.logger.debug("Removed stale entity", { entityId });
            this.eventBus.emit(createEvent("entity:removed", { entityId }, now));
        }

        return evicted;
    }
}
