/**
 * @fileoverview EntityReceiverEngine
 *
 * The core orchestration engine: a UDP entity-state receiver.
 *
 * Pipeline flow:
 * 1. Datagram received on the bound socket
 * 2. Decoded into an EntityRecord (bad datagrams are logged and dropped)
 * 3. Upserted into the registry
 * 4. "entity:added" or "entity:updated" published
 *
 * Independently, the sweeper evicts silent entities and publishes
 * "entity:removed". The enable/disable state machine governs whether the
 * listener and sweeper run at all and publishes "listener:statusChanged".
 *
 * Everything runs on the event loop, so the registry and handler lists
 * are only ever touched between suspension points.
 *
 * @module @entity-receiver/engine/engine/EntityReceiverEngine
 */

import type { EntityRecord } from "../contracts/EntityRecord.js";
import type { EntityReader, EntitySnapshot } from "../contracts/EntityReader.js";
import type {
    EventBus,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { DecodeError, ReceiverError, describeError } from "../contracts/errors.js";
import { decodeDatagram, type DatagramSource } from "../codec/MessageDecoder.js";
import { EntityRegistry } from "../registry/EntityRegistry.js";
import {
    EvictionSweeper,
    DEFAULT_CLEANUP_INTERVAL_MS,
    DEFAULT_STALENESS_MS,
} from "../registry/EvictionSweeper.js";
import {
    DatagramListener,
    DEFAULT_BUFFER_SIZE,
    DEFAULT_RETRY_DELAY_MS,
} from "../listener/DatagramListener.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { defaultLogger } from "../impl/ConsoleLogger.js";

/**
 * Default UDP port.
 */
export const DEFAULT_UDP_PORT = 8888;

/**
 * Default display name of this receiver.
 */
export const DEFAULT_BROADCASTER_NAME = "Remote Home Assistant";

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** UDP port, 1024-65535 (default: 8888) */
    readonly port?: number;

    /** Display name of this receiver (default: "Remote Home Assistant") */
    readonly broadcasterName?: string;

    /** Largest datagram accepted in bytes (default: 4096) */
    readonly bufferSize?: number;

    /** Sweep interval in milliseconds (default: 30000) */
    readonly cleanupIntervalMs?: number;

    /** Staleness threshold in milliseconds (default: 600000) */
    readonly stalenessMs?: number;

    /** Pause before rebinding after a receive error (default: 1000) */
    readonly retryDelayMs?: number;

    /** Initial enabled flag (default: true) */
    readonly enabled?: boolean;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;

    /** Time source (default: () => new Date()) */
    readonly clock?: () => Date;
}

/**
 * EntityReceiverEngine - the ingestion core.
 *
 * States: Disabled, Enabled-Stopped (initial), Enabled-Running.
 *
 * @example
 * ```typescript
 * const engine = new EntityReceiverEngine({ port: 8888 });
 *
 * engine.subscribe("entity:added", (event) => {
 *     console.log("New entity:", event.data.entityId);
 * });
 *
 * await engine.start();
 * ```
 */
export class EntityReceiverEngine implements EntityReader {
    private readonly config: Required<Omit<EngineConfig, "eventBus" | "logger" | "enabled">> & {
        logger: EngineLogger;
    };

    private readonly registry = new EntityRegistry();
    private readonly listener: DatagramListener;
    private readonly sweeper: EvictionSweeper;
    private enabled: boolean;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        const logger = config.logger ?? defaultLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(logger);
        this.enabled = config.enabled ?? true;

        this.config = {
            port             : config.port ?? DEFAULT_UDP_PORT,
            broadcasterName  : config.broadcasterName ?? DEFAULT_BROADCASTER_NAME,
            bufferSize       : config.bufferSize ?? DEFAULT_BUFFER_SIZE,
            cleanupIntervalMs: config.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS,
            stalenessMs      : config.stalenessMs ?? DEFAULT_STALENESS_MS,
            retryDelayMs     : config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
            clock            : config.clock ?? (() => new Date()),
            logger,
        };

        this.listener = new DatagramListener({
            logger      : this.config.logger,
            retryDelayMs: this.config.retryDelayMs,
            onDatagram  : (payload, source) => this.handleDatagram(payload, source),
            onOversized : (size, source) => this.reject(
                new DecodeError(`Datagram of ${size} bytes exceeds buffer size ${this.config.bufferSize}`),
                source
            ),
            onOpenChange: () => this.notifyStatusChanged(),
        });

        this.sweeper = new EvictionSweeper({
            registry   : this.registry,
            eventBus   : this.eventBus,
            logger     : this.config.logger,
            intervalMs : this.config.cleanupIntervalMs,
            stalenessMs: this.config.stalenessMs,
            clock      : this.config.clock,
        });
    }

    // ------------------------------------------------------------------
    // Lifecycle
    // ------------------------------------------------------------------

    /**
     * Enable the receiver and start listening.
     *
     * Publishes "listener:statusChanged" when the enabled flag changed or
     * the receiver is still not listening afterwards, so observers are
     * never left stale. A StartError is propagated after the event.
     */
    async enable(): Promise<void> {
        const wasEnabled = this.enabled;

        try {
            if (!this.enabled) {
                this.enabled = true;
                await this.launch();
            }
        }
        finally {
            // disable() during the bind has already published
            if (this.enabled && (!wasEnabled || !this.isListening)) {
                this.notifyStatusChanged();
            }
        }
    }

    /**
     * Disable the receiver, stopping the listener and sweeper.
     * A no-op (and no event) when already disabled.
     */
    async disable(): Promise<void> {
        if (!this.enabled) {
            return;
        }

        this.enabled = false;
        await this.shutdown();
        this.notifyStatusChanged();
    }

    /**
     * Route to enable() or disable() when the flag differs.
     */
    async setEnabled(enabled: boolean): Promise<void> {
        if (enabled && !this.enabled) {
            await this.enable();
        }
        else if (!enabled && this.enabled) {
            await this.disable();
        }
    }

    /**
     * Start the engine.
     *
     * No-op when disabled or already running.
     *
     * @throws StartError if the socket cannot be bound
     */
    async start(): Promise<void> {
        if (!this.enabled) {
            this.config.logger.debug("Receiver is disabled, not starting UDP listener");
            return;
        }

        if (this.listener.isActive) {
            this.config.logger.warn("Engine already running");
            return;
        }

        if (await this.launch()) {
            this.notifyStatusChanged();
        }
    }

    /**
     * Stop the engine. Idempotent.
     *
     * Resolves once the socket is closed and the sweeper has stopped.
     * Registry contents are kept.
     */
    async stop(): Promise<void> {
        if (!this.listener.isActive && !this.sweeper.isRunning) {
            return;
        }

        await this.shutdown();
        this.notifyStatusChanged();
    }

    /**
     * True iff enabled and the socket is bound and receiving.
     */
    get isListening(): boolean {
        return this.enabled && this.listener.isOpen;
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    get port(): number {
        return this.config.port;
    }

    get broadcasterName(): string {
        return this.config.broadcasterName;
    }

    // ------------------------------------------------------------------
    // Read surface
    // ------------------------------------------------------------------

    get(entityId: string): EntityRecord | undefined {
        return this.registry.get(entityId);
    }

    listAll(): EntitySnapshot {
        return this.registry.listAll();
    }

    get size(): number {
        return this.registry.size;
    }

    // ------------------------------------------------------------------
    // Observers
    // ------------------------------------------------------------------

    subscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription {
        return this.eventBus.subscribe(eventType, handler);
    }

    unsubscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): boolean {
        return this.eventBus.unsubscribe(eventType, handler);
    }

    // ------------------------------------------------------------------
    // Ingestion
    // ------------------------------------------------------------------

    /**
     * Decode one datagram, apply it to the registry and publish the
     * matching event. Bad datagrams are logged and dropped.
     *
     * @param payload - Raw datagram bytes
     * @param source - Datagram origin
     * @returns The stored record, or undefined when the datagram was rejected
     */
    handleDatagram(payload: Uint8Array, source: DatagramSource): EntityRecord | undefined {
        let record: EntityRecord;
        try {
            record = decodeDatagram(payload, source, this.config.clock());
        }
        catch (error) {
            this.reject(error, source);
            return undefined;
        }

        const outcome = this.registry.upsert(record);
        const stored = this.registry.get(record.entityId) ?? record;

        this.config.logger.debug("Received entity update", {
            entityId: stored.entityId,
            state   : stored.state,
            source  : source.address,
            outcome,
        });

        const data = { entityId: stored.entityId, record: stored };
        if (outcome === "added") {
            this.eventBus.emit(createEvent("entity:added", data, stored.lastUpdated));
        }
        else {
            this.eventBus.emit(createEvent("entity:updated", data, stored.lastUpdated));
        }

        return stored;
    }

    /**
     * Run one eviction pass immediately.
     *
     * @returns Evicted entity ids
     */
    sweepNow(): string[] {
        return this.sweeper.sweepNow();
    }

    // ------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------

    /**
     * Bind the listener, then start the sweeper.
     *
     * @returns false when stop() or disable() ran while binding; nothing
     *          is left running in that case
     */
    private async launch(): Promise<boolean> {
        await this.listener.start(this.config.port, this.config.bufferSize);

        if (!this.enabled || !this.listener.isOpen) {
            this.config.logger.debug("Receiver stopped while binding, not starting sweeper");
            return false;
        }

        this.sweeper.start();

        this.config.logger.info("Engine started", {
            port             : this.config.port,
            cleanupIntervalMs: this.config.cleanupIntervalMs,
        });
        return true;
    }

    private async shutdown(): Promise<void> {
        this.sweeper.stop();
        await this.listener.stop();

        this.config.logger.info("Stopped UDP listener", { port: this.config.port });
    }

    private reject(error: unknown, source: DatagramSource): void {
        if (error instanceof ReceiverError) {
            this.config.logger.warn("Dropped datagram", {
                source: source.address,
                code  : error.code,
                error : error.message,
            });
            return;
        }

        this.config.logger.error("Error processing datagram", {
            source: source.address,
            error : describeError(error),
        });
    }

    private notifyStatusChanged(): void {
        this.eventBus.emit(createEvent("listener:statusChanged", {
            enabled  : this.enabled,
            listening: this.isListening,
        }, this.config.clock()));
    }
}
