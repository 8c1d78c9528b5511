/**
 * @fileoverview Datagram Listener
 *
 * Owns one IPv4 UDP socket bound with address reuse. Each datagram is
 * handed to the `onDatagram` callback before the next one is delivered,
 * so per-source ordering is preserved.
 *
 * A socket error after binding is treated as transient: the failed
 * socket is closed and the listener rebinds after `retryDelayMs`,
 * repeating until it succeeds or stop() is called.
 *
 * @module @entity-receiver/engine/listener/DatagramListener
 */

import { createSocket, type RemoteInfo, type Socket } from "dgram";
import type { DatagramSource } from "../codec/MessageDecoder.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { ReceiveError, StartError, describeError } from "../contracts/errors.js";

/**
 * Largest datagram accepted by default, in bytes.
 */
export const DEFAULT_BUFFER_SIZE = 4096;

/**
 * Pause before rebinding after a receive error.
 */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Datagram callback. Runs inline on the event loop.
 */
export type DatagramCallback = (payload: Buffer, source: DatagramSource) => void;

export interface DatagramListenerConfig {
    /** Called for every received datagram */
    readonly onDatagram: DatagramCallback;

    /** Called when a datagram exceeds the buffer size */
    readonly onOversized?: (size: number, source: DatagramSource) => void;

    /** Called whenever the socket opens or closes outside start()/stop() */
    readonly onOpenChange?: (open: boolean) => void;

    readonly logger: EngineLogger;

    /** Pause before rebinding after a receive error (default: 1000) */
    readonly retryDelayMs?: number;
}

export class DatagramListener {
    private readonly config: DatagramListenerConfig;
    private readonly retryDelayMs: number;
    private socket: Socket | null = null;
    private retryTimer: NodeJS.Timeout | null = null;
    private active = false;
    /** Bumped by stop() so a bind still in flight is discarded */
    private generation = 0;
    private port = 0;
    private bufferSize = DEFAULT_BUFFER_SIZE;

    constructor(config: DatagramListenerConfig) {
        this.config = config;
        this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    }

    /**
     * Bind the socket and begin receiving.
     *
     * @param port - UDP port to bind on all IPv4 interfaces
     * @param bufferSize - Largest datagram accepted, in bytes
     * @throws StartError if the port cannot be bound
     */
    async start(port: number, bufferSize: number = DEFAULT_BUFFER_SIZE): Promise<void> {
        if (this.active) {
            this.config.logger.warn("Listener already started", { port: this.port });
            return;
        }

        this.port = port;
        this.bufferSize = bufferSize;
        this.active = true;

        try {
            await this.bind();
        }
        catch (error) {
            this.active = false;
            throw error;
        }
    }

    /**
     * Stop receiving and release the port. Resolves once the socket is
     * closed; no datagram is delivered afterwards.
     */
    async stop(): Promise<void> {
        this.active = false;
        this.generation += 1;

        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }

        const socket = this.socket;
        if (!socket) {
            return;
        }

        this.socket = null;
        await closeSocket(socket);
    }

    /** True while a bound socket is receiving */
    get isOpen(): boolean {
        return this.socket !== null;
    }

    /** True between start() and stop(), including while rebinding */
    get isActive(): boolean {
        return this.active;
    }

    private bind(): Promise<void> {
        return new Promise((resolve, reject) => {
            const socket = createSocket({ type: "udp4", reuseAddr: true });
            const generation = this.generation;
            let listening = false;

            socket.on("error", (error) => {
                if (listening) {
                    this.handleSocketError(socket, error);
                    return;
                }

                this.discard(socket);
                if (generation !== this.generation) {
                    resolve();
                    return;
                }
                reject(new StartError(this.port, { cause: error }));
            });

            socket.once("listening", () => {
                listening = true;

                // stop() was called while binding
                if (!this.active || generation !== this.generation) {
                    this.discard(socket);
                    resolve();
                    return;
                }

                socket.on("message", (msg, rinfo) => this.handleMessage(socket, msg, rinfo));
                this.socket = socket;

                this.config.logger.info("Started UDP listener", { port: this.port });
                resolve();
            });

            socket.bind(this.port);
        });
    }

    private handleMessage(socket: Socket, msg: Buffer, rinfo: RemoteInfo): void {
        if (socket !== this.socket) {
            return;
        }

        const source: DatagramSource = { address: rinfo.address, port: rinfo.port };

        if (msg.length > this.bufferSize) {
            this.config.onOversized?.(msg.length, source);
            return;
        }

        try {
            this.config.onDatagram(msg, source);
        }
        catch (error) {
            this.config.logger.error("Datagram handler error", {
                source: source.address,
                error : describeError(error),
            });
        }
    }

    private handleSocketError(socket: Socket, cause: Error): void {
        if (socket !== this.socket) {
            this.config.logger.debug("Ignoring error from retired socket", { error: cause.message });
            return;
        }

        const error = new ReceiveError(`Error receiving UDP message: ${cause.message}`, { cause });
        this.config.logger.error(error.message, { port: this.port });

        this.socket = null;
        this.discard(socket);
        this.config.onOpenChange?.(false);

        this.scheduleRebind();
    }

    /**
     * Close a socket that is no longer the active one.
     */
    private discard(socket: Socket): void {
        closeSocket(socket).catch((closeError: unknown) => {
            this.config.logger.debug("Closing retired socket failed", {
                error: describeError(closeError),
            });
        });
    }

    private scheduleRebind(): void {
        if (!this.active || this.retryTimer) {
            return;
        }

        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.bind().then(
                () => {
                    if (this.socket) {
                        this.config.onOpenChange?.(true);
                    }
                },
                (error: unknown) => {
                    this.config.logger.error("Rebind failed", {
                        port : this.port,
                        error: describeError(error),
                    });
                    this.scheduleRebind();
                }
            );
        }, this.retryDelayMs);
    }
}

/**
 * Close a socket, resolving once the close callback fires.
 */
function closeSocket(socket: Socket): Promise<void> {
    return new Promise((resolve, reject) => {
        try {
            socket.close(() => resolve());
        }
        catch (error) {
            reject(error);
        }
    });
}
