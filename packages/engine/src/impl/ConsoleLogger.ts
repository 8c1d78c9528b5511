/**
 * @fileoverview Console logger
 *
 * Default EngineLogger implementation backed by the console.
 *
 * @module @entity-receiver/engine/impl/ConsoleLogger
 */

import type { EngineLogger } from "../contracts/Logger.js";

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
    /** Tag printed after the level, e.g. "Listener" */
    readonly prefix?: string;

    /** Print debug messages (default: false) */
    readonly verbose?: boolean;
}

/**
 * Create a console-backed logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: "Receiver", verbose: true });
 * logger.info("Started", { port: 8888 });
 * // [INFO] [Receiver] Started { port: 8888 }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): EngineLogger {
    const tag = options.prefix ? ` [${options.prefix}]` : "";
    const verbose = options.verbose ?? false;

    return {
        debug: (msg, data) => {
            if (verbose) {
                console.debug(`[DEBUG]${tag} ${msg}`, data ?? "");
            }
        },
        info : (msg, data) => console.info(`[INFO]${tag} ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`[WARN]${tag} ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[ERROR]${tag} ${msg}`, data ?? ""),
    };
}

/**
 * Default console logger.
 */
export const defaultLogger: EngineLogger = createConsoleLogger();
