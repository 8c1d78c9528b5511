/**
 * @fileoverview Receiver Configuration Loader
 *
 * Loads receiver settings from a YAML file, overlays environment
 * variables and validates the result.
 *
 * Precedence (highest first):
 * 1. ENTITY_RECEIVER_* environment variables
 * 2. The `receiver` section of the YAML file
 * 3. Engine defaults
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    DEFAULT_UDP_PORT,
    DEFAULT_BROADCASTER_NAME,
    DEFAULT_BUFFER_SIZE,
    DEFAULT_CLEANUP_INTERVAL_MS,
    defaultLogger,
    type EngineLogger,
} from "@entity-receiver/engine";

/**
 * Validated receiver settings.
 */
export interface ReceiverConfig {
    /** UDP port, 1024-65535 */
    port: number;

    /** Display name of this receiver */
    broadcasterName: string;

    /** Largest datagram accepted, in bytes */
    bufferSize: number;

    /** Sweep interval in milliseconds */
    cleanupIntervalMs: number;
}

/**
 * Environment variables read by the loader.
 */
export const ENV_KEYS = {
    port             : "ENTITY_RECEIVER_PORT",
    broadcasterName  : "ENTITY_RECEIVER_BROADCASTER_NAME",
    bufferSize       : "ENTITY_RECEIVER_BUFFER_SIZE",
    cleanupIntervalMs: "ENTITY_RECEIVER_CLEANUP_INTERVAL_MS",
    configPath       : "ENTITY_RECEIVER_CONFIG",
} as const;

type Environment = Readonly<Record<string, string | undefined>>;

const kMIN_PORT = 1024;
const kMAX_PORT = 65535;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Get default receiver settings.
 */
export function getDefaultConfig(): ReceiverConfig {
    return {
        port             : DEFAULT_UDP_PORT,
        broadcasterName  : DEFAULT_BROADCASTER_NAME,
        bufferSize       : DEFAULT_BUFFER_SIZE,
        cleanupIntervalMs: DEFAULT_CLEANUP_INTERVAL_MS,
    };
}

/**
 * Load the `receiver` section of a YAML file.
 *
 * Keys are snake_case in the file (`broadcaster_name`, `buffer_size`,
 * `cleanup_interval_ms`). Absent keys are left out of the result.
 *
 * @param filePath - Path to receiver.yml
 * @throws Error if the file doesn't exist or is malformed
 *
 * @example
 * ```typescript
 * // receiver.yml:
 * // receiver:
 * //   port: 9999
 * loadConfigFile("./config/receiver.yml");
 * // => { port: 9999 }
 * ```
 */
export function loadConfigFile(filePath: string): Partial<ReceiverConfig> {
    if (!existsSync(filePath)) {
        throw new Error(`Receiver config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !isRecord(parsed.receiver)) {
        throw new Error("Invalid receiver config format: expected { receiver: {...} }");
    }

    const raw = parsed.receiver;
    const result: Partial<ReceiverConfig> = {};

    if (raw.port !== undefined) {
        result.port = expectNumber("port", raw.port);
    }
    if (raw.broadcaster_name !== undefined) {
        if (typeof raw.broadcaster_name !== "string") {
            throw new Error("Invalid receiver config: 'broadcaster_name' must be a string");
        }
        result.broadcasterName = raw.broadcaster_name;
    }
    if (raw.buffer_size !== undefined) {
        result.bufferSize = expectNumber("buffer_size", raw.buffer_size);
    }
    if (raw.cleanup_interval_ms !== undefined) {
        result.cleanupIntervalMs = expectNumber("cleanup_interval_ms", raw.cleanup_interval_ms);
    }

    return result;
}

function expectNumber(key: string, value: unknown): number {
    if (typeof value !== "number") {
        throw new Error(`Invalid receiver config: '${key}' must be a number`);
    }
    return value;
}

function parseInteger(name: string, value: string): number {
    const parsed = Number(value.trim());
    if (value.trim() === "" || !Number.isInteger(parsed)) {
        throw new Error(`${name} must be an integer, got "${value}"`);
    }
    return parsed;
}

/**
 * Overlay ENTITY_RECEIVER_* environment variables.
 * Empty variables are ignored.
 */
export function applyEnvOverrides(base: ReceiverConfig, env: Environment = process.env): ReceiverConfig {
    const result = { ...base };

    const port = env[ENV_KEYS.port];
    if (port) {
        result.port = parseInteger(ENV_KEYS.port, port);
    }

    const broadcasterName = env[ENV_KEYS.broadcasterName];
    if (broadcasterName) {
        result.broadcasterName = broadcasterName;
    }

    const bufferSize = env[ENV_KEYS.bufferSize];
    if (bufferSize) {
        result.bufferSize = parseInteger(ENV_KEYS.bufferSize, bufferSize);
    }

    const cleanupIntervalMs = env[ENV_KEYS.cleanupIntervalMs];
    if (cleanupIntervalMs) {
        result.cleanupIntervalMs = parseInteger(ENV_KEYS.cleanupIntervalMs, cleanupIntervalMs);
    }

    return result;
}

/**
 * Check ranges.
 *
 * @throws Error naming the first invalid setting
 */
export function validateConfig(config: ReceiverConfig): ReceiverConfig {
    if (!Number.isInteger(config.port) || config.port < kMIN_PORT || config.port > kMAX_PORT) {
        throw new Error(`Invalid port ${config.port}: must be an integer between ${kMIN_PORT} and ${kMAX_PORT}`);
    }

    if (config.broadcasterName.trim() === "") {
        throw new Error("Invalid broadcaster name: must not be empty");
    }

    if (!Number.isInteger(config.bufferSize) || config.bufferSize <= 0) {
        throw new Error(`Invalid buffer size ${config.bufferSize}: must be a positive integer`);
    }

    if (!Number.isFinite(config.cleanupIntervalMs) || config.cleanupIntervalMs <= 0) {
        throw new Error(`Invalid cleanup interval ${config.cleanupIntervalMs}: must be positive`);
    }

    return config;
}

/**
 * Options for loadConfig().
 */
export interface LoadConfigOptions {
    /** Path to receiver.yml, used unless ENTITY_RECEIVER_CONFIG is set */
    readonly filePath: string;

    /** Environment to read (default: process.env) */
    readonly env?: Environment;

    /** Logger for the missing-file warning */
    readonly logger?: EngineLogger;
}

/**
 * Load, overlay and validate receiver settings.
 *
 * A missing file falls back to defaults with a warning. A malformed file
 * or an out-of-range value throws.
 */
export function loadConfig(options: LoadConfigOptions): ReceiverConfig {
    const env = options.env ?? process.env;
    const logger = options.logger ?? defaultLogger;
    const filePath = env[ENV_KEYS.configPath] || options.filePath;

    let fromFile: Partial<ReceiverConfig> = {};
    if (existsSync(filePath)) {
        fromFile = loadConfigFile(filePath);
    }
    else {
        logger.warn(`Receiver config file not found: ${filePath}, using defaults`);
    }

    return validateConfig(applyEnvOverrides({ ...getDefaultConfig(), ...fromFile }, env));
}
