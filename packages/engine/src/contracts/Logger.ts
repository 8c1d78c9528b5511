/**
 * Logger Contract
 *
 * Structured logger used across the engine. The optional data bag is
 * passed through untouched so callers can attach ids and error text.
 */

export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}
