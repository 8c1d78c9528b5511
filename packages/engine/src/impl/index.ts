/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @entity-receiver/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    createConsoleLogger,
    defaultLogger,
    type ConsoleLoggerOptions,
} from "./ConsoleLogger.js";
