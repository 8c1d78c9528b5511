/**
 * @fileoverview Registry barrel exports
 *
 * @module @entity-receiver/engine/registry
 */

export { EntityRegistry } from "./EntityRegistry.js";
export {
    EvictionSweeper,
    DEFAULT_CLEANUP_INTERVAL_MS,
    DEFAULT_STALENESS_MS,
    type EvictionSweeperConfig,
} from "./EvictionSweeper.js";
