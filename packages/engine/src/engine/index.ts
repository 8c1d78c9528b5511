/**
 * @fileoverview Engine barrel exports
 *
 * @module @entity-receiver/engine/engine
 */

export {
    EntityReceiverEngine,
    DEFAULT_UDP_PORT,
    DEFAULT_BROADCASTER_NAME,
    type EngineConfig,
} from "./EntityReceiverEngine.js";
