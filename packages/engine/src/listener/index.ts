/**
 * @fileoverview Listener barrel exports
 *
 * @module @entity-receiver/engine/listener
 */

export {
    DatagramListener,
    DEFAULT_BUFFER_SIZE,
    DEFAULT_RETRY_DELAY_MS,
    type DatagramCallback,
    type DatagramListenerConfig,
} from "./DatagramListener.js";
