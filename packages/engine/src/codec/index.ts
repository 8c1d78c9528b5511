/**
 * @fileoverview Codec barrel exports
 *
 * @module @entity-receiver/engine/codec
 */

export {
    decodeDatagram,
    parseDatagram,
    toEntityRecord,
    type DatagramSource,
} from "./MessageDecoder.js";
