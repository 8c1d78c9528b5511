/**
 * @fileoverview UDP port availability probe
 *
 * @module config/portProbe
 */

import { createSocket } from "dgram";
import { defaultLogger, describeError, type EngineLogger } from "@entity-receiver/engine";

/**
 * Check whether a UDP port can be bound.
 *
 * Binds a throwaway IPv4 socket with address reuse, the same way the
 * receiver binds, and closes it again.
 *
 * @param port - Port to probe
 * @param logger - Receives close failures at debug level
 * @returns false when the bind fails
 *
 * @example
 * ```typescript
 * if (!(await isPortAvailable(8888))) {
 *     throw new Error("Port 8888 is already in use");
 * }
 * ```
 */
export function isPortAvailable(port: number, logger: EngineLogger = defaultLogger): Promise<boolean> {
    return new Promise((resolve) => {
        const socket = createSocket({ type: "udp4", reuseAddr: true });

        socket.once("error", (error) => {
            logger.debug("Port probe bind failed", { port, error: describeError(error) });
            try {
                socket.close();
            }
            catch (closeError) {
                logger.debug("Port probe close failed", { port, error: describeError(closeError) });
            }
            resolve(false);
        });

        socket.once("listening", () => {
            socket.close(() => resolve(true));
        });

        socket.bind(port);
    });
}
