/**
 * @fileoverview Unit tests for the UDP port probe
 *
 * @module config/__tests__/portProbe
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const probe = vi.hoisted(() => {
    const state: { bindError: Error | undefined; closed: number } = {
        bindError: undefined,
        closed   : 0,
    };
    return state;
});

vi.mock("dgram", async () => {
    const { EventEmitter } = await import("events");

    class ProbeSocket extends EventEmitter {
        bind(): this {
            const error = probe.bindError;
            void Promise.resolve().then(() => {
                if (error) {
                    this.emit("error", error);
                }
                else {
                    this.emit("listening");
                }
            });
            return this;
        }

        close(callback?: () => void): this {
            probe.closed += 1;
            if (callback) {
                void Promise.resolve().then(callback);
            }
            return this;
        }
    }

    return {
        createSocket: vi.fn(() => new ProbeSocket()),
    };
});

import { createSocket } from "dgram";
import { isPortAvailable } from "../config/portProbe.js";

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("isPortAvailable", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        probe.bindError = undefined;
        probe.closed = 0;
    });

    // Scenario: Free port
    it("should report true and close the socket when the bind succeeds", async () => {
        await expect(isPortAvailable(8888, createMockLogger())).resolves.toBe(true);

        expect(createSocket).toHaveBeenCalledWith({ type: "udp4", reuseAddr: true });
        expect(probe.closed).toBe(1);
    });

    // Scenario: Port in use
    it("should report false when the bind fails", async () => {
        const logger = createMockLogger();
        probe.bindError = new Error("bind EADDRINUSE 0.0.0.0:8888");

        await expect(isPortAvailable(8888, logger)).resolves.toBe(false);

        expect(probe.closed).toBe(1);
        expect(logger.debug).toHaveBeenCalledWith("Port probe bind failed", {
            port : 8888,
            error: "bind EADDRINUSE 0.0.0.0:8888",
        });
    });
});
