/**
 * @fileoverview Unit tests for DatagramListener
 *
 * Tests cover:
 * - Binding with address reuse and forwarding datagrams
 * - StartError on bind failure
 * - Oversized datagrams
 * - Stop closes the socket and silences late datagrams
 * - Rebinding after a receive error
 *
 * @module @entity-receiver/engine/__tests__/DatagramListener
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { SocketOptions } from "dgram";

vi.mock("dgram", async () => {
    const { FakeDatagramSocket } = await import("./support/FakeDatagramSocket.js");
    return {
        createSocket: vi.fn((options: SocketOptions) => new FakeDatagramSocket(options)),
    };
});

import { DatagramListener } from "../listener/DatagramListener.js";
import { StartError } from "../contracts/errors.js";
import { FakeDatagramSocket, addressInUse } from "./support/FakeDatagramSocket.js";

/**
 * Let queued socket callbacks and promise continuations run.
 */
async function settle(): Promise<void> {
    for (let i = 0; i < 10; i++) {
        await Promise.resolve();
    }
}

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("DatagramListener", () => {
    let logger: ReturnType<typeof createMockLogger>;
    let onDatagram: ReturnType<typeof vi.fn>;
    let onOversized: ReturnType<typeof vi.fn>;
    let onOpenChange: ReturnType<typeof vi.fn>;
    let listener: DatagramListener;

    beforeEach(() => {
        FakeDatagramSocket.reset();
        logger = createMockLogger();
        onDatagram = vi.fn();
        onOversized = vi.fn();
        onOpenChange = vi.fn();
        listener = new DatagramListener({
            logger,
            onDatagram,
            onOversized,
            onOpenChange,
            retryDelayMs: 1000,
        });
    });

    afterEach(async () => {
        await listener.stop();
        vi.useRealTimers();
    });

    describe("start", () => {
        // Scenario: Socket is bound with address reuse on the given port
        it("should bind an IPv4 socket with address reuse", async () => {
            await listener.start(8888);

            const socket = FakeDatagramSocket.latest();
            expect(socket.options).toEqual({ type: "udp4", reuseAddr: true });
            expect(socket.boundPort).toBe(8888);
            expect(listener.isOpen).toBe(true);
            expect(listener.isActive).toBe(true);
        });

        // Scenario: Bind failure is a StartError and leaves nothing running
        it("should reject with StartError when the port is in use", async () => {
            FakeDatagramSocket.bindErrors.push(addressInUse(8888));

            await expect(listener.start(8888)).rejects.toBeInstanceOf(StartError);
            expect(listener.isOpen).toBe(false);
            expect(listener.isActive).toBe(false);
            expect(FakeDatagramSocket.latest().closed).toBe(true);
        });

        // Scenario: StartError carries the port and cause
        it("should describe the failed port", async () => {
            FakeDatagramSocket.bindErrors.push(addressInUse(9000));

            await expect(listener.start(9000)).rejects.toMatchObject({
                code   : "START_ERROR",
                port   : 9000,
                message: "Failed to bind UDP port 9000: bind EADDRINUSE 0.0.0.0:9000",
            });
        });

        // Scenario: Second start while active is ignored
        it("should ignore start while already active", async () => {
            await listener.start(8888);
            await listener.start(8888);

            expect(FakeDatagramSocket.created).toHaveLength(1);
            expect(logger.warn).toHaveBeenCalledWith("Listener already started", { port: 8888 });
        });
    });

    describe("receiving", () => {
        // Scenario: Datagrams forwarded in arrival order with their source
        it("should forward datagrams in order with their source", async () => {
            await listener.start(8888);
            const socket = FakeDatagramSocket.latest();

            socket.deliver("first", "10.0.0.1", 4000);
            socket.deliver("second", "10.0.0.2", 4001);

            expect(onDatagram).toHaveBeenCalledTimes(2);
            expect(onDatagram.mock.calls[0][0].toString()).toBe("first");
            expect(onDatagram.mock.calls[0][1]).toEqual({ address: "10.0.0.1", port: 4000 });
            expect(onDatagram.mock.calls[1][0].toString()).toBe("second");
        });

        // Scenario: Oversized datagrams are not forwarded
        it("should report datagrams larger than the buffer size", async () => {
            await listener.start(8888, 8);
            const socket = FakeDatagramSocket.latest();

            socket.deliver("123456789", "10.0.0.1", 4000);
            socket.deliver("12345678", "10.0.0.1", 4000);

            expect(onOversized).toHaveBeenCalledWith(9, { address: "10.0.0.1", port: 4000 });
            expect(onDatagram).toHaveBeenCalledTimes(1);
        });

        // Scenario: A throwing callback does not stop later datagrams
        it("should keep receiving when the datagram callback throws", async () => {
            onDatagram.mockImplementationOnce(() => {
                throw new Error("boom");
            });
            await listener.start(8888);
            const socket = FakeDatagramSocket.latest();

            socket.deliver("a");
            socket.deliver("b");

            expect(onDatagram).toHaveBeenCalledTimes(2);
            expect(logger.error).toHaveBeenCalledWith("Datagram handler error", {
                source: "192.168.1.20",
                error : "boom",
            });
        });
    });

    describe("stop", () => {
        // Scenario: Stop closes the socket and ignores late datagrams
        it("should close the socket and deliver nothing afterwards", async () => {
            await listener.start(8888);
            const socket = FakeDatagramSocket.latest();

            await listener.stop();
            socket.deliver("late");

            expect(socket.closed).toBe(true);
            expect(listener.isOpen).toBe(false);
            expect(onDatagram).not.toHaveBeenCalled();
        });

        // Scenario: Stop before the bind completes
        it("should discard a socket whose bind completes after stop", async () => {
            const starting = listener.start(8888);
            const stopping = listener.stop();
            await Promise.all([starting, stopping]);

            expect(listener.isOpen).toBe(false);
            expect(listener.isActive).toBe(false);
            expect(FakeDatagramSocket.latest().closed).toBe(true);
            expect(onOpenChange).not.toHaveBeenCalled();
        });

        // Scenario: Restart before the first bind completes
        it("should keep only the socket of the latest start", async () => {
            const first = listener.start(8888);
            const stopping = listener.stop();
            const second = listener.start(8888);
            await Promise.all([first, stopping, second]);

            const [stale, current] = FakeDatagramSocket.created;
            expect(stale.closed).toBe(true);
            expect(current.closed).toBe(false);
            expect(listener.isOpen).toBe(true);

            stale.deliver("stale");
            current.deliver("current");

            expect(onDatagram).toHaveBeenCalledTimes(1);
            expect(onDatagram.mock.calls[0][0].toString()).toBe("current");
        });

        // Scenario: Stop is idempotent
        it("should be a no-op when already stopped", async () => {
            await listener.stop();
            await listener.start(8888);
            await listener.stop();

            await expect(listener.stop()).resolves.toBeUndefined();
        });
    });

    describe("receive errors", () => {
        // Scenario: Error closes the socket and a new one is bound after the delay
        it("should rebind after the retry delay", async () => {
            vi.useFakeTimers();
            await listener.start(8888);
            const failed = FakeDatagramSocket.latest();

            failed.emit("error", new Error("ECONNREFUSED"));

            expect(logger.error).toHaveBeenCalledWith(
                "Error receiving UDP message: ECONNREFUSED",
                { port: 8888 }
            );
            expect(listener.isOpen).toBe(false);
            expect(listener.isActive).toBe(true);
            expect(onOpenChange).toHaveBeenLastCalledWith(false);

            await vi.advanceTimersByTimeAsync(999);
            expect(FakeDatagramSocket.created).toHaveLength(1);

            await vi.advanceTimersByTimeAsync(1);
            await settle();
            expect(FakeDatagramSocket.created).toHaveLength(2);
            expect(listener.isOpen).toBe(true);
            expect(onOpenChange).toHaveBeenLastCalledWith(true);

            FakeDatagramSocket.latest().deliver("after");
            expect(onDatagram).toHaveBeenCalledTimes(1);
            expect(failed.closed).toBe(true);
        });

        // Scenario: Failed rebinds keep retrying
        it("should keep retrying when the rebind fails", async () => {
            vi.useFakeTimers();
            await listener.start(8888);

            FakeDatagramSocket.bindErrors.push(addressInUse(8888));
            FakeDatagramSocket.latest().emit("error", new Error("EIO"));

            await vi.advanceTimersByTimeAsync(1000);
            await settle();
            expect(listener.isOpen).toBe(false);
            expect(logger.error).toHaveBeenCalledWith("Rebind failed", {
                port : 8888,
                error: "Failed to bind UDP port 8888: bind EADDRINUSE 0.0.0.0:8888",
            });

            await vi.advanceTimersByTimeAsync(1000);
            await settle();
            expect(listener.isOpen).toBe(true);
            expect(FakeDatagramSocket.created).toHaveLength(3);
        });

        // Scenario: Stop cancels a pending rebind
        it("should not rebind after stop", async () => {
            vi.useFakeTimers();
            await listener.start(8888);

            FakeDatagramSocket.latest().emit("error", new Error("EIO"));
            await listener.stop();
            await vi.advanceTimersByTimeAsync(5000);

            expect(FakeDatagramSocket.created).toHaveLength(1);
            expect(listener.isActive).toBe(false);
        });
    });
});
