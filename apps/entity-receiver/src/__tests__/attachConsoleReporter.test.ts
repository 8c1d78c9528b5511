/**
 * @fileoverview Unit tests for the console reporter
 *
 * @module reporters/__tests__/attachConsoleReporter
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus, createEvent, type EntityRecord } from "@entity-receiver/engine";
import { attachConsoleReporter } from "../reporters/attachConsoleReporter.js";

const TEST_TIME = new Date("2025-02-15T10:00:00.000Z");

const RECORD: EntityRecord = {
    entityId       : "sensor.temp1",
    state          : "21.5",
    attributes     : {},
    broadcasterName: "Upstairs",
    sourceIp       : "192.168.1.20",
    lastUpdated    : TEST_TIME,
};

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("attachConsoleReporter", () => {
    let logger: ReturnType<typeof createMockLogger>;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    // Scenario: New entity
    it("should log added entities at info", () => {
        attachConsoleReporter(eventBus, logger);

        eventBus.emit(createEvent("entity:added", { entityId: "sensor.temp1", record: RECORD }, TEST_TIME));

        expect(logger.info).toHaveBeenCalledWith("[ADDED] sensor.temp1", {
            state      : "21.5",
            broadcaster: "Upstairs",
            source     : "192.168.1.20",
        });
    });

    // Scenario: Updated entity
    it("should log updates at debug", () => {
        attachConsoleReporter(eventBus, logger);

        eventBus.emit(createEvent("entity:updated", { entityId: "sensor.temp1", record: RECORD }, TEST_TIME));

        expect(logger.debug).toHaveBeenCalledWith("[UPDATED] sensor.temp1", {
            state : "21.5",
            source: "192.168.1.20",
        });
        expect(logger.info).not.toHaveBeenCalled();
    });

    // Scenario: Removed entity
    it("should log removed entities at info", () => {
        attachConsoleReporter(eventBus, logger);

        eventBus.emit(createEvent("entity:removed", { entityId: "sensor.temp1" }, TEST_TIME));

        expect(logger.info).toHaveBeenCalledWith("[REMOVED] sensor.temp1");
    });

    // Scenario: Status changes
    it.each([
        [{ enabled: true, listening: true }, "[STATUS] Receiver listening"],
        [{ enabled: true, listening: false }, "[STATUS] Receiver not listening"],
        [{ enabled: false, listening: false }, "[STATUS] Receiver disabled"],
    ])("should log status %o", (data, message) => {
        attachConsoleReporter(eventBus, logger);

        eventBus.emit(createEvent("listener:statusChanged", data, TEST_TIME));

        expect(logger.info).toHaveBeenCalledWith(message);
    });

    // Scenario: Detach
    it("should stop logging after detach", () => {
        const detach = attachConsoleReporter(eventBus, logger);

        detach();
        eventBus.emit(createEvent("entity:removed", { entityId: "sensor.temp1" }, TEST_TIME));

        expect(logger.info).not.toHaveBeenCalled();
        expect(eventBus.handlerCount("entity:added")).toBe(0);
    });
});
