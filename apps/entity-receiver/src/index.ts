/**
 * @fileoverview Entity Receiver - Main Entry Point
 *
 * Runs one EntityReceiverEngine as a daemon: loads settings from
 * config/receiver.yml and the environment, checks the UDP port is free,
 * starts the engine and reports entity changes on the console until
 * SIGINT or SIGTERM.
 *
 * Flags:
 * - `--verbose` prints debug logs, including every entity update
 *
 * @module entity-receiver
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    EntityReceiverEngine,
    StartError,
    createConsoleLogger,
    describeError,
} from "@entity-receiver/engine";

import { loadConfig, isPortAvailable, type ReceiverConfig } from "./config/index.js";
import { attachConsoleReporter } from "./reporters/attachConsoleReporter.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const verbose = args.includes("--verbose");
    const logger = createConsoleLogger({ prefix: "Receiver", verbose });

    console.log("=".repeat(60));
    console.log("Entity Receiver");
    console.log("=".repeat(60));

    let config: ReceiverConfig;
    try {
        config = loadConfig({
            filePath: join(__dirname, "..", "config", "receiver.yml"),
            logger,
        });
    }
    catch (error) {
        logger.error(`Invalid configuration: ${describeError(error)}`);
        process.exit(1);
    }

    if (!(await isPortAvailable(config.port, logger))) {
        logger.error(`UDP port ${config.port} is already in use`);
        process.exit(1);
    }

    const engine = new EntityReceiverEngine({ ...config, logger });
    attachConsoleReporter(engine.eventBus, logger);

    // Handle graceful shutdown
    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down...`);
        engine.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error(`Shutdown failed: ${describeError(error)}`);
                process.exit(1);
            });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    try {
        await engine.start();

        logger.info(`${engine.broadcasterName} is receiving on UDP port ${engine.port}. Press Ctrl+C to stop.`);
    }
    catch (error) {
        if (error instanceof StartError) {
            logger.error(error.message, { port: error.port });
        }
        else {
            logger.error(`Failed to start receiver: ${describeError(error)}`);
        }
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error);
    process.exit(1);
});
