/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    loadConfigFile,
    applyEnvOverrides,
    validateConfig,
    getDefaultConfig,
    ENV_KEYS,
    type ReceiverConfig,
    type LoadConfigOptions,
} from "./loadConfig.js";

export { isPortAvailable } from "./portProbe.js";
