/**
 * bucket library entry point
 */

export * from "./core/index.js";
export { loadConfig, updateStoredConfig, readStoredConfig } from "./utils/config.js";
export { createLogger, type Logger } from "./utils/logger.js";
export type { Result } from "./types/result.js";
