/**
 * @launchboard/core
 *
 * Reconciliation engine for launchd services: discovers definition files, probes their
 * live status through launchctl, and issues lifecycle commands
 */

// Export common types
export type { SystemInfo, Result, ExecutionResult } from "./types/common.js";
export { OperatingSystem, Architecture, ok, fail } from "./types/common.js";

// Export OS module
export { OSDetector } from "./os/index.js";

// Export Service module
export * from "./service/index.js";

// Export Config module
export { ConfigManager, expandHome, resolveConfigPaths, isConfigKey, DEFAULT_CONFIG, CONFIG_KEYS } from "./config/index.js";
export type { LaunchboardConfig, LoggingConfig, ConfigKey, ConfigValue } from "./config/index.js";

// Export Utils module
export { logger, initLogger, getLogger, LogLevel, runCommand, describeFailure, COMMAND_NOT_FOUND } from "./utils/index.js";
export type { Logger, LoggerConfig, CommandRunner, RunOptions } from "./utils/index.js";

// Export engine wiring
export { createEngine } from "./engine.js";
export type { Engine, EngineOverrides } from "./engine.js";
