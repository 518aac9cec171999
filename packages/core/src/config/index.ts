/**
 * Config Module - Configuration Management
 */

export { ConfigManager, expandHome, resolveConfigPaths, isConfigKey } from "./manager.js";
export type { LaunchboardConfig, LoggingConfig, ConfigKey, ConfigValue } from "./types.js";
export { DEFAULT_CONFIG, CONFIG_KEYS } from "./types.js";
