/**
 * Configuration Module Types
 */

import { LogLevel } from "../utils/logger.js";

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: LogLevel;
  logToFile: boolean;
}

/**
 * Complete launchboard configuration
 */
export interface LaunchboardConfig {
  /** Directories scanned for definition files, in discovery order */
  searchRoots: string[];
  definitionExtension: string;
  /** Files starting with this prefix belong to the vendor and are never managed */
  excludedPrefix: string;
  launchctlPath: string;
  probeTimeoutMs: number;
  lifecycleTimeoutMs: number;
  /** Whether search also matches the program path */
  matchProgramPath: boolean;
  logTailLines: number;
  userAgentsDir: string;
  systemDaemonsDir: string;
  logging: LoggingConfig;
}

/**
 * Keys accepted by `config --get/--set`
 */
export type ConfigKey =
  | "searchRoots"
  | "definitionExtension"
  | "excludedPrefix"
  | "launchctlPath"
  | "probeTimeoutMs"
  | "lifecycleTimeoutMs"
  | "matchProgramPath"
  | "logTailLines"
  | "userAgentsDir"
  | "systemDaemonsDir"
  | "logging.level"
  | "logging.logToFile";

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "searchRoots",
  "definitionExtension",
  "excludedPrefix",
  "launchctlPath",
  "probeTimeoutMs",
  "lifecycleTimeoutMs",
  "matchProgramPath",
  "logTailLines",
  "userAgentsDir",
  "systemDaemonsDir",
  "logging.level",
  "logging.logToFile",
];

export type ConfigValue = string | number | boolean | string[];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: LaunchboardConfig = {
  searchRoots: ["/System/Library/LaunchDaemons", "/Library/LaunchDaemons", "~/Library/LaunchAgents"],
  definitionExtension: ".plist",
  excludedPrefix: "com.apple",
  launchctlPath: "launchctl",
  probeTimeoutMs: 5000,
  lifecycleTimeoutMs: 10000,
  matchProgramPath: true,
  logTailLines: 50,
  userAgentsDir: "~/Library/LaunchAgents",
  systemDaemonsDir: "/Library/LaunchDaemons",
  logging: {
    level: LogLevel.WARN,
    logToFile: true,
  },
};
