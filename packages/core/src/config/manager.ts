/**
 * Configuration Manager
 * Handles loading, saving, and managing the configuration file
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { logger, LogLevel } from "../utils/logger.js";
import type { ConfigKey, ConfigValue, LaunchboardConfig } from "./types.js";
import { CONFIG_KEYS, DEFAULT_CONFIG } from "./types.js";

type RawObject = Record<string, unknown>;

const isRawObject = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.includes(value);

/**
 * Expand a leading `~` to the current user's home directory
 */
export const expandHome = (value: string): string => {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
};

/**
 * Configuration with every path expanded
 */
export const resolveConfigPaths = (config: LaunchboardConfig): LaunchboardConfig => ({
  ...config,
  searchRoots: config.searchRoots.map(expandHome),
  userAgentsDir: expandHome(config.userAgentsDir),
  systemDaemonsDir: expandHome(config.systemDaemonsDir),
  logging: { ...config.logging },
});

export const isConfigKey = (key: string): key is ConfigKey => CONFIG_KEYS.some((candidate) => candidate === key);

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private config: LaunchboardConfig | null = null;
  private configPath: string;

  /**
   * Create a new ConfigManager instance
   * @param configPath Optional path to configuration file
   */
  constructor(configPath?: string) {
    this.configPath = configPath || process.env.LAUNCHBOARD_CONFIG || ConfigManager.getDefaultConfigPath();
  }

  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".launchboard", "config.yaml");
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, falling back to defaults when it does not exist
   */
  public async load(): Promise<LaunchboardConfig> {
    try {
      const fileContent = await fs.readFile(this.configPath, "utf-8");
      const loaded: unknown = yaml.load(fileContent);

      this.config = this.mergeWithDefaults(loaded);

      logger.debug("Configuration loaded successfully", { path: this.configPath });
      return this.config;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        logger.debug("Configuration file not found, using defaults", { path: this.configPath });
        this.config = this.mergeWithDefaults({});
        return this.config;
      }

      logger.error("Failed to load configuration", error);
      throw new Error(`Failed to load configuration: ${(error as Error).message}`);
    }
  }

  /**
   * Save configuration to file
   */
  public async save(config?: LaunchboardConfig): Promise<void> {
    const configToSave = config || this.config;

    if (!configToSave) {
      throw new Error("No configuration to save");
    }

    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });

      const yamlContent = yaml.dump(configToSave, {
        indent: 2,
        lineWidth: 100,
        noRefs: true,
      });

      await fs.writeFile(this.configPath, yamlContent, "utf-8");

      this.config = configToSave;
      logger.info("Configuration saved successfully", { path: this.configPath });
    } catch (error) {
      logger.error("Failed to save configuration", error);
      throw new Error(`Failed to save configuration: ${(error as Error).message}`);
    }
  }

  /**
   * Get the current configuration
   */
  public get(): LaunchboardConfig {
    if (!this.config) {
      throw new Error("Configuration not loaded. Call load() first.");
    }
    return this.config;
  }

  /**
   * Get a configuration value by dotted key
   */
  public getValue(key: ConfigKey): ConfigValue {
    const config = this.get();

    switch (key) {
      case "logging.level":
        return config.logging.level;
      case "logging.logToFile":
        return config.logging.logToFile;
      default:
        return config[key];
    }
  }

  /**
   * Set a configuration value from its command-line text form.
   * Lists are comma-separated.
   */
  public setValue(key: ConfigKey, raw: string): ConfigValue {
    const config = this.get();
    const text = raw.trim();

    switch (key) {
      case "searchRoots": {
        const roots = text
          .split(",")
          .map((root) => root.trim())
          .filter((root) => root.length > 0);
        config.searchRoots = roots;
        return roots;
      }
      case "probeTimeoutMs":
      case "lifecycleTimeoutMs":
      case "logTailLines": {
        const value = Number(text);
        if (!Number.isInteger(value) || value <= 0) {
          throw new Error(`${key} must be a positive integer`);
        }
        config[key] = value;
        return value;
      }
      case "matchProgramPath":
      case "logging.logToFile": {
        if (text !== "true" && text !== "false") {
          throw new Error(`${key} must be true or false`);
        }
        const value = text === "true";
        if (key === "matchProgramPath") {
          config.matchProgramPath = value;
        } else {
          config.logging.logToFile = value;
        }
        return value;
      }
      case "logging.level": {
        if (!isLogLevel(text)) {
          throw new Error(`logging.level must be one of ${LOG_LEVELS.join(", ")}`);
        }
        config.logging.level = text;
        return text;
      }
      default: {
        if (text.length === 0) {
          throw new Error(`${key} must not be empty`);
        }
        config[key] = text;
        return text;
      }
    }
  }

  /**
   * Reset configuration to defaults
   */
  public reset(): LaunchboardConfig {
    this.config = this.mergeWithDefaults({});
    logger.info("Configuration reset to defaults");
    return this.config;
  }

  /**
   * Check if configuration file exists
   */
  public async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Merge loaded configuration with defaults.
   * Values of the wrong type are replaced by their default with a warning.
   */
  private mergeWithDefaults(loaded: unknown): LaunchboardConfig {
    const source: RawObject = isRawObject(loaded) ? loaded : {};
    if (loaded !== null && loaded !== undefined && !isRawObject(loaded)) {
      logger.warn("Configuration file is not a mapping, using defaults", { path: this.configPath });
    }

    const rawLogging: RawObject = isRawObject(source.logging) ? source.logging : {};

    return {
      searchRoots: [...this.pick(source, "searchRoots", DEFAULT_CONFIG.searchRoots, isStringArray)],
      definitionExtension: this.pick(source, "definitionExtension", DEFAULT_CONFIG.definitionExtension, isNonEmptyString),
      excludedPrefix: this.pick(source, "excludedPrefix", DEFAULT_CONFIG.excludedPrefix, isNonEmptyString),
      launchctlPath: this.pick(source, "launchctlPath", DEFAULT_CONFIG.launchctlPath, isNonEmptyString),
      probeTimeoutMs: this.pick(source, "probeTimeoutMs", DEFAULT_CONFIG.probeTimeoutMs, isPositiveInteger),
      lifecycleTimeoutMs: this.pick(source, "lifecycleTimeoutMs", DEFAULT_CONFIG.lifecycleTimeoutMs, isPositiveInteger),
      matchProgramPath: this.pick(source, "matchProgramPath", DEFAULT_CONFIG.matchProgramPath, isBoolean),
      logTailLines: this.pick(source, "logTailLines", DEFAULT_CONFIG.logTailLines, isPositiveInteger),
      userAgentsDir: this.pick(source, "userAgentsDir", DEFAULT_CONFIG.userAgentsDir, isNonEmptyString),
      systemDaemonsDir: this.pick(source, "systemDaemonsDir", DEFAULT_CONFIG.systemDaemonsDir, isNonEmptyString),
      logging: {
        level: this.pick(rawLogging, "level", DEFAULT_CONFIG.logging.level, isLogLevel),
        logToFile: this.pick(rawLogging, "logToFile", DEFAULT_CONFIG.logging.logToFile, isBoolean),
      },
    };
  }

  private pick<T>(source: RawObject, key: string, fallback: T, guard: (value: unknown) => value is T): T {
    const value = source[key];
    if (value === undefined) {
      return fallback;
    }
    if (guard(value)) {
      return value;
    }
    logger.warn(`Invalid configuration value for ${key}, using default`, { path: this.configPath, value });
    return fallback;
  }
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isNonEmptyString = (value: unknown): value is string => typeof value === "string" && value.trim().length > 0;

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
