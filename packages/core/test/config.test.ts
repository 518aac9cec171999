import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import yaml from "js-yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigManager, expandHome, isConfigKey, resolveConfigPaths } from "../src/config/manager.js";
import { DEFAULT_CONFIG } from "../src/config/types.js";
import { LogLevel } from "../src/utils/logger.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("ConfigManager", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = path.join(dir, "config.yaml");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("uses defaults when the file does not exist", async () => {
    const manager = new ConfigManager(configPath);

    expect(await manager.load()).toEqual(DEFAULT_CONFIG);
    expect(await manager.exists()).toBe(false);
  });

  it("merges a partial file with defaults", async () => {
    await fs.writeFile(configPath, yaml.dump({ searchRoots: ["/opt/agents"], logging: { level: "debug" } }), "utf-8");

    const config = await new ConfigManager(configPath).load();

    expect(config.searchRoots).toEqual(["/opt/agents"]);
    expect(config.logging).toEqual({ level: LogLevel.DEBUG, logToFile: true });
    expect(config.probeTimeoutMs).toBe(5000);
  });

  it("replaces values of the wrong type with defaults", async () => {
    await fs.writeFile(configPath, yaml.dump({ probeTimeoutMs: "fast", matchProgramPath: "yes", searchRoots: [1, 2] }), "utf-8");

    const config = await new ConfigManager(configPath).load();

    expect(config.probeTimeoutMs).toBe(DEFAULT_CONFIG.probeTimeoutMs);
    expect(config.matchProgramPath).toBe(true);
    expect(config.searchRoots).toEqual(DEFAULT_CONFIG.searchRoots);
  });

  it("saves and reloads values set from text", async () => {
    const manager = new ConfigManager(configPath);
    await manager.load();

    expect(manager.setValue("searchRoots", " /a , /b ,")).toEqual(["/a", "/b"]);
    expect(manager.setValue("logTailLines", "120")).toBe(120);
    expect(manager.setValue("matchProgramPath", "false")).toBe(false);
    expect(manager.setValue("logging.level", "info")).toBe("info");
    await manager.save();

    const reloaded = await new ConfigManager(configPath).load();
    expect(reloaded.searchRoots).toEqual(["/a", "/b"]);
    expect(reloaded.logTailLines).toBe(120);
    expect(reloaded.matchProgramPath).toBe(false);
    expect(reloaded.logging.level).toBe(LogLevel.INFO);
  });

  it("rejects invalid values", async () => {
    const manager = new ConfigManager(configPath);
    await manager.load();

    expect(() => manager.setValue("probeTimeoutMs", "-1")).toThrow("probeTimeoutMs must be a positive integer");
    expect(() => manager.setValue("logging.logToFile", "maybe")).toThrow("logging.logToFile must be true or false");
    expect(() => manager.setValue("launchctlPath", "  ")).toThrow("launchctlPath must not be empty");
  });

  it("reads dotted keys", async () => {
    const manager = new ConfigManager(configPath);
    await manager.load();

    expect(manager.getValue("logging.logToFile")).toBe(true);
    expect(manager.getValue("excludedPrefix")).toBe("com.apple");
  });

  it("does not share default arrays between instances", async () => {
    const first = await new ConfigManager(configPath).load();
    first.searchRoots.push("/mutated");

    const second = await new ConfigManager(configPath).load();

    expect(second.searchRoots).not.toContain("/mutated");
  });

  it("prefers the environment variable over the default path", () => {
    const previous = process.env.LAUNCHBOARD_CONFIG;
    process.env.LAUNCHBOARD_CONFIG = configPath;
    try {
      expect(new ConfigManager().getConfigPath()).toBe(configPath);
    } finally {
      if (previous === undefined) {
        delete process.env.LAUNCHBOARD_CONFIG;
      } else {
        process.env.LAUNCHBOARD_CONFIG = previous;
      }
    }
  });
});

describe("path helpers", () => {
  it("expands a leading tilde", () => {
    expect(expandHome("~/Library/LaunchAgents")).toBe(path.join(os.homedir(), "Library/LaunchAgents"));
    expect(expandHome("/Library/LaunchDaemons")).toBe("/Library/LaunchDaemons");
  });

  it("resolves every configured directory", () => {
    const resolved = resolveConfigPaths(DEFAULT_CONFIG);

    expect(resolved.searchRoots[2]).toBe(path.join(os.homedir(), "Library/LaunchAgents"));
    expect(resolved.userAgentsDir).toBe(path.join(os.homedir(), "Library/LaunchAgents"));
    expect(DEFAULT_CONFIG.searchRoots[2]).toBe("~/Library/LaunchAgents");
  });

  it("knows the configuration keys", () => {
    expect(isConfigKey("logging.level")).toBe(true);
    expect(isConfigKey("logging")).toBe(false);
  });
});
