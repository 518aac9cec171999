/**
 * Command context
 * Loads configuration, wires the engine and resolves command targets
 */

import path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { ConfigManager, LogLevel, OSDetector, createEngine, expandHome, initLogger, ok, fail } from "@launchboard/core";
import type { Engine, EngineOverrides, Result, ScanWarning, ServiceRecord, ServiceSet } from "@launchboard/core";

/**
 * Options accepted by every command
 */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

let globalOptions: GlobalOptions = {};
let platformWarningShown = false;

export function setGlobalOptions(options: GlobalOptions): void {
  globalOptions = { ...options };
}

/**
 * Warn once when the host is not macOS; launchctl calls will report unknown status there.
 * Warnings go to stderr so `list --json` output stays parseable.
 */
export function warnIfNotMacOS(): void {
  if (platformWarningShown) {
    return;
  }
  platformWarningShown = true;

  const info = OSDetector.detect();
  if (!OSDetector.isMacOS()) {
    console.error(
      chalk.yellow(`\n⚠️  launchd is only available on macOS (detected ${OSDetector.getOSName(info)}).\n`)
    );
  }
}

/**
 * Configuration manager for the file selected by `--config`
 */
export function getConfigManager(): ConfigManager {
  return new ConfigManager(globalOptions.config);
}

/**
 * Load configuration and build an engine from it
 */
export async function loadEngine(overrides: EngineOverrides = {}): Promise<Engine> {
  const config = await getConfigManager().load();

  initLogger({
    level: globalOptions.verbose ? LogLevel.DEBUG : config.logging.level,
    logToFile: config.logging.logToFile,
    logToConsole: globalOptions.verbose === true,
  });

  return createEngine(config, overrides);
}

/**
 * Load the engine and scan every search root behind a spinner
 */
export async function loadScannedEngine(): Promise<Engine> {
  warnIfNotMacOS();
  const engine = await loadEngine();

  const spinner = ora("Scanning launchd definitions...").start();
  const result = await engine.session.refresh();
  spinner.succeed(engine.session.getStatusMessage());

  printScanWarnings(result.warnings);

  return engine;
}

export function printScanWarnings(warnings: readonly ScanWarning[]): void {
  for (const warning of warnings) {
    console.error(chalk.yellow(`⚠️  ${warning.error.message}`));
  }
}

/**
 * Resolve a command target: an exact definition path first, then an exact label.
 * A label shared by several definitions is ambiguous.
 */
export function resolveTarget(services: ServiceSet, target: string): Result<ServiceRecord, Error> {
  const asPath = path.resolve(expandHome(target));
  const byPath = services.find((record) => record.sourcePath === asPath);
  if (byPath) {
    return ok(byPath);
  }

  const byLabel = services.filter((record) => record.definition.label === target);
  if (byLabel.length === 1) {
    return ok(byLabel[0]);
  }
  if (byLabel.length > 1) {
    const candidates = byLabel.map((record) => `  ${record.sourcePath}`).join("\n");
    return fail(new Error(`Label '${target}' matches several definitions:\n${candidates}`));
  }

  return fail(new Error(`Service '${target}' not found`));
}
