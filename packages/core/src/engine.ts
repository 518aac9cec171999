/**
 * Engine wiring
 * Builds the prober, scanner, controller and session from one configuration
 */

import { resolveConfigPaths } from "./config/manager.js";
import type { LaunchboardConfig } from "./config/types.js";
import type { CommandRunner } from "./utils/exec.js";
import { StatusProber } from "./service/prober.js";
import { DirectoryScanner } from "./service/scanner.js";
import { LifecycleController } from "./service/lifecycle.js";
import { ServiceFilter } from "./service/filter.js";
import { ServiceSession } from "./service/session.js";

export interface Engine {
  config: LaunchboardConfig;
  prober: StatusProber;
  scanner: DirectoryScanner;
  controller: LifecycleController;
  session: ServiceSession;
}

export interface EngineOverrides {
  runner?: CommandRunner;
  generateId?: () => string;
}

/**
 * Create a fully wired engine. Paths in the configuration may start with `~`.
 */
export const createEngine = (config: LaunchboardConfig, overrides: EngineOverrides = {}): Engine => {
  const resolved = resolveConfigPaths(config);

  const prober = new StatusProber({
    launchctlPath: resolved.launchctlPath,
    timeoutMs: resolved.probeTimeoutMs,
    runner: overrides.runner,
  });

  const scanner = new DirectoryScanner({
    prober,
    extension: resolved.definitionExtension,
    excludedPrefix: resolved.excludedPrefix,
  });

  const controller = new LifecycleController({
    launchctlPath: resolved.launchctlPath,
    timeoutMs: resolved.lifecycleTimeoutMs,
    runner: overrides.runner,
    userAgentsDir: resolved.userAgentsDir,
    systemDaemonsDir: resolved.systemDaemonsDir,
    generateId: overrides.generateId,
  });

  const session = new ServiceSession({
    scanner,
    controller,
    roots: resolved.searchRoots,
    filter: new ServiceFilter({ matchProgramPath: resolved.matchProgramPath }),
    logTailLines: resolved.logTailLines,
  });

  return { config: resolved, prober, scanner, controller, session };
};
