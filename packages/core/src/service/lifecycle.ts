/**
 * Lifecycle Controller
 * Starts, stops, restarts and creates launchd services.
 *
 * Callers must re-scan after any successful operation to observe the resulting
 * status; the controller never reports or caches one itself.
 */

import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { logger } from "../utils/logger.js";
import { runCommand, describeFailure } from "../utils/exec.js";
import type { CommandRunner } from "../utils/exec.js";
import { CreateError, LifecycleError, PermissionError } from "./errors.js";
import { ServiceFileManager } from "./file-manager.js";
import type { Result } from "../types/common.js";
import { fail, ok } from "../types/common.js";
import type { TemplateKind } from "./types.js";

export interface LifecycleControllerOptions {
  /** Directory for new user agents; created when absent */
  userAgentsDir: string;
  /** Directory for new system daemons; never created */
  systemDaemonsDir: string;
  launchctlPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  /** Source of the random part of generated labels */
  generateId?: () => string;
}

const DOMAIN = "system";

/**
 * Lifecycle Controller class
 */
export class LifecycleController {
  private readonly launchctlPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly userAgentsDir: string;
  private readonly systemDaemonsDir: string;
  private readonly generateId: () => string;

  constructor(options: LifecycleControllerOptions) {
    this.launchctlPath = options.launchctlPath ?? "launchctl";
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.runner = options.runner ?? runCommand;
    this.userAgentsDir = options.userAgentsDir;
    this.systemDaemonsDir = options.systemDaemonsDir;
    this.generateId = options.generateId ?? ServiceFileManager.generateId;
  }

  /**
   * Bootstrap a definition into the system domain
   */
  public async start(sourcePath: string): Promise<Result<string, LifecycleError>> {
    logger.info("Starting service", { path: sourcePath });
    return this.invoke("start", "bootstrap", sourcePath);
  }

  /**
   * Boot a definition out of the system domain
   */
  public async stop(sourcePath: string): Promise<Result<string, LifecycleError>> {
    logger.info("Stopping service", { path: sourcePath });
    return this.invoke("stop", "bootout", sourcePath);
  }

  /**
   * Stop, then start. A failed stop aborts the sequence and is returned as is;
   * start is never attempted against a possibly stale registration.
   */
  public async restart(sourcePath: string): Promise<Result<string, LifecycleError>> {
    logger.info("Restarting service", { path: sourcePath });

    const stopped = await this.stop(sourcePath);
    if (!stopped.success) {
      logger.warn("Restart aborted because stop failed", { path: sourcePath });
      return stopped;
    }

    return this.start(sourcePath);
  }

  /**
   * Write a new minimal definition and return its path
   */
  public async create(kind: TemplateKind): Promise<Result<string, CreateError | PermissionError>> {
    const id = this.generateId();
    const label = ServiceFileManager.templateLabel(kind, id);
    const directory = kind === "user-agent" ? this.userAgentsDir : this.systemDaemonsDir;
    const filePath = path.join(directory, `${label}.plist`);

    if (kind === "user-agent") {
      try {
        await fs.mkdir(directory, { recursive: true });
      } catch (error) {
        logger.error("Failed to create user agents directory", { directory, error });
        return fail(new CreateError(filePath, error));
      }
    } else {
      try {
        await fs.access(directory, fsConstants.W_OK);
      } catch {
        logger.warn("System daemons directory is not writable", { directory });
        return fail(new PermissionError(directory));
      }
    }

    const result = await ServiceFileManager.writeDefinition(filePath, ServiceFileManager.buildTemplate(kind, id));
    if (result.success) {
      logger.info("Created definition", { kind, label, path: filePath });
    }
    return result;
  }

  private async invoke(
    op: "start" | "stop",
    verb: "bootstrap" | "bootout",
    sourcePath: string
  ): Promise<Result<string, LifecycleError>> {
    const result = await this.runner(this.launchctlPath, [verb, DOMAIN, sourcePath], { timeoutMs: this.timeoutMs });

    if (!result.success) {
      const error = new LifecycleError(
        op,
        sourcePath,
        describeFailure(result, this.timeoutMs),
        result.timedOut ? undefined : result.code
      );
      logger.error(`Failed to ${op} service`, { path: sourcePath, cause: error.cause });
      return fail(error);
    }

    logger.info(`Service ${op === "start" ? "started" : "stopped"} successfully`, { path: sourcePath });
    return ok(sourcePath);
  }
}
