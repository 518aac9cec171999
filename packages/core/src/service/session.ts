/**
 * Service Session
 * Explicit operator context: the current ServiceSet, the search query, the selected
 * definition and the status line. Every successful lifecycle operation re-scans.
 */

import path from "node:path";
import { logger } from "../utils/logger.js";
import type { Result } from "../types/common.js";
import { fail, ok } from "../types/common.js";
import { PermissionError } from "./errors.js";
import type { CreateError, LifecycleError } from "./errors.js";
import { ServiceFileManager, DEFAULT_TAIL_LINES } from "./file-manager.js";
import type { LogTail } from "./file-manager.js";
import { ServiceFilter } from "./filter.js";
import type { LifecycleController } from "./lifecycle.js";
import type { DirectoryScanner, ScanResult, ScanWarning } from "./scanner.js";
import type { LifecycleOperation, ServiceRecord, ServiceSet, TemplateKind } from "./types.js";

export interface ServiceSessionOptions {
  scanner: Pick<DirectoryScanner, "scan">;
  controller: Pick<LifecycleController, "start" | "stop" | "restart" | "create">;
  roots: readonly string[];
  filter?: ServiceFilter;
  logTailLines?: number;
}

export const NO_SELECTION = "No service selected";

const PAST_TENSE: Record<LifecycleOperation, string> = {
  start: "Started",
  stop: "Stopped",
  restart: "Restarted",
};

const CREATED_NAME: Record<TemplateKind, string> = {
  "user-agent": "agent",
  "system-daemon": "system daemon",
};

/**
 * Service Session class
 */
export class ServiceSession {
  private readonly scanner: Pick<DirectoryScanner, "scan">;
  private readonly controller: Pick<LifecycleController, "start" | "stop" | "restart" | "create">;
  private readonly roots: readonly string[];
  private readonly filter: ServiceFilter;
  private readonly logTailLines: number;

  private services: ServiceSet = [];
  private warnings: readonly ScanWarning[] = [];
  private selectedPath: string | null = null;
  private statusMessage = "Ready";

  constructor(options: ServiceSessionOptions) {
    this.scanner = options.scanner;
    this.controller = options.controller;
    this.roots = options.roots;
    this.filter = options.filter ?? new ServiceFilter();
    this.logTailLines = options.logTailLines ?? DEFAULT_TAIL_LINES;
  }

  public getServices(): ServiceSet {
    return this.services;
  }

  public getWarnings(): readonly ScanWarning[] {
    return this.warnings;
  }

  public getStatusMessage(): string {
    return this.statusMessage;
  }

  public getQuery(): string {
    return this.filter.getQuery();
  }

  /**
   * Records matching the current query
   */
  public visible(): ServiceSet {
    return this.filter.apply(this.services);
  }

  /**
   * Change the query and return the matching records
   */
  public search(query: string): ServiceSet {
    return this.filter.apply(this.services, query);
  }

  /**
   * Select a record by its definition path
   */
  public select(sourcePath: string): ServiceRecord | null {
    const record = this.find(sourcePath);
    this.selectedPath = record ? record.sourcePath : null;
    return record;
  }

  public selected(): ServiceRecord | null {
    return this.selectedPath ? this.find(this.selectedPath) : null;
  }

  public find(sourcePath: string): ServiceRecord | null {
    return this.services.find((record) => record.sourcePath === sourcePath) ?? null;
  }

  /**
   * Re-scan every root and replace the current set
   */
  public async refresh(): Promise<ScanResult> {
    const result = await this.rescan();
    const rootProblems = result.warnings.filter((warning) => warning.kind === "root");
    this.statusMessage =
      rootProblems.length > 0
        ? `Loaded ${result.services.length} services; ${rootProblems.map((warning) => warning.error.message).join("; ")}`
        : `Loaded ${result.services.length} services`;
    return result;
  }

  public async start(sourcePath?: string): Promise<Result<string, LifecycleError | Error>> {
    return this.runLifecycle("start", sourcePath);
  }

  public async stop(sourcePath?: string): Promise<Result<string, LifecycleError | Error>> {
    return this.runLifecycle("stop", sourcePath);
  }

  public async restart(sourcePath?: string): Promise<Result<string, LifecycleError | Error>> {
    return this.runLifecycle("restart", sourcePath);
  }

  /**
   * Create a new definition, re-scan, and select it
   */
  public async create(kind: TemplateKind): Promise<Result<string, CreateError | PermissionError>> {
    const result = await this.controller.create(kind);

    if (!result.success) {
      this.statusMessage =
        result.error instanceof PermissionError
          ? result.error.message
          : `Error creating ${CREATED_NAME[kind]}: ${result.error.message}`;
      return result;
    }

    await this.rescan();
    this.select(result.data);
    this.statusMessage = `Created new ${CREATED_NAME[kind]}: ${path.basename(result.data)}`;
    return result;
  }

  /**
   * Tail every log file the target declares
   */
  public async logs(sourcePath?: string, lines: number = this.logTailLines): Promise<Result<LogTail[], Error>> {
    const record = this.resolveTarget(sourcePath);
    if (!record) {
      return fail(new Error(NO_SELECTION));
    }

    const tails = await Promise.all(
      ServiceFileManager.declaredLogPaths(record.definition).map((logPath) =>
        ServiceFileManager.tailLog(logPath, lines)
      )
    );
    return ok(tails);
  }

  /**
   * Truncate the target's declared log files
   */
  public async clearLogs(sourcePath?: string): Promise<Result<string[], Error>> {
    const record = this.resolveTarget(sourcePath);
    if (!record) {
      this.statusMessage = NO_SELECTION;
      return fail(new Error(NO_SELECTION));
    }

    const result = await ServiceFileManager.clearLogs(record.definition);
    if (!result.success) {
      this.statusMessage = result.error.message;
    } else if (result.data.length === 0) {
      this.statusMessage = "No log files found to clear";
    } else {
      this.statusMessage = `Cleared logs: ${result.data.join(", ")}`;
    }
    return result;
  }

  private resolveTarget(sourcePath?: string): ServiceRecord | null {
    if (sourcePath) {
      return this.find(sourcePath);
    }
    return this.selected();
  }

  private async runLifecycle(
    op: LifecycleOperation,
    sourcePath?: string
  ): Promise<Result<string, LifecycleError | Error>> {
    const target = sourcePath ?? this.selectedPath;
    if (!target) {
      this.statusMessage = NO_SELECTION;
      return fail(new Error(NO_SELECTION));
    }

    const label = this.find(target)?.definition.label ?? target;
    const result = await this.controller[op](target);

    if (!result.success) {
      this.statusMessage = `Failed to ${op} ${label}: ${result.error.cause}`;
      return result;
    }

    await this.rescan();
    this.statusMessage = `${PAST_TENSE[op]} ${target}`;
    return result;
  }

  private async rescan(): Promise<ScanResult> {
    const result = await this.scanner.scan(this.roots);
    this.services = result.services;
    this.warnings = result.warnings;

    if (this.selectedPath && !this.find(this.selectedPath)) {
      logger.debug("Selected definition disappeared after scan", { path: this.selectedPath });
      this.selectedPath = null;
    }
    return result;
  }
}
