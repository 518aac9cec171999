/**
 * Service File Manager
 * Generates new definition files and reads or truncates the log files a definition declares
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import plist from "plist";
import { logger } from "../utils/logger.js";
import { CreateError, describeCause, errnoCode } from "./errors.js";
import type { Result } from "../types/common.js";
import { fail, ok } from "../types/common.js";
import type { ServiceDefinition, TemplateKind } from "./types.js";

/**
 * Keys of a freshly generated definition
 */
export type DefinitionTemplate = Record<string, string | boolean | string[]>;

/**
 * Outcome of reading the tail of one log file
 */
export interface LogTail {
  path: string;
  state: "ok" | "missing" | "denied" | "error";
  lines: string[];
  /** True when older lines were dropped */
  truncated: boolean;
  message?: string;
}

export const DEFAULT_TAIL_LINES = 50;

const TEMPLATE_PREFIX: Record<TemplateKind, string> = {
  "user-agent": "com.user.agent",
  "system-daemon": "com.system.daemon",
};

/**
 * Service File Manager class
 */
export class ServiceFileManager {
  /**
   * Label for a new definition; `id` is a short random identifier
   */
  public static templateLabel(kind: TemplateKind, id: string): string {
    return `${TEMPLATE_PREFIX[kind]}.${id}`;
  }

  /**
   * Short random identifier used in generated labels
   */
  public static generateId(): string {
    return randomUUID().slice(0, 8);
  }

  /**
   * Minimal definition for a new agent or daemon
   */
  public static buildTemplate(kind: TemplateKind, id: string): DefinitionTemplate {
    const label = ServiceFileManager.templateLabel(kind, id);

    if (kind === "user-agent") {
      return {
        Label: label,
        ProgramArguments: ["/bin/bash", "-c", "echo 'Hello from agent'"],
        RunAtLoad: false,
        KeepAlive: false,
        StandardOutPath: `/tmp/${label}.out`,
        StandardErrorPath: `/tmp/${label}.err`,
      };
    }

    return {
      Label: label,
      ProgramArguments: ["/bin/bash", "-c", "echo 'Hello from system daemon'"],
      RunAtLoad: false,
      KeepAlive: false,
      StandardOutPath: `/var/log/${label}.out`,
      StandardErrorPath: `/var/log/${label}.err`,
      UserName: "root",
      GroupName: "wheel",
    };
  }

  /**
   * Serialize a template as an XML property list
   */
  public static serialize(template: DefinitionTemplate): string {
    return plist.build(template);
  }

  /**
   * Write a definition through a temporary sibling and rename it into place,
   * so a failed write never leaves a partial file behind.
   */
  public static async writeDefinition(
    filePath: string,
    template: DefinitionTemplate
  ): Promise<Result<string, CreateError>> {
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);

    try {
      const content = ServiceFileManager.serialize(template);
      await fs.writeFile(tempPath, content, { encoding: "utf-8", flag: "wx" });
      await fs.rename(tempPath, filePath);
      logger.info("Definition file written", { path: filePath });
      return ok(filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn("Failed to remove temporary definition file", { path: tempPath, error: describeCause(cleanupError) });
      });
      logger.error("Failed to write definition file", { path: filePath, error: describeCause(error) });
      return fail(new CreateError(filePath, error));
    }
  }

  /**
   * Read the last `lines` lines of a log file
   */
  public static async tailLog(filePath: string, lines: number = DEFAULT_TAIL_LINES): Promise<LogTail> {
    try {
      const content = await fs.readFile(filePath, "utf-8");
      const all = content.split("\n");
      if (all.length > 0 && all[all.length - 1] === "") {
        all.pop();
      }

      const truncated = all.length > lines;
      return {
        path: filePath,
        state: "ok",
        lines: truncated ? all.slice(all.length - lines) : all,
        truncated,
      };
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT") {
        return { path: filePath, state: "missing", lines: [], truncated: false, message: `File not found: ${filePath}` };
      }
      if (code === "EACCES" || code === "EPERM") {
        return {
          path: filePath,
          state: "denied",
          lines: [],
          truncated: false,
          message: `Permission denied accessing: ${filePath}`,
        };
      }
      return {
        path: filePath,
        state: "error",
        lines: [],
        truncated: false,
        message: `Error reading ${filePath}: ${describeCause(error)}`,
      };
    }
  }

  /**
   * Log files declared by a definition, stdout first, without duplicates
   */
  public static declaredLogPaths(definition: ServiceDefinition): string[] {
    const paths: string[] = [];
    for (const candidate of [definition.standardOutPath, definition.standardErrorPath]) {
      if (candidate && !paths.includes(candidate)) {
        paths.push(candidate);
      }
    }
    return paths;
  }

  /**
   * Truncate every declared log file that exists; returns the cleared paths
   */
  public static async clearLogs(definition: ServiceDefinition): Promise<Result<string[], Error>> {
    const cleared: string[] = [];

    for (const logPath of ServiceFileManager.declaredLogPaths(definition)) {
      try {
        await fs.truncate(logPath, 0);
        cleared.push(logPath);
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT") {
          continue;
        }
        logger.error("Failed to clear log file", { path: logPath, error: describeCause(error) });
        if (code === "EACCES" || code === "EPERM") {
          return fail(new Error("Permission denied clearing log files"));
        }
        return fail(new Error(`Error clearing logs: ${describeCause(error)}`));
      }
    }

    if (cleared.length > 0) {
      logger.info("Cleared log files", { label: definition.label, paths: cleared });
    }
    return ok(cleared);
  }
}
