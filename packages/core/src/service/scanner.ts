/**
 * Directory Scanner
 * Walks the search roots and reconciles every definition with its live status.
 * This is the only place ServiceRecords are built.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";
import { ParseError, ScanRootError, errnoCode } from "./errors.js";
import { parseDefinition } from "./parser.js";
import type { Result } from "../types/common.js";
import type { RuntimeStatus, ServiceDefinition, ServiceRecord, ServiceSet } from "./types.js";

/**
 * Anything that can report the live status of a label
 */
export interface StatusSource {
  probe(label: string): Promise<RuntimeStatus>;
}

export type DefinitionParser = (filePath: string) => Promise<Result<ServiceDefinition, ParseError>>;

/**
 * Non-fatal problem met during a scan
 */
export type ScanWarning =
  | { readonly kind: "root"; readonly path: string; readonly error: ScanRootError }
  | { readonly kind: "file"; readonly path: string; readonly error: ParseError };

export interface ScanResult {
  readonly services: ServiceSet;
  readonly warnings: readonly ScanWarning[];
}

export interface DirectoryScannerOptions {
  prober: StatusSource;
  extension?: string;
  excludedPrefix?: string;
  parser?: DefinitionParser;
}

/**
 * Merge a declared definition with its observed status
 */
export const toServiceRecord = (
  definition: ServiceDefinition,
  status: RuntimeStatus,
  sourcePath: string
): ServiceRecord => Object.freeze({ definition, sourcePath, status: Object.freeze({ ...status }) });

type CandidateOutcome =
  | { kind: "record"; record: ServiceRecord }
  | { kind: "warning"; warning: ScanWarning };

/**
 * Directory Scanner class
 */
export class DirectoryScanner {
  private readonly prober: StatusSource;
  private readonly extension: string;
  private readonly excludedPrefix: string;
  private readonly parser: DefinitionParser;

  constructor(options: DirectoryScannerOptions) {
    this.prober = options.prober;
    this.extension = options.extension ?? ".plist";
    this.excludedPrefix = options.excludedPrefix ?? "com.apple";
    this.parser = options.parser ?? parseDefinition;
  }

  /**
   * Whether a directory entry is a manageable definition file
   */
  public isCandidate(fileName: string): boolean {
    return fileName.endsWith(this.extension) && !fileName.startsWith(this.excludedPrefix);
  }

  /**
   * Scan every root in order and build a fresh ServiceSet.
   * Within a root, definitions are listed sorted by file name rather than in the
   * order the directory listing returns them.
   */
  public async scan(roots: readonly string[]): Promise<ScanResult> {
    const services: ServiceRecord[] = [];
    const warnings: ScanWarning[] = [];
    const seen = new Set<string>();

    for (const root of roots) {
      let entries: string[];
      try {
        entries = await fs.readdir(root);
      } catch (error) {
        if (errnoCode(error) === "ENOENT") {
          logger.debug("Search root does not exist, skipping", { root });
          continue;
        }
        const rootError = new ScanRootError(root, error);
        logger.warn(rootError.message, { root });
        warnings.push({ kind: "root", path: root, error: rootError });
        continue;
      }

      const candidates = entries.filter((entry) => this.isCandidate(entry)).sort();
      const outcomes = await Promise.all(
        candidates.map((entry) => this.reconcile(path.resolve(root, entry)))
      );

      for (const outcome of outcomes) {
        if (outcome.kind === "warning") {
          warnings.push(outcome.warning);
          continue;
        }
        if (seen.has(outcome.record.sourcePath)) {
          continue;
        }
        seen.add(outcome.record.sourcePath);
        services.push(outcome.record);
      }
    }

    logger.debug("Scan finished", { roots: roots.length, services: services.length, warnings: warnings.length });

    return {
      services: Object.freeze(services),
      warnings: Object.freeze(warnings),
    };
  }

  private async reconcile(sourcePath: string): Promise<CandidateOutcome> {
    const parsed = await this.parser(sourcePath);
    if (!parsed.success) {
      logger.warn(parsed.error.message, { path: sourcePath });
      return { kind: "warning", warning: { kind: "file", path: sourcePath, error: parsed.error } };
    }

    const status = await this.prober.probe(parsed.data.label);
    return { kind: "record", record: toServiceRecord(parsed.data, status, sourcePath) };
  }
}
