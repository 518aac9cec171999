import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import plist from "plist";
import { vi } from "vitest";
import type { ExecutionResult } from "../src/types/common.js";
import type { RunOptions } from "../src/utils/exec.js";
import { toServiceDefinition } from "../src/service/parser.js";
import { toServiceRecord } from "../src/service/scanner.js";
import type { RuntimeStatus, ServiceRecord } from "../src/service/types.js";

export const succeeded = (stdout = ""): ExecutionResult => ({
  stdout,
  stderr: "",
  code: 0,
  success: true,
  timedOut: false,
});

export const failed = (code: number, stderr = ""): ExecutionResult => ({
  stdout: "",
  stderr,
  code,
  success: false,
  timedOut: false,
});

export const timedOut = (): ExecutionResult => ({
  stdout: "",
  stderr: "",
  code: 1,
  success: false,
  timedOut: true,
});

/**
 * Output of `launchctl list <label>` as the prober reads it
 */
export const listOutput = (label: string, pid: number | "-"): string => `PID\tStatus\tLabel\n${pid}\t0\t${label}\n`;

/**
 * Runner fake whose answers come from `respond`
 */
export const fakeRunner = (respond: (file: string, args: readonly string[]) => ExecutionResult = () => succeeded()) =>
  vi.fn(async (file: string, args: readonly string[], _options: RunOptions): Promise<ExecutionResult> =>
    respond(file, args)
  );

export const makeTempDir = (prefix = "launchboard-test-"): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });

/**
 * Write an XML property list into `dir` and return its path
 */
export const writePlist = async (
  dir: string,
  fileName: string,
  content: Record<string, string | boolean | string[] | Record<string, boolean>>
): Promise<string> => {
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, plist.build(content), "utf-8");
  return filePath;
};

/**
 * Record built the way the scanner builds one
 */
export const makeRecord = (
  label: string,
  programArguments: string[] = [],
  status: RuntimeStatus = { state: "stopped" },
  sourcePath = `/tmp/launchboard-fixtures/${label}.plist`
): ServiceRecord =>
  toServiceRecord(
    toServiceDefinition({ Label: label, ProgramArguments: programArguments }, sourcePath),
    status,
    sourcePath
  );
