/**
 * Command execution
 * Runs external utilities with a bounded timeout and never throws
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "./logger.js";
import type { ExecutionResult } from "../types/common.js";

const execFileAsync = promisify(execFile);

/**
 * Options for a single command invocation
 */
export interface RunOptions {
  timeoutMs: number;
}

/**
 * Runs one external command. Components receive this so tests can swap in fakes.
 */
export type CommandRunner = (file: string, args: readonly string[], options: RunOptions) => Promise<ExecutionResult>;

/**
 * Exit code reported when the executable could not be found
 */
export const COMMAND_NOT_FOUND = 127;

interface ExecFailure {
  code?: number | string;
  killed: boolean;
  signal?: string;
  stdout: string;
  stderr: string;
  message: string;
}

const toText = (value: unknown): string => (typeof value === "string" ? value : "");

/**
 * Read the fields execFile attaches to its rejection
 */
const readFailure = (error: unknown): ExecFailure => {
  if (typeof error !== "object" || error === null) {
    return { killed: false, stdout: "", stderr: "", message: String(error) };
  }

  const code =
    "code" in error && (typeof error.code === "number" || typeof error.code === "string") ? error.code : undefined;
  const signal = "signal" in error && typeof error.signal === "string" ? error.signal : undefined;
  return {
    code,
    killed: "killed" in error && error.killed === true,
    signal,
    stdout: "stdout" in error ? toText(error.stdout) : "",
    stderr: "stderr" in error ? toText(error.stderr) : "",
    message: error instanceof Error ? error.message : String(error),
  };
};

/**
 * Default runner backed by child_process.execFile
 */
export const runCommand: CommandRunner = async (file, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      timeout: options.timeoutMs,
      killSignal: "SIGKILL",
      encoding: "utf8",
    });
    return { stdout, stderr, code: 0, success: true, timedOut: false };
  } catch (error) {
    const failure = readFailure(error);
    const timedOut = failure.killed && failure.signal !== undefined;
    let code = 1;
    if (typeof failure.code === "number") {
      code = failure.code;
    } else if (failure.code === "ENOENT") {
      code = COMMAND_NOT_FOUND;
    }

    const stderr = failure.stderr.trim();
    logger.debug("Command failed", { file, args, code, timedOut });

    return {
      stdout: failure.stdout,
      stderr: stderr.length > 0 ? stderr : failure.message,
      code,
      success: false,
      timedOut,
    };
  }
};

/**
 * Human-readable diagnostic for a failed execution
 */
export const describeFailure = (result: ExecutionResult, timeoutMs: number): string => {
  if (result.timedOut) {
    return `timed out after ${timeoutMs}ms`;
  }
  const detail = result.stderr.trim() || result.stdout.trim();
  return detail.length > 0 ? `exit code ${result.code}: ${detail}` : `exit code ${result.code}`;
};
