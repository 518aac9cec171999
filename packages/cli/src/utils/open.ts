/**
 * Hand files and folders to the macOS `open` utility
 */

import path from "node:path";
import { describeFailure, fail, ok, runCommand } from "@launchboard/core";
import type { CommandRunner, Result } from "@launchboard/core";

export const OPEN_TIMEOUT_MS = 5000;

/**
 * Open a definition in the default text editor (`open -t`)
 */
export async function openInEditor(
  filePath: string,
  runner: CommandRunner = runCommand
): Promise<Result<string, Error>> {
  const result = await runner("open", ["-t", filePath], { timeoutMs: OPEN_TIMEOUT_MS });
  if (!result.success) {
    return fail(new Error(`Failed to open ${filePath}: ${describeFailure(result, OPEN_TIMEOUT_MS)}`));
  }
  return ok(`Opened ${filePath} in text editor`);
}

/**
 * Show the folder containing a definition
 */
export async function revealInFolder(
  filePath: string,
  runner: CommandRunner = runCommand
): Promise<Result<string, Error>> {
  const directory = path.dirname(filePath);
  const result = await runner("open", [directory], { timeoutMs: OPEN_TIMEOUT_MS });
  if (!result.success) {
    return fail(new Error(`Failed to open folder ${directory}: ${describeFailure(result, OPEN_TIMEOUT_MS)}`));
  }
  return ok(`Opened folder: ${directory}`);
}
