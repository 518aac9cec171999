/**
 * Shared flow for start, stop and restart
 */

import chalk from "chalk";
import ora from "ora";
import { describeCause, logger } from "@launchboard/core";
import type { LifecycleOperation } from "@launchboard/core";
import { loadScannedEngine, resolveTarget } from "./context.js";
import { colorStatus } from "./format.js";

export const PROGRESS: Record<LifecycleOperation, string> = {
  start: "Starting",
  stop: "Stopping",
  restart: "Restarting",
};

/**
 * Resolve the target, run the operation behind a spinner and print the re-scanned status
 */
export async function runLifecycleCommand(op: LifecycleOperation, target: string): Promise<void> {
  try {
    const { session } = await loadScannedEngine();
    const resolved = resolveTarget(session.getServices(), target);
    if (!resolved.success) {
      console.log(chalk.red(`\n❌ ${resolved.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    const { sourcePath, definition } = resolved.data;
    const spinner = ora(`${PROGRESS[op]} ${definition.label}...`).start();
    const result = await session[op](sourcePath);

    if (!result.success) {
      spinner.fail(session.getStatusMessage());
      process.exitCode = 1;
      return;
    }

    spinner.succeed(session.getStatusMessage());
    const refreshed = session.find(sourcePath);
    if (refreshed) {
      console.log(chalk.gray(`Status: `) + colorStatus(refreshed.status));
    }
  } catch (error) {
    logger.error(`Failed to ${op} service`, error);
    console.log(chalk.red(`\n❌ Failed to ${op} service: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
