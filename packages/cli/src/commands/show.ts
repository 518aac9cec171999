/**
 * Show Command
 * Print the details of one service
 */

import chalk from "chalk";
import { describeCause, logger } from "@launchboard/core";
import { loadScannedEngine, resolveTarget } from "../utils/context.js";
import { colorStatus, formatDetails } from "../utils/format.js";

/**
 * Show command handler
 */
export async function showCommand(target: string): Promise<void> {
  try {
    const { session } = await loadScannedEngine();
    const resolved = resolveTarget(session.getServices(), target);
    if (!resolved.success) {
      console.log(chalk.red(`\n❌ ${resolved.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    const record = resolved.data;
    console.log(chalk.bold.cyan(`\n🔎 ${record.definition.label}\n`));
    console.log(chalk.gray("─".repeat(50)));
    for (const line of formatDetails(record)) {
      console.log(line.startsWith("Status:") ? `Status:            ${colorStatus(record.status)}` : line);
    }
    console.log(chalk.gray("─".repeat(50) + "\n"));
  } catch (error) {
    logger.error("Failed to show service", error);
    console.log(chalk.red(`\n❌ Failed to show service: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
