/**
 * Reveal Command
 * Open the folder that contains a definition file
 */

import chalk from "chalk";
import { describeCause, logger } from "@launchboard/core";
import { loadScannedEngine, resolveTarget } from "../utils/context.js";
import { revealInFolder } from "../utils/open.js";

/**
 * Reveal command handler
 */
export async function revealCommand(target: string): Promise<void> {
  try {
    const { session } = await loadScannedEngine();
    const resolved = resolveTarget(session.getServices(), target);
    if (!resolved.success) {
      console.log(chalk.red(`\n❌ ${resolved.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    const result = await revealInFolder(resolved.data.sourcePath);
    if (!result.success) {
      console.log(chalk.red(`\n❌ ${result.error.message}\n`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.green(`\n✅ ${result.data}\n`));
  } catch (error) {
    logger.error("Failed to reveal definition", error);
    console.log(chalk.red(`\n❌ Failed to reveal definition: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
