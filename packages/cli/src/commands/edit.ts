/**
 * Edit Command
 * Open a definition file in the default text editor
 */

import chalk from "chalk";
import { describeCause, logger } from "@launchboard/core";
import { loadScannedEngine, resolveTarget } from "../utils/context.js";
import { openInEditor } from "../utils/open.js";

/**
 * Edit command handler
 */
export async function editCommand(target: string): Promise<void> {
  try {
    const { session } = await loadScannedEngine();
    const resolved = resolveTarget(session.getServices(), target);
    if (!resolved.success) {
      console.log(chalk.red(`\n❌ ${resolved.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    const result = await openInEditor(resolved.data.sourcePath);
    if (!result.success) {
      console.log(chalk.red(`\n❌ ${result.error.message}\n`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.green(`\n✅ ${result.data}\n`));
  } catch (error) {
    logger.error("Failed to open definition", error);
    console.log(chalk.red(`\n❌ Failed to open definition: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
