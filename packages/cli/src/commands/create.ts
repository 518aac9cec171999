/**
 * Create Command
 * Write a new minimal user agent or system daemon definition
 */

import chalk from "chalk";
import ora from "ora";
import { describeCause, logger } from "@launchboard/core";
import type { TemplateKind } from "@launchboard/core";
import { loadEngine, warnIfNotMacOS } from "../utils/context.js";

interface CreateOptions {
  daemon?: boolean;
}

/**
 * Create command handler
 */
export async function createCommand(options: CreateOptions): Promise<void> {
  try {
    warnIfNotMacOS();
    const { session } = await loadEngine();
    const kind: TemplateKind = options.daemon ? "system-daemon" : "user-agent";

    const spinner = ora(`Creating ${options.daemon ? "system daemon" : "user agent"}...`).start();
    const result = await session.create(kind);

    if (!result.success) {
      spinner.fail(session.getStatusMessage());
      if (kind === "system-daemon") {
        console.log(chalk.yellow("Run the command again with sudo to write system daemons."));
      }
      process.exitCode = 1;
      return;
    }

    spinner.succeed(session.getStatusMessage());
    console.log(chalk.gray(`Path: ${result.data}`));
    console.log(chalk.gray(`Edit it with: launchboard edit ${result.data}\n`));
  } catch (error) {
    logger.error("Failed to create definition", error);
    console.log(chalk.red(`\n❌ Failed to create definition: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
