/**
 * Logs Command
 * Show or clear the log files a service declares
 */

import chalk from "chalk";
import { describeCause, logger } from "@launchboard/core";
import type { LogTail, ServiceDefinition } from "@launchboard/core";
import { loadScannedEngine, resolveTarget } from "../utils/context.js";
import { formatLogTail } from "../utils/format.js";

interface LogsOptions {
  lines?: string;
  clear?: boolean;
}

const headingFor = (definition: ServiceDefinition, logPath: string): string => {
  if (definition.standardOutPath === logPath && definition.standardErrorPath === logPath) {
    return "Output and errors";
  }
  return definition.standardOutPath === logPath ? "Standard output" : "Standard error";
};

/**
 * Print the tails returned for one service
 */
export function printLogTails(tails: LogTail[], definition: ServiceDefinition): void {
  console.log(chalk.bold.cyan(`\n📋 Logs: ${definition.label}\n`));
  if (tails.length === 0) {
    console.log(chalk.yellow("No log files declared for this service.\n"));
    return;
  }

  for (const tail of tails) {
    console.log(chalk.gray("─".repeat(80)));
    const [title, ...body] = formatLogTail(tail, headingFor(definition, tail.path));
    console.log(chalk.bold(title));
    for (const line of body) {
      console.log(tail.state === "ok" ? line : chalk.yellow(line));
    }
  }
  console.log(chalk.gray("─".repeat(80) + "\n"));
}

/**
 * Logs command handler
 */
export async function logsCommand(target: string, options: LogsOptions): Promise<void> {
  try {
    const lines = options.lines === undefined ? undefined : parseInt(options.lines, 10);
    if (lines !== undefined && (!Number.isInteger(lines) || lines <= 0)) {
      console.log(chalk.red("\n❌ --lines must be a positive integer\n"));
      process.exitCode = 1;
      return;
    }

    const { session } = await loadScannedEngine();
    const resolved = resolveTarget(session.getServices(), target);
    if (!resolved.success) {
      console.log(chalk.red(`\n❌ ${resolved.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    const record = resolved.data;

    if (options.clear) {
      const cleared = await session.clearLogs(record.sourcePath);
      if (!cleared.success) {
        console.log(chalk.red(`\n❌ ${session.getStatusMessage()}\n`));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(`\n✅ ${session.getStatusMessage()}\n`));
      return;
    }

    const result = await session.logs(record.sourcePath, lines);
    if (!result.success) {
      console.log(chalk.red(`\n❌ ${result.error.message}\n`));
      process.exitCode = 1;
      return;
    }

    printLogTails(result.data, record.definition);
  } catch (error) {
    logger.error("Failed to get logs", error);
    console.log(chalk.red(`\n❌ Failed to get logs: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
