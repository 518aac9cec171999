/**
 * List Command
 * Scan every search root and print the discovered services
 */

import chalk from "chalk";
import { describeCause, logger } from "@launchboard/core";
import { loadScannedEngine } from "../utils/context.js";
import { formatTable } from "../utils/format.js";

interface ListOptions {
  search?: string;
  json?: boolean;
}

/**
 * List command handler
 */
export async function listCommand(options: ListOptions): Promise<void> {
  try {
    const { session } = await loadScannedEngine();
    const services = session.search(options.search ?? "");

    if (options.json) {
      const rows = services.map((record) => ({
        label: record.definition.label,
        sourcePath: record.sourcePath,
        programPath: record.definition.programPath,
        status: record.status,
      }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (services.length === 0) {
      console.log(chalk.yellow("\n⚠️  No services found.\n"));
      return;
    }

    const [header, ...rows] = formatTable(services, { colored: true });
    console.log(chalk.bold.cyan(`\n📋 launchd services (${services.length})\n`));
    console.log(chalk.bold(header));
    console.log(chalk.gray("─".repeat(Math.min(header.length, 100))));

    for (const row of rows) {
      console.log(row);
    }
    console.log();
  } catch (error) {
    logger.error("Failed to list services", error);
    console.log(chalk.red(`\n❌ Failed to list services: ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
