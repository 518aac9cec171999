#!/usr/bin/env node

/**
 * launchboard CLI
 * Main entry point
 */

import { Command } from "commander";
import { logger } from "@launchboard/core";
import { setGlobalOptions } from "./utils/context.js";
import type { GlobalOptions } from "./utils/context.js";
import { listCommand } from "./commands/list.js";
import { showCommand } from "./commands/show.js";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { restartCommand } from "./commands/restart.js";
import { createCommand } from "./commands/create.js";
import { logsCommand } from "./commands/logs.js";
import { editCommand } from "./commands/edit.js";
import { revealCommand } from "./commands/reveal.js";
import { configCommand } from "./commands/config.js";
import { interactiveCommand } from "./commands/interactive.js";

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name("launchboard")
  .description("Browse, search and control launchd agents and daemons")
  .version("1.0.0")
  .option("-c, --config <path>", "Use a specific configuration file")
  .option("--verbose", "Print debug logs to the console")
  .hook("preAction", (thisCommand) => {
    setGlobalOptions(thisCommand.opts<GlobalOptions>());
  });

/**
 * Interactive command - default when no command is given
 */
program
  .command("interactive", { isDefault: true })
  .description("Search, select and control services from a menu")
  .action(interactiveCommand);

/**
 * List command - Scan and list services
 */
program
  .command("list")
  .description("List discovered services with their live status")
  .option("-s, --search <query>", "Only show services whose label or program contains the query")
  .option("--json", "Print machine-readable JSON")
  .action(listCommand)
  .addHelpText("after", `
Examples:
  $ launchboard list
  $ launchboard list --search homebrew
  $ launchboard list --json
  `);

/**
 * Show command - Details of one service
 */
program
  .command("show <target>")
  .description("Show the details of a service (label or definition path)")
  .action(showCommand);

/**
 * Start command - Bootstrap a service
 */
program
  .command("start <target>")
  .description("Start a service (launchctl bootstrap)")
  .action(startCommand);

/**
 * Stop command - Boot out a service
 */
program
  .command("stop <target>")
  .description("Stop a service (launchctl bootout)")
  .action(stopCommand);

/**
 * Restart command - Stop then start a service
 */
program
  .command("restart <target>")
  .description("Restart a service; nothing is started when the stop fails")
  .action(restartCommand);

/**
 * Create command - Write a new definition
 */
program
  .command("create")
  .description("Create a new user agent definition")
  .option("-d, --daemon", "Create a system daemon instead (requires sudo)")
  .action(createCommand)
  .addHelpText("after", `
Examples:
  $ launchboard create
  $ sudo launchboard create --daemon

User agents are written to ~/Library/LaunchAgents, system daemons to /Library/LaunchDaemons.
  `);

/**
 * Logs command - Show or clear declared log files
 */
program
  .command("logs <target>")
  .description("Show the last lines of a service's log files")
  .option("-n, --lines <number>", "Number of lines to show")
  .option("--clear", "Truncate the log files instead")
  .action(logsCommand);

/**
 * Edit command - Open a definition in a text editor
 */
program
  .command("edit <target>")
  .description("Open a service definition in the default text editor")
  .action(editCommand);

/**
 * Reveal command - Open the containing folder
 */
program
  .command("reveal <target>")
  .description("Open the folder that contains a service definition")
  .action(revealCommand);

/**
 * Config command - Manage configuration
 */
program
  .command("config")
  .description("Manage launchboard configuration")
  .option("--show", "Show current configuration")
  .option("--get <key>", "Get a configuration value")
  .option("--set <key=value>", "Set a configuration value")
  .option("--reset", "Reset configuration to defaults")
  .action(configCommand)
  .addHelpText("after", `
Examples:
  $ launchboard config --show
  $ launchboard config --get searchRoots
  $ launchboard config --set searchRoots=~/Library/LaunchAgents,/Library/LaunchDaemons
  $ launchboard config --set logging.level=debug
  `);

/**
 * Parse and execute commands
 */
async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error("CLI error", error);
    process.exit(1);
  }
}

void main();

export { program };
