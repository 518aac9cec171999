/**
 * Interactive Command
 * Menu-driven session: search, pick a service, act on it
 */

import chalk from "chalk";
import inquirer from "inquirer";
import ora from "ora";
import { describeCause, logger } from "@launchboard/core";
import type { LifecycleOperation, ServiceRecord, ServiceSession, TemplateKind } from "@launchboard/core";
import { loadScannedEngine } from "../utils/context.js";
import { colorStatus, formatDetails } from "../utils/format.js";
import { PROGRESS } from "../utils/lifecycle.js";
import { openInEditor, revealInFolder } from "../utils/open.js";
import { printLogTails } from "./logs.js";

type MainAction = "choose" | "search" | "refresh" | "create-agent" | "create-daemon" | "quit";
type ServiceAction = LifecycleOperation | "logs" | "clear-logs" | "edit" | "reveal" | "back";

const printStatusLine = (session: ServiceSession): void => {
  const query = session.getQuery();
  const filter = query.length > 0 ? chalk.gray(` | search: "${query}"`) : "";
  console.log(chalk.gray("─".repeat(50)));
  console.log(`${chalk.bold("Status:")} ${session.getStatusMessage()}${filter}`);
};

const serviceChoiceName = (record: ServiceRecord): string =>
  `${record.definition.label}  ${colorStatus(record.status)}`;

async function chooseService(session: ServiceSession): Promise<ServiceRecord | null> {
  const visible = session.visible();
  if (visible.length === 0) {
    console.log(chalk.yellow("\n⚠️  No services match the current search.\n"));
    return null;
  }

  const { sourcePath } = await inquirer.prompt<{ sourcePath: string }>([
    {
      type: "list",
      name: "sourcePath",
      message: `Select a service (${visible.length}):`,
      pageSize: 20,
      choices: [
        ...visible.map((record) => ({ name: serviceChoiceName(record), value: record.sourcePath })),
        new inquirer.Separator(),
        { name: "← Back", value: "" },
      ],
    },
  ]);

  return sourcePath ? session.select(sourcePath) : null;
}

async function runLifecycle(session: ServiceSession, op: LifecycleOperation): Promise<void> {
  const spinner = ora(`${PROGRESS[op]} ${session.selected()?.definition.label ?? ""}...`).start();
  const result = await session[op]();
  if (result.success) {
    spinner.succeed(session.getStatusMessage());
  } else {
    spinner.fail(session.getStatusMessage());
  }
}

async function showLogs(session: ServiceSession, record: ServiceRecord): Promise<void> {
  const result = await session.logs();
  if (!result.success) {
    console.log(chalk.red(`\n❌ ${result.error.message}\n`));
    return;
  }
  printLogTails(result.data, record.definition);
}

async function clearLogs(session: ServiceSession, record: ServiceRecord): Promise<void> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: "confirm",
      name: "confirm",
      message: `Truncate the log files of ${record.definition.label}?`,
      default: false,
    },
  ]);
  if (!confirm) {
    console.log(chalk.yellow("\n⚠️  Clear cancelled\n"));
    return;
  }
  await session.clearLogs();
}

/**
 * Act on the selected service until the operator goes back
 */
async function serviceMenu(session: ServiceSession): Promise<void> {
  for (;;) {
    const record = session.selected();
    if (!record) {
      return;
    }

    console.log(chalk.bold.cyan(`\n🔎 ${record.definition.label}\n`));
    for (const line of formatDetails(record)) {
      console.log(line);
    }
    printStatusLine(session);

    const { action } = await inquirer.prompt<{ action: ServiceAction }>([
      {
        type: "list",
        name: "action",
        message: "Action:",
        choices: [
          { name: "Start", value: "start" },
          { name: "Stop", value: "stop" },
          { name: "Restart", value: "restart" },
          { name: "View logs", value: "logs" },
          { name: "Clear logs", value: "clear-logs" },
          { name: "Edit definition", value: "edit" },
          { name: "Reveal in folder", value: "reveal" },
          new inquirer.Separator(),
          { name: "← Back", value: "back" },
        ],
      },
    ]);

    switch (action) {
      case "start":
      case "stop":
      case "restart":
        await runLifecycle(session, action);
        break;
      case "logs":
        await showLogs(session, record);
        break;
      case "clear-logs":
        await clearLogs(session, record);
        break;
      case "edit":
      case "reveal": {
        const result = action === "edit" ? await openInEditor(record.sourcePath) : await revealInFolder(record.sourcePath);
        console.log(result.success ? chalk.green(`\n✅ ${result.data}\n`) : chalk.red(`\n❌ ${result.error.message}\n`));
        break;
      }
      case "back":
        return;
    }
  }
}

async function createDefinition(session: ServiceSession, kind: TemplateKind): Promise<void> {
  const result = await session.create(kind);
  if (result.success) {
    console.log(chalk.green(`\n✅ ${session.getStatusMessage()}\n`));
    await serviceMenu(session);
  } else {
    console.log(chalk.red(`\n❌ ${session.getStatusMessage()}\n`));
  }
}

/**
 * Interactive command handler
 */
export async function interactiveCommand(): Promise<void> {
  try {
    const { session } = await loadScannedEngine();

    for (;;) {
      printStatusLine(session);

      const { action } = await inquirer.prompt<{ action: MainAction }>([
        {
          type: "list",
          name: "action",
          message: "What would you like to do?",
          choices: [
            { name: `Browse services (${session.visible().length})`, value: "choose" },
            { name: "Search", value: "search" },
            { name: "Refresh", value: "refresh" },
            { name: "Create user agent", value: "create-agent" },
            { name: "Create system daemon", value: "create-daemon" },
            new inquirer.Separator(),
            { name: "Quit", value: "quit" },
          ],
        },
      ]);

      switch (action) {
        case "choose": {
          const record = await chooseService(session);
          if (record) {
            await serviceMenu(session);
          }
          break;
        }
        case "search": {
          const { query } = await inquirer.prompt<{ query: string }>([
            {
              type: "input",
              name: "query",
              message: "Search label or program (empty for all):",
              default: session.getQuery(),
            },
          ]);
          const matches = session.search(query);
          console.log(chalk.gray(`\n${matches.length} of ${session.getServices().length} services match\n`));
          break;
        }
        case "refresh": {
          const spinner = ora("Scanning launchd definitions...").start();
          await session.refresh();
          spinner.succeed(session.getStatusMessage());
          break;
        }
        case "create-agent":
          await createDefinition(session, "user-agent");
          break;
        case "create-daemon":
          await createDefinition(session, "system-daemon");
          break;
        case "quit":
          return;
      }
    }
  } catch (error) {
    logger.error("Interactive session failed", error);
    console.log(chalk.red(`\n❌ ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
