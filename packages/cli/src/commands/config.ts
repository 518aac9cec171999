/**
 * Config Command
 * Manage the launchboard configuration file
 */

import chalk from "chalk";
import inquirer from "inquirer";
import yaml from "js-yaml";
import { CONFIG_KEYS, describeCause, isConfigKey, logger } from "@launchboard/core";
import { getConfigManager } from "../utils/context.js";

interface ConfigOptions {
  show?: boolean;
  get?: string;
  set?: string;
  reset?: boolean;
}

const unknownKey = (key: string): void => {
  console.log(chalk.red(`\n❌ Unknown configuration key '${key}'.\n`));
  console.log(chalk.yellow(`Known keys: ${CONFIG_KEYS.join(", ")}\n`));
  process.exitCode = 1;
};

/**
 * Config command handler
 */
export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    const configManager = getConfigManager();

    // Show configuration
    if (options.show) {
      const config = await configManager.load();
      const exists = await configManager.exists();
      console.log(chalk.bold.cyan(`\n⚙️  Configuration (${configManager.getConfigPath()})\n`));
      if (!exists) {
        console.log(chalk.gray("No configuration file yet; showing defaults.\n"));
      }
      console.log(yaml.dump(config, { indent: 2, lineWidth: 100, noRefs: true }));
      return;
    }

    // Get a specific value
    if (options.get) {
      if (!isConfigKey(options.get)) {
        unknownKey(options.get);
        return;
      }
      await configManager.load();
      const value = configManager.getValue(options.get);
      console.log(chalk.cyan(`\n${options.get}:`), Array.isArray(value) ? value.join(", ") : value, "\n");
      return;
    }

    // Set a specific value
    if (options.set) {
      const [key, ...valueParts] = options.set.split("=");
      const value = valueParts.join("=");

      if (!key || !value) {
        console.log(chalk.red("\n❌ Invalid format. Use: --set key=value\n"));
        process.exitCode = 1;
        return;
      }
      if (!isConfigKey(key)) {
        unknownKey(key);
        return;
      }

      await configManager.load();
      const stored = configManager.setValue(key, value);
      await configManager.save();

      console.log(
        chalk.green(`\n✅ Configuration updated: ${key} = ${Array.isArray(stored) ? stored.join(", ") : stored}\n`)
      );
      return;
    }

    // Reset configuration
    if (options.reset) {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: "confirm",
          name: "confirm",
          message: "Are you sure you want to reset configuration to defaults?",
          default: false,
        },
      ]);

      if (confirm) {
        configManager.reset();
        await configManager.save();
        console.log(chalk.green("\n✅ Configuration reset to defaults\n"));
      } else {
        console.log(chalk.yellow("\n⚠️  Reset cancelled\n"));
      }
      return;
    }

    // No options provided
    console.log(chalk.yellow("\n⚠️  No action specified. Use --help for options.\n"));
  } catch (error) {
    logger.error("Config command failed", error);
    console.log(chalk.red(`\n❌ ${describeCause(error)}\n`));
    process.exitCode = 1;
  }
}
