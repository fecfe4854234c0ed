import chalk from "chalk";
import { getConfigPath, getConfigValue, loadConfig, saveConfig } from "../../config/configManager.js";
import { isConfigKey } from "../../config/schema.js";
import { applyConfigValue } from "../settings.js";

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Sets a configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  const updated = saveConfig(applyConfigValue(loadConfig(), key, value));
  const stored = isConfigKey(key) ? updated[key] : value;
  console.log(chalk.green(`\n✅ Set ${key} = ${String(stored)}\n`));
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${Object.keys(loadConfig()).join(", ")}`);
  }
  console.log(String(getConfigValue(key)));
}
