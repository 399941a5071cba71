import chalk from "chalk";
import { getConfigValue, loadConfig, updateConfig } from "../../config/configManager.js";
import { CONFIG_FILE } from "../../config/paths.js";
import { configSchema, type Config } from "../../config/schema.js";
import { errorMessage } from "../../shared/errors.js";

const CONFIG_KEYS = Object.keys(configSchema.shape);

/**
 * Narrows a user-supplied key to a configuration key.
 */
export function isConfigKey(key: string): key is keyof Config {
  return CONFIG_KEYS.includes(key);
}

function requireConfigKey(key: string): keyof Config {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exit(1);
  }
  return key;
}

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${CONFIG_FILE}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Sets a configuration value. All settings are numeric; the schema decides
 * which numbers are accepted.
 */
export function configSetCommand(key: string, value: string): void {
  const configKey = requireConfigKey(key);

  const parsedValue = Number(value);
  if (value.trim() === "" || Number.isNaN(parsedValue)) {
    console.log(chalk.red(`\n❌ Invalid number: ${value}\n`));
    process.exit(1);
  }

  try {
    updateConfig({ [configKey]: parsedValue });
    console.log(chalk.green(`\n✅ Set ${configKey} = ${parsedValue}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Invalid value for ${configKey}: ${value}`));
    console.log(chalk.gray(`   ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  console.log(String(getConfigValue(requireConfigKey(key))));
}
