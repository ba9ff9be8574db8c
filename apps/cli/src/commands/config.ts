import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  resolveGameSettings,
  CONFIG_KEYS,
  DEFAULTS,
  ConfigData,
} from "../config";
import { isLogLevel, LOG_LEVELS } from "../logger";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.ninegrid/config.json)");

  configCmd.action(async () => {
    console.log(await formatConfigList());
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const problem = validateValue(key, value);
      if (problem) {
        console.error(problem);
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      console.log(await formatConfigList());
    });

  configCmd
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}

export async function formatConfigList(): Promise<string> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  const lines = [`Config file: ${getConfigPath()}`, "──────────────────────────────────────"];
  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : resolved[key];
    lines.push(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  return lines.join("\n");
}

export function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

/** Returns an error message, or null if the value is acceptable for the key */
export function validateValue(key: keyof ConfigData, value: string): string | null {
  if (key === "logLevel") {
    return isLogLevel(value)
      ? null
      : `Invalid log level: "${value}". Must be one of ${LOG_LEVELS.join(", ")}.`;
  }
  const probe: ConfigData = { ...DEFAULTS };
  probe[key] = value;
  const settings = resolveGameSettings(probe);
  return settings.ok ? null : settings.error.message;
}
