import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

/** defaults < config file < environment < command-line flags */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const layers = [fileConfig[key], process.env[ENV_MAP[key]], cliOverrides[key]];
    for (const value of layers) {
      if (value !== undefined && value !== "") {
        resolved[key] = value;
      }
    }
  }

  return resolved;
}

/** Where a key's resolved value came from, for `config list` */
export function getSource(
  key: keyof ConfigData,
  fileData: Partial<ConfigData>,
): string {
  const cliVal = cliOverrides[key];
  if (cliVal !== undefined && cliVal !== "") return "flag";
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
