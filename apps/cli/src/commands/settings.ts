import { ConfigData, GameSettings, resolveConfig, resolveGameSettings } from "../config";
import log, { isLogLevel } from "../logger";

/**
 * Resolve config for a game command and apply its log level. Exits the
 * process when the configured values are unusable.
 */
export async function loadSettings(): Promise<{ config: ConfigData; settings: GameSettings }> {
  const config = await resolveConfig();

  if (isLogLevel(config.logLevel)) {
    log.level(config.logLevel);
  } else {
    log.warn({ logLevel: config.logLevel }, "Ignoring unknown log level");
  }

  const settings = resolveGameSettings(config);
  if (!settings.ok) {
    console.error(`Error: ${settings.error.message}`);
    process.exit(1);
  }
  log.debug({ config }, "Config resolved");
  return { config, settings: settings.value };
}
