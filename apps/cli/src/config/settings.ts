import {
  Difficulty,
  Result,
  SudokuError,
  invalidConfiguration,
  ok,
  parseDifficulty,
} from "@ninegrid/core";
import { ConfigData } from "./defaults";

export interface GameSettings {
  difficulty: Difficulty;
  /** Undefined means use the difficulty's default */
  timeLimitSeconds?: number;
}

/** Turn the string-valued config into typed game settings */
export function resolveGameSettings(
  config: ConfigData,
): Result<GameSettings, SudokuError> {
  const difficulty = parseDifficulty(config.difficulty);
  if (!difficulty.ok) return difficulty;

  if (config.timeLimit === "") {
    return ok({ difficulty: difficulty.value });
  }
  if (!/^\d+$/.test(config.timeLimit.trim())) {
    return invalidConfiguration(
      `Invalid time limit: "${config.timeLimit}". Use a whole number of seconds.`,
    );
  }
  return ok({
    difficulty: difficulty.value,
    timeLimitSeconds: parseInt(config.timeLimit, 10),
  });
}
