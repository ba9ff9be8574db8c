import { Difficulty, DIFFICULTIES } from "./types/game";
import { Result, ok } from "./result";
import { SudokuError, invalidConfiguration } from "./errors";

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}

export function parseDifficulty(value: string): Result<Difficulty, SudokuError> {
  const normalized = value.trim().toLowerCase();
  if (isDifficulty(normalized)) return ok(normalized);
  return invalidConfiguration(
    `Invalid difficulty: ${value}. Must be ${DIFFICULTIES.join(", ")}.`
  );
}
