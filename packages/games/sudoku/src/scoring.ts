import { Score } from "@ninegrid/core";
import {
  BASE_SCORE,
  EMPTY_PENALTY,
  ERROR_PENALTY,
  HINT_PENALTY,
  SECONDS_PER_BONUS_POINT,
} from "./constants";

export interface ScoreInput {
  elapsedSeconds: number;
  timeLimitSeconds: number;
  errors: number;
  empties: number;
  hintsUsed: number;
  correct: boolean;
}

/**
 * 1000 base, +1 per 5 seconds left, -5 per wrong cell, -10 per hint,
 * -3 per cell left empty. The total is not clamped and can go negative.
 */
export function computeScore(input: ScoreInput): Score {
  const remaining = Math.max(0, input.timeLimitSeconds - input.elapsedSeconds);
  const timeBonus = Math.floor(remaining / SECONDS_PER_BONUS_POINT);
  const errorPenalty = input.errors * ERROR_PENALTY;
  const hintPenalty = input.hintsUsed * HINT_PENALTY;
  const emptyPenalty = input.empties * EMPTY_PENALTY;

  return {
    score: BASE_SCORE + timeBonus - errorPenalty - hintPenalty - emptyPenalty,
    timeBonus,
    errors: input.errors,
    empties: input.empties,
    hintsUsed: input.hintsUsed,
    errorPenalty,
    hintPenalty,
    emptyPenalty,
    elapsedSeconds: input.elapsedSeconds,
    timeLimitSeconds: input.timeLimitSeconds,
    correct: input.correct,
  };
}
