import { Difficulty } from "@ninegrid/core";

/** Cells removed from the solved grid, by difficulty */
export const BLANK_COUNTS: Record<Difficulty, number> = {
  easy: 35,
  medium: 45,
  hard: 55,
};

/** Default time limit in seconds, by difficulty */
export const TIME_LIMITS: Record<Difficulty, number> = {
  easy: 1800, // 30 minutes
  medium: 2400,
  hard: 3000,
};

export const BASE_SCORE = 1000;
/** One bonus point per this many seconds left on the clock */
export const SECONDS_PER_BONUS_POINT = 5;
export const ERROR_PENALTY = 5;
export const HINT_PENALTY = 10;
export const EMPTY_PENALTY = 3;
