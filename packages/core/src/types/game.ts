/** 9x9 grid, row-major. 0 = empty, otherwise a digit 1-9. */
export type Grid = number[][];

export interface Position {
  row: number;
  col: number;
}

export type Difficulty = "easy" | "medium" | "hard";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

/** How the engine classifies a cell for rendering */
export type CellState = "fixed" | "empty" | "correct" | "incorrect";

export const CELL_STATES: readonly CellState[] = [
  "fixed",
  "empty",
  "correct",
  "incorrect",
];

/** Final score and the counts it was computed from */
export interface Score {
  score: number;
  timeBonus: number;
  errors: number;
  empties: number;
  hintsUsed: number;
  errorPenalty: number;
  hintPenalty: number;
  emptyPenalty: number;
  elapsedSeconds: number;
  timeLimitSeconds: number;
  /** True when the board matched the solution cell-for-cell at finish */
  correct: boolean;
}
