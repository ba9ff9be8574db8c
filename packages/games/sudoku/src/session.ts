import {
  CellState,
  Difficulty,
  Grid,
  Position,
  Result,
  Score,
  SessionStatus,
  SudokuError,
  cellLocked,
  invalidConfiguration,
  invalidState,
  ok,
  outOfRange,
} from "@ninegrid/core";
import {
  EMPTY,
  SIZE,
  allPositions,
  cloneGrid,
  isDigit,
  isGridShape,
  isPosition,
  isSolved,
  isValidPlacement,
} from "./grid";
import { TIME_LIMITS } from "./constants";
import { computeScore } from "./scoring";

export interface SessionOptions {
  difficulty?: Difficulty;
  /** Clock in milliseconds, defaults to Date.now */
  now?: () => number;
}

/**
 * One game in play: the puzzle, its solution, and the player's board.
 *
 * Cells filled in the puzzle are fixed and can never be written. Everything
 * else is free; `setValue` stores any digit without checking it, and
 * `checkCell` / `finishGame` judge the board against the stored solution.
 * Once finished, the session rejects every mutating call.
 */
export class GameSession {
  readonly difficulty: Difficulty;
  readonly startedAt: number;
  private readonly puzzle: Grid;
  private readonly solution: Grid;
  private readonly board: Grid;
  private readonly now: () => number;
  private hints = 0;
  private _status = SessionStatus.IN_PROGRESS;

  private constructor(puzzle: Grid, solution: Grid, options: SessionOptions) {
    this.puzzle = cloneGrid(puzzle);
    this.solution = cloneGrid(solution);
    this.board = cloneGrid(puzzle);
    this.difficulty = options.difficulty ?? "medium";
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  /**
   * Start a session from a puzzle and its solution. The solution must be a
   * valid solved grid and every filled puzzle cell must agree with it.
   */
  static create(
    puzzle: Grid,
    solution: Grid,
    options: SessionOptions = {}
  ): Result<GameSession, SudokuError> {
    if (!isGridShape(puzzle) || !isGridShape(solution)) {
      return invalidConfiguration("Puzzle and solution must be 9x9 grids of 0-9");
    }
    if (!isSolved(solution)) {
      return invalidConfiguration("Solution is not a valid solved grid");
    }
    for (const { row, col } of allPositions()) {
      const clue = puzzle[row][col];
      if (clue !== EMPTY && clue !== solution[row][col]) {
        return invalidConfiguration(
          `Puzzle cell (${row + 1},${col + 1}) does not match the solution`
        );
      }
    }
    return ok(new GameSession(puzzle, solution, options));
  }

  get status(): SessionStatus {
    return this._status;
  }

  get hintsUsed(): number {
    return this.hints;
  }

  get defaultTimeLimitSeconds(): number {
    return TIME_LIMITS[this.difficulty];
  }

  /** Whole seconds since the session started */
  elapsedSeconds(): number {
    return Math.max(0, Math.floor((this.now() - this.startedAt) / 1000));
  }

  isCellFixed(pos: Position): boolean {
    assertPosition(pos);
    return this.puzzle[pos.row][pos.col] !== EMPTY;
  }

  getValue(pos: Position): number {
    assertPosition(pos);
    return this.board[pos.row][pos.col];
  }

  getBoard(): Grid {
    return cloneGrid(this.board);
  }

  getPuzzle(): Grid {
    return cloneGrid(this.puzzle);
  }

  /** Write a digit (or 0 to clear) into a non-fixed cell */
  setValue(pos: Position, value: number): Result<void, SudokuError> {
    if (this._status !== SessionStatus.IN_PROGRESS) {
      return invalidState("Game is already finished");
    }
    if (!isPosition(pos)) {
      return outOfRange(`Position (${pos.row},${pos.col}) is off the board`);
    }
    if (value !== EMPTY && !isDigit(value)) {
      return outOfRange(`Value must be 0 (clear) or 1-9, got ${value}`);
    }
    if (this.isCellFixed(pos)) {
      return cellLocked(pos.row, pos.col);
    }
    this.board[pos.row][pos.col] = value;
    return ok(undefined);
  }

  /** True if `value` does not already appear in the cell's row, column or box */
  isValidMove(pos: Position, value: number): boolean {
    if (!isPosition(pos) || !isDigit(value)) return false;
    return isValidPlacement(this.board, pos.row, pos.col, value);
  }

  /**
   * Reveal the solution digit for a cell. Counts as a hint; the board is not
   * changed.
   */
  useHelp(pos: Position): Result<number, SudokuError> {
    if (this._status !== SessionStatus.IN_PROGRESS) {
      return invalidState("Game is already finished");
    }
    if (!isPosition(pos)) {
      return outOfRange(`Position (${pos.row},${pos.col}) is off the board`);
    }
    if (this.isCellFixed(pos)) {
      return cellLocked(pos.row, pos.col);
    }
    this.hints++;
    return ok(this.solution[pos.row][pos.col]);
  }

  checkCell(pos: Position): CellState {
    if (this.isCellFixed(pos)) return "fixed";
    const value = this.board[pos.row][pos.col];
    if (value === EMPTY) return "empty";
    return value === this.solution[pos.row][pos.col] ? "correct" : "incorrect";
  }

  checkAllCells(): Record<CellState, Position[]> {
    const result: Record<CellState, Position[]> = {
      fixed: [],
      empty: [],
      correct: [],
      incorrect: [],
    };
    for (const pos of allPositions()) {
      result[this.checkCell(pos)].push(pos);
    }
    return result;
  }

  isComplete(): boolean {
    return this.board.every((row) => row.every((v) => v !== EMPTY));
  }

  isCorrect(): boolean {
    for (let r = 0; r < SIZE; r++) {
      for (let c = 0; c < SIZE; c++) {
        if (this.board[r][c] !== this.solution[r][c]) return false;
      }
    }
    return true;
  }

  /**
   * End the game and score it. Only the first call succeeds.
   * `timeLimitSeconds` defaults to the difficulty's limit.
   */
  finishGame(
    elapsedSeconds: number,
    timeLimitSeconds: number = this.defaultTimeLimitSeconds
  ): Result<Score, SudokuError> {
    if (this._status !== SessionStatus.IN_PROGRESS) {
      return invalidState("Game is already finished");
    }
    if (!isNonNegative(elapsedSeconds) || !isNonNegative(timeLimitSeconds)) {
      return outOfRange(
        `Elapsed time and time limit must be non-negative, got ${elapsedSeconds} and ${timeLimitSeconds}`
      );
    }

    const cells = this.checkAllCells();
    this._status = SessionStatus.FINISHED;

    return ok(
      computeScore({
        elapsedSeconds,
        timeLimitSeconds,
        errors: cells.incorrect.length,
        empties: cells.empty.length,
        hintsUsed: this.hints,
        correct: this.isCorrect(),
      })
    );
  }
}

function isNonNegative(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

function assertPosition(pos: Position): void {
  if (!isPosition(pos)) {
    throw new RangeError(`Position (${pos.row},${pos.col}) is off the board`);
  }
}
