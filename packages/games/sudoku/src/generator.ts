import {
  Difficulty,
  Grid,
  Position,
  Result,
  SudokuError,
  invalidConfiguration,
  ok,
} from "@ninegrid/core";
import { SeededRng, randomSeed } from "./prng";
import {
  CELL_COUNT,
  EMPTY,
  allPositions,
  cloneGrid,
  emptyGrid,
  getCandidates,
} from "./grid";
import { BLANK_COUNTS } from "./constants";

export interface Puzzle {
  puzzle: Grid;
  solution: Grid;
  /** Positions still filled after carving */
  fixed: Position[];
  difficulty: Difficulty;
  targetBlanks: number;
}

export interface CarveOptions {
  /** Override the blank count for one or more difficulties */
  blankCounts?: Partial<Record<Difficulty, number>>;
}

export interface GenerateOptions extends CarveOptions {
  /** RNG seed; a random one is drawn when omitted */
  seed?: string;
}

export interface GeneratedPuzzle extends Puzzle {
  seed: string;
}

/**
 * Generate a complete valid Sudoku grid using backtracking
 * with randomized candidate ordering (driven by PRNG for determinism).
 */
export function generateCompleteBoard(rng: SeededRng): Grid {
  const grid = emptyGrid();

  function fill(pos: number): boolean {
    if (pos === CELL_COUNT) return true;
    const row = Math.floor(pos / 9);
    const col = pos % 9;

    const candidates = getCandidates(grid, row, col);
    rng.shuffle(candidates);

    for (const v of candidates) {
      grid[row][col] = v;
      if (fill(pos + 1)) return true;
      grid[row][col] = EMPTY;
    }
    return false;
  }

  fill(0);
  return grid;
}

/**
 * Carve a puzzle out of a solved grid by clearing `targetBlanks` distinct
 * cells picked uniformly at random. Uniqueness of the puzzle's solution is
 * not checked: play is always judged against `solution`.
 */
export function createPuzzle(
  solution: Grid,
  difficulty: Difficulty,
  rng: SeededRng,
  options: CarveOptions = {}
): Result<Puzzle, SudokuError> {
  const targetBlanks = options.blankCounts?.[difficulty] ?? BLANK_COUNTS[difficulty];
  if (!Number.isInteger(targetBlanks) || targetBlanks < 0 || targetBlanks > CELL_COUNT) {
    return invalidConfiguration(
      `Blank count for ${difficulty} must be an integer from 0 to ${CELL_COUNT}, got ${targetBlanks}`
    );
  }

  const puzzle = cloneGrid(solution);
  const positions = rng.shuffle(allPositions());
  for (const { row, col } of positions.slice(0, targetBlanks)) {
    puzzle[row][col] = EMPTY;
  }

  const fixed = allPositions().filter(({ row, col }) => puzzle[row][col] !== EMPTY);

  return ok({
    puzzle,
    solution: cloneGrid(solution),
    fixed,
    difficulty,
    targetBlanks,
  });
}

/** Build a solved grid and carve it for `difficulty` in one step */
export function generatePuzzle(
  difficulty: Difficulty,
  options: GenerateOptions = {}
): Result<GeneratedPuzzle, SudokuError> {
  const seed = options.seed ?? randomSeed();
  const rng = new SeededRng(seed);
  const solution = generateCompleteBoard(rng);
  const carved = createPuzzle(solution, difficulty, rng, options);
  if (!carved.ok) return carved;
  return ok({ ...carved.value, seed });
}
