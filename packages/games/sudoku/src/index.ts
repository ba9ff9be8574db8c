import { Difficulty, Result, SudokuError, ok } from "@ninegrid/core";
import { GenerateOptions, generatePuzzle } from "./generator";
import { GameSession, SessionOptions } from "./session";

export { SeededRng, randomSeed } from "./prng";
export {
  generateCompleteBoard,
  createPuzzle,
  generatePuzzle,
} from "./generator";
export type {
  Puzzle,
  GeneratedPuzzle,
  CarveOptions,
  GenerateOptions,
} from "./generator";
export { GameSession } from "./session";
export type { SessionOptions } from "./session";
export { computeScore } from "./scoring";
export type { ScoreInput } from "./scoring";
export { BLANK_COUNTS, TIME_LIMITS } from "./constants";
export {
  EMPTY,
  cloneGrid,
  countEmpty,
  getCandidates,
  isSolved,
  isValidPlacement,
} from "./grid";
export { renderBoard, parseCommand, formatScore, INPUT_HINT } from "./ui";
export type { PlayCommand } from "./ui";

export type NewSessionOptions = GenerateOptions & Pick<SessionOptions, "now">;

export interface NewSession {
  session: GameSession;
  seed: string;
}

/** Generate a fresh puzzle for `difficulty` and start a session on it */
export function newSession(
  difficulty: Difficulty,
  options: NewSessionOptions = {}
): Result<NewSession, SudokuError> {
  const generated = generatePuzzle(difficulty, options);
  if (!generated.ok) return generated;

  const { puzzle, solution, seed } = generated.value;
  const session = GameSession.create(puzzle, solution, {
    difficulty,
    now: options.now,
  });
  if (!session.ok) return session;
  return ok({ session: session.value, seed });
}
