import { createInterface } from "node:readline";
import { Command } from "commander";
import type Logger from "bunyan";
import { Score } from "@ninegrid/core";
import {
  GameSession,
  INPUT_HINT,
  formatScore,
  parseCommand,
  newSession,
  renderBoard,
} from "@ninegrid/game-sudoku";
import { setCliOverride } from "../config";
import log from "../logger";
import { loadSettings } from "./settings";

export interface PlayIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export interface PlayOptions {
  /** Overrides the difficulty's default limit */
  timeLimitSeconds?: number;
  log: Logger;
}

/**
 * Drive a session from line-oriented input until the player finishes, quits
 * or the input ends. Resolves with the score, or null if the game was left
 * unfinished.
 */
export async function playLoop(
  session: GameSession,
  io: PlayIO,
  opts: PlayOptions,
): Promise<Score | null> {
  const write = (text: string) => io.output.write(text + "\n");
  const rl = createInterface({ input: io.input, terminal: false });

  write(renderBoard(session));
  write(INPUT_HINT);

  try {
    for await (const line of rl) {
      if (line.trim() === "") continue;
      const command = parseCommand(line);
      if (!command) {
        write(`Unrecognized input: "${line.trim()}". ${INPUT_HINT}`);
        continue;
      }

      switch (command.type) {
        case "place":
        case "clear": {
          const value = command.type === "place" ? command.value : 0;
          if (value !== 0 && !session.isValidMove(command.pos, value)) {
            write(`Note: ${value} already appears in that row, column or box.`);
          }
          const result = session.setValue(command.pos, value);
          if (!result.ok) {
            opts.log.debug({ pos: command.pos, value, kind: result.error.kind }, "Move rejected");
            write(`Error: ${result.error.message}`);
            break;
          }
          write(renderBoard(session));
          if (session.isCorrect()) {
            write('Puzzle solved! Type "finish" to see your score.');
          }
          break;
        }

        case "hint": {
          const result = session.useHelp(command.pos);
          if (!result.ok) {
            write(`Error: ${result.error.message}`);
            break;
          }
          write(
            `Cell (${command.pos.row + 1},${command.pos.col + 1}) is ${result.value}. Hints used: ${session.hintsUsed}`,
          );
          break;
        }

        case "check": {
          const cells = session.checkAllCells();
          write(renderBoard(session, true));
          write(
            `Correct: ${cells.correct.length}  Incorrect: ${cells.incorrect.length}  Empty: ${cells.empty.length}`,
          );
          break;
        }

        case "finish": {
          const result = session.finishGame(session.elapsedSeconds(), opts.timeLimitSeconds);
          if (!result.ok) {
            write(`Error: ${result.error.message}`);
            break;
          }
          opts.log.info({ score: result.value }, "Game finished");
          write(formatScore(result.value));
          return result.value;
        }

        case "help":
          write(INPUT_HINT);
          break;

        case "quit":
          return null;
      }
    }
    return null;
  } finally {
    rl.close();
  }
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a puzzle in the terminal")
    .option("-d, --difficulty <level>", "easy, medium or hard")
    .option("-s, --seed <seed>", "Seed for the puzzle generator")
    .option("-t, --time-limit <seconds>", "Time limit used for the time bonus")
    .action(async (opts: { difficulty?: string; seed?: string; timeLimit?: string }) => {
      if (opts.difficulty) setCliOverride("difficulty", opts.difficulty);
      if (opts.timeLimit) setCliOverride("timeLimit", opts.timeLimit);

      const { settings } = await loadSettings();
      const started = newSession(settings.difficulty, { seed: opts.seed });
      if (!started.ok) {
        console.error(`Error: ${started.error.message}`);
        process.exit(1);
      }

      const { session, seed } = started.value;
      log.info(
        { difficulty: settings.difficulty, seed, blanks: session.checkAllCells().empty.length },
        "Session started",
      );
      console.log(`Difficulty: ${settings.difficulty}  Seed: ${seed}\n`);

      await playLoop(
        session,
        { input: process.stdin, output: process.stdout },
        { timeLimitSeconds: settings.timeLimitSeconds, log },
      );
    });
}
