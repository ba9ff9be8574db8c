import { Command } from "commander";
import { generatePuzzle, GameSession, renderBoard } from "@ninegrid/game-sudoku";
import { setCliOverride } from "../config";
import log from "../logger";
import { loadSettings } from "./settings";

export function registerNewCommand(program: Command): void {
  program
    .command("new")
    .description("Generate a puzzle and print it")
    .option("-d, --difficulty <level>", "easy, medium or hard")
    .option("-s, --seed <seed>", "Seed for the puzzle generator")
    .option("--json", "Print the puzzle as JSON")
    .option("--show-solution", "Include the solution")
    .action(
      async (opts: { difficulty?: string; seed?: string; json?: boolean; showSolution?: boolean }) => {
        if (opts.difficulty) setCliOverride("difficulty", opts.difficulty);
        const { settings } = await loadSettings();

        const generated = generatePuzzle(settings.difficulty, { seed: opts.seed });
        if (!generated.ok) {
          console.error(`Error: ${generated.error.message}`);
          process.exit(1);
        }
        const { puzzle, solution, seed, difficulty, targetBlanks } = generated.value;
        log.info({ difficulty, seed, blanks: targetBlanks }, "Puzzle generated");

        if (opts.json) {
          const out = opts.showSolution
            ? { seed, difficulty, puzzle, solution }
            : { seed, difficulty, puzzle };
          console.log(JSON.stringify(out));
          return;
        }

        const session = GameSession.create(puzzle, solution, { difficulty });
        if (!session.ok) {
          console.error(`Error: ${session.error.message}`);
          process.exit(1);
        }
        console.log(`Seed: ${seed}\n`);
        console.log(renderBoard(session.value));
        if (opts.showSolution) {
          console.log("\nSolution:");
          for (const row of solution) console.log(`  ${row.join(" ")}`);
        }
      },
    );
}
