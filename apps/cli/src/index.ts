import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerNewCommand } from "./commands/new";
import { registerPlayCommand } from "./commands/play";

program
  .name("ninegrid")
  .description("ninegrid - generate and play Sudoku puzzles")
  .version("0.1.0", "-v, --version");

registerNewCommand(program);
registerPlayCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
