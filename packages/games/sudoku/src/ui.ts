import { Position, Score } from "@ninegrid/core";
import { GameSession } from "./session";
import { SIZE } from "./grid";

export type PlayCommand =
  | { type: "place"; pos: Position; value: number }
  | { type: "clear"; pos: Position }
  | { type: "hint"; pos: Position }
  | { type: "check" }
  | { type: "finish" }
  | { type: "help" }
  | { type: "quit" };

export const INPUT_HINT =
  'Enter "R C V" to place (e.g. "3 5 7"), "clear R C", "hint R C", "check", "finish", "help" or "quit"';

const SEPARATOR = "  +-------+-------+-------+";

/**
 * Render the board as ASCII. Fixed digits print as-is, player digits that
 * disagree with the solution are prefixed with "*" when `showErrors` is set.
 */
export function renderBoard(session: GameSession, showErrors = false): string {
  const lines: string[] = [];
  lines.push("    1 2 3   4 5 6   7 8 9");
  lines.push(SEPARATOR);

  for (let r = 0; r < SIZE; r++) {
    if (r > 0 && r % 3 === 0) lines.push(SEPARATOR);
    let row = `${r + 1} |`;
    for (let c = 0; c < SIZE; c++) {
      if (c > 0 && c % 3 === 0) row += "|";
      const pos = { row: r, col: c };
      const val = session.getValue(pos);
      if (val === 0) {
        row += " .";
      } else if (showErrors && session.checkCell(pos) === "incorrect") {
        row += `*${val}`;
      } else {
        row += ` ${val}`;
      }
      if (c % 3 === 2) row += " ";
    }
    row += "|";
    lines.push(row);
  }
  lines.push(SEPARATOR);
  lines.push(`  Difficulty: ${session.difficulty}  Hints: ${session.hintsUsed}`);

  return lines.join("\n");
}

/** Parse one line of player input. Rows and columns are 1-based. */
export function parseCommand(raw: string): PlayCommand | null {
  const trimmed = raw.trim().toLowerCase();

  if (trimmed === "check") return { type: "check" };
  if (trimmed === "finish") return { type: "finish" };
  if (trimmed === "help" || trimmed === "?") return { type: "help" };
  if (trimmed === "quit" || trimmed === "exit") return { type: "quit" };

  // "clear R C" / "hint R C"
  const cellMatch = trimmed.match(/^(clear|hint)\s+([1-9])\s+([1-9])$/);
  if (cellMatch) {
    const pos = {
      row: parseInt(cellMatch[2], 10) - 1,
      col: parseInt(cellMatch[3], 10) - 1,
    };
    return cellMatch[1] === "clear" ? { type: "clear", pos } : { type: "hint", pos };
  }

  // "R C V"
  const placeMatch = trimmed.match(/^([1-9])\s+([1-9])\s+([1-9])$/);
  if (placeMatch) {
    return {
      type: "place",
      pos: {
        row: parseInt(placeMatch[1], 10) - 1,
        col: parseInt(placeMatch[2], 10) - 1,
      },
      value: parseInt(placeMatch[3], 10),
    };
  }

  return null;
}

export function formatScore(score: Score): string {
  return [
    `Score: ${score.score}`,
    `  Time:    ${score.elapsedSeconds}s of ${score.timeLimitSeconds}s (+${score.timeBonus})`,
    `  Errors:  ${score.errors} (-${score.errorPenalty})`,
    `  Hints:   ${score.hintsUsed} (-${score.hintPenalty})`,
    `  Empty:   ${score.empties} (-${score.emptyPenalty})`,
    `  Solved:  ${score.correct ? "yes" : "no"}`,
  ].join("\n");
}
