import { Err, err } from "./result";

export type SudokuErrorKind =
  | "cell_locked"
  | "invalid_state"
  | "invalid_configuration"
  | "out_of_range";

export interface SudokuError {
  kind: SudokuErrorKind;
  message: string;
}

export function cellLocked(row: number, col: number): Err<SudokuError> {
  return err({
    kind: "cell_locked",
    message: `Cell (${row + 1},${col + 1}) is part of the puzzle and cannot be changed`,
  });
}

export function invalidState(message: string): Err<SudokuError> {
  return err({ kind: "invalid_state", message });
}

export function invalidConfiguration(message: string): Err<SudokuError> {
  return err({ kind: "invalid_configuration", message });
}

export function outOfRange(message: string): Err<SudokuError> {
  return err({ kind: "out_of_range", message });
}
