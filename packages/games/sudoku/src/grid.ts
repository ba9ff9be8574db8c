import { Grid, Position } from "@ninegrid/core";

export const SIZE = 9;
export const BOX = 3;
export const CELL_COUNT = SIZE * SIZE;
export const EMPTY = 0;

export function emptyGrid(): Grid {
  return Array.from({ length: SIZE }, () => Array<number>(SIZE).fill(EMPTY));
}

/** Clone a 9x9 grid */
export function cloneGrid(grid: Grid): Grid {
  return grid.map((row) => [...row]);
}

/** All 81 positions in row-major order */
export function allPositions(): Position[] {
  const positions: Position[] = [];
  for (let row = 0; row < SIZE; row++) {
    for (let col = 0; col < SIZE; col++) {
      positions.push({ row, col });
    }
  }
  return positions;
}

export function isPosition(pos: Position): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < SIZE &&
    pos.col >= 0 &&
    pos.col < SIZE
  );
}

export function isDigit(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 9;
}

/** Find candidate digits for cell (row, col) */
export function getCandidates(grid: Grid, row: number, col: number): number[] {
  const used = new Set<number>();

  // Row
  for (let c = 0; c < SIZE; c++) if (grid[row][c]) used.add(grid[row][c]);
  // Column
  for (let r = 0; r < SIZE; r++) if (grid[r][col]) used.add(grid[r][col]);
  // 3x3 box
  const br = Math.floor(row / BOX) * BOX;
  const bc = Math.floor(col / BOX) * BOX;
  for (let r = br; r < br + BOX; r++) {
    for (let c = bc; c < bc + BOX; c++) {
      if (grid[r][c]) used.add(grid[r][c]);
    }
  }

  const result: number[] = [];
  for (let v = 1; v <= 9; v++) {
    if (!used.has(v)) result.push(v);
  }
  return result;
}

/**
 * Check if `value` could go at (row, col) without repeating a digit in the
 * row, column or box. The cell itself is ignored, so a filled cell can be
 * tested against its own value.
 */
export function isValidPlacement(
  grid: Grid,
  row: number,
  col: number,
  value: number
): boolean {
  for (let c = 0; c < SIZE; c++) {
    if (c !== col && grid[row][c] === value) return false;
  }
  for (let r = 0; r < SIZE; r++) {
    if (r !== row && grid[r][col] === value) return false;
  }
  const br = Math.floor(row / BOX) * BOX;
  const bc = Math.floor(col / BOX) * BOX;
  for (let r = br; r < br + BOX; r++) {
    for (let c = bc; c < bc + BOX; c++) {
      if ((r !== row || c !== col) && grid[r][c] === value) return false;
    }
  }
  return true;
}

/** True if the value is a 9x9 array of integers in 0-9 */
export function isGridShape(grid: unknown): grid is Grid {
  return (
    Array.isArray(grid) &&
    grid.length === SIZE &&
    grid.every(
      (row: unknown) =>
        Array.isArray(row) &&
        row.length === SIZE &&
        row.every(
          (v: unknown) =>
            typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 9
        )
    )
  );
}

export function countEmpty(grid: Grid): number {
  let empty = 0;
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      if (grid[r][c] === EMPTY) empty++;
    }
  }
  return empty;
}

/** Check if the grid is completely and correctly solved */
export function isSolved(grid: Grid): boolean {
  if (countEmpty(grid) > 0) return false;
  // Verify all rows
  for (let r = 0; r < SIZE; r++) {
    const rowSet = new Set(grid[r]);
    if (rowSet.size !== SIZE) return false;
  }
  // Verify all columns
  for (let c = 0; c < SIZE; c++) {
    const colSet = new Set<number>();
    for (let r = 0; r < SIZE; r++) colSet.add(grid[r][c]);
    if (colSet.size !== SIZE) return false;
  }
  // Verify all 3x3 boxes
  for (let br = 0; br < SIZE; br += BOX) {
    for (let bc = 0; bc < SIZE; bc += BOX) {
      const boxSet = new Set<number>();
      for (let r = br; r < br + BOX; r++) {
        for (let c = bc; c < bc + BOX; c++) {
          boxSet.add(grid[r][c]);
        }
      }
      if (boxSet.size !== SIZE) return false;
    }
  }
  return true;
}
