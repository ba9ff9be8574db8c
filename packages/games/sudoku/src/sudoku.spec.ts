import { strict as assert } from "assert";
import { Difficulty, DIFFICULTIES, Grid } from "@ninegrid/core";
import { SeededRng } from "./prng";
import {
  countEmpty,
  emptyGrid,
  getCandidates,
  isSolved,
  isValidPlacement,
} from "./grid";
import { createPuzzle, generateCompleteBoard, generatePuzzle } from "./generator";
import { BLANK_COUNTS } from "./constants";

/** Check every row, column and box holds 1-9 exactly once */
function hasAllDigitsOnce(grid: Grid): boolean {
  const units: number[][] = [];
  for (let i = 0; i < 9; i++) {
    units.push(grid[i]);
    units.push(grid.map((row) => row[i]));
    const br = Math.floor(i / 3) * 3;
    const bc = (i % 3) * 3;
    units.push(grid.slice(br, br + 3).flatMap((row) => row.slice(bc, bc + 3)));
  }
  return units.every(
    (unit) => [...unit].sort((a, b) => a - b).join("") === "123456789"
  );
}

describe("SeededRng", () => {
  it("produces deterministic output for the same seed", () => {
    const a = new SeededRng("test-seed");
    const b = new SeededRng("test-seed");
    for (let i = 0; i < 100; i++) {
      assert.equal(a.next(), b.next());
    }
  });

  it("produces different output for different seeds", () => {
    const a = new SeededRng("seed-a");
    const b = new SeededRng("seed-b");
    let same = 0;
    for (let i = 0; i < 100; i++) {
      if (a.next() === b.next()) same++;
    }
    assert.ok(same < 10, "Expected mostly different values");
  });

  it("accepts the empty string as a seed", () => {
    const rng = new SeededRng("");
    assert.notEqual(rng.next(), 0);
  });

  it("nextInt stays within [0, max)", () => {
    const rng = new SeededRng("bounds");
    for (let i = 0; i < 500; i++) {
      const n = rng.nextInt(9);
      assert.ok(Number.isInteger(n) && n >= 0 && n < 9, `out of range: ${n}`);
    }
  });

  it("shuffle returns a permutation", () => {
    const rng = new SeededRng("shuffle");
    const arr = rng.shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    assert.deepEqual([...arr].sort((a, b) => a - b), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});

describe("Grid rules", () => {
  it("getCandidates returns every digit for an empty grid", () => {
    assert.deepEqual(getCandidates(emptyGrid(), 0, 0), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("getCandidates excludes row/col/box values", () => {
    const grid = emptyGrid();
    grid[0][1] = 5; // same row
    grid[3][0] = 3; // same col
    grid[1][1] = 7; // same box
    assert.deepEqual(getCandidates(grid, 0, 0), [1, 2, 4, 6, 8, 9]);
  });

  it("isValidPlacement detects conflicts", () => {
    const grid = emptyGrid();
    grid[0][0] = 5;
    assert.equal(isValidPlacement(grid, 0, 1, 5), false); // same row
    assert.equal(isValidPlacement(grid, 1, 0, 5), false); // same col
    assert.equal(isValidPlacement(grid, 1, 1, 5), false); // same box
    assert.equal(isValidPlacement(grid, 0, 1, 3), true);
  });

  it("isValidPlacement ignores the cell being tested", () => {
    const grid = emptyGrid();
    grid[4][4] = 6;
    assert.equal(isValidPlacement(grid, 4, 4, 6), true);
  });

  it("isSolved rejects an incomplete grid", () => {
    assert.equal(isSolved(emptyGrid()), false);
  });

  it("isSolved rejects a full grid with a repeated digit", () => {
    const grid = generateCompleteBoard(new SeededRng("swap"));
    [grid[0][0], grid[0][1]] = [grid[0][1], grid[0][0]];
    assert.equal(isSolved(grid), false);
  });
});

describe("Generator", () => {
  describe("generateCompleteBoard", () => {
    it("fills every row, column and box with 1-9", () => {
      for (const seed of ["alpha", "beta", "gamma", "delta", "epsilon"]) {
        const grid = generateCompleteBoard(new SeededRng(seed));
        assert.ok(hasAllDigitsOnce(grid), `seed ${seed} produced an invalid grid`);
        assert.equal(isSolved(grid), true);
      }
    });

    it("is deterministic for a seed", () => {
      const a = generateCompleteBoard(new SeededRng("determinism"));
      const b = generateCompleteBoard(new SeededRng("determinism"));
      assert.deepEqual(a, b);
    });

    it("varies with the seed", () => {
      const a = generateCompleteBoard(new SeededRng("board-a"));
      const b = generateCompleteBoard(new SeededRng("board-b"));
      assert.notDeepEqual(a, b);
    });
  });

  describe("createPuzzle", () => {
    for (const difficulty of DIFFICULTIES) {
      it(`${difficulty} clears exactly ${BLANK_COUNTS[difficulty]} cells and keeps the rest`, () => {
        const rng = new SeededRng(`carve-${difficulty}`);
        const solution = generateCompleteBoard(rng);
        const result = createPuzzle(solution, difficulty, rng);
        assert.ok(result.ok);
        const { puzzle, fixed, targetBlanks } = result.value;

        assert.equal(targetBlanks, BLANK_COUNTS[difficulty]);
        assert.equal(countEmpty(puzzle), BLANK_COUNTS[difficulty]);
        assert.equal(fixed.length, 81 - BLANK_COUNTS[difficulty]);
        for (let r = 0; r < 9; r++) {
          for (let c = 0; c < 9; c++) {
            if (puzzle[r][c] !== 0) assert.equal(puzzle[r][c], solution[r][c]);
          }
        }
        for (const { row, col } of fixed) {
          assert.notEqual(puzzle[row][col], 0);
        }
      });
    }

    it("does not modify the solution it carves", () => {
      const rng = new SeededRng("untouched");
      const solution = generateCompleteBoard(rng);
      const before = solution.map((row) => [...row]);
      createPuzzle(solution, "hard", rng);
      assert.deepEqual(solution, before);
    });

    it("honours a blank count override", () => {
      const rng = new SeededRng("override");
      const solution = generateCompleteBoard(rng);

      const none = createPuzzle(solution, "easy", rng, { blankCounts: { easy: 0 } });
      assert.ok(none.ok);
      assert.deepEqual(none.value.puzzle, solution);

      const all = createPuzzle(solution, "easy", rng, { blankCounts: { easy: 81 } });
      assert.ok(all.ok);
      assert.equal(countEmpty(all.value.puzzle), 81);
      assert.equal(all.value.fixed.length, 0);
    });

    const badCounts: [string, number][] = [
      ["negative", -1],
      ["above 81", 82],
      ["fractional", 10.5],
    ];
    for (const [label, count] of badCounts) {
      it(`rejects a ${label} blank count as invalid configuration`, () => {
        const rng = new SeededRng("bad-config");
        const solution = generateCompleteBoard(rng);
        const result = createPuzzle(solution, "medium", rng, {
          blankCounts: { medium: count },
        });
        assert.equal(result.ok, false);
        if (!result.ok) assert.equal(result.error.kind, "invalid_configuration");
      });
    }
  });

  describe("generatePuzzle", () => {
    it("is deterministic — same seed produces same puzzle", () => {
      const a = generatePuzzle("medium", { seed: "same" });
      const b = generatePuzzle("medium", { seed: "same" });
      assert.ok(a.ok && b.ok);
      assert.deepEqual(a.value.puzzle, b.value.puzzle);
      assert.deepEqual(a.value.solution, b.value.solution);
      assert.equal(a.value.seed, "same");
    });

    it("draws a random seed when none is given", () => {
      const result = generatePuzzle("easy");
      assert.ok(result.ok);
      assert.match(result.value.seed, /^[0-9a-f]{16}$/);
      assert.equal(isSolved(result.value.solution), true);
    });

    it("easy puzzles have more clues than hard puzzles", () => {
      const clues = (difficulty: Difficulty) => {
        const result = generatePuzzle(difficulty, { seed: "difficulty-test" });
        assert.ok(result.ok);
        return 81 - countEmpty(result.value.puzzle);
      };
      assert.equal(clues("easy"), 46);
      assert.equal(clues("medium"), 36);
      assert.equal(clues("hard"), 26);
    });
  });
});
