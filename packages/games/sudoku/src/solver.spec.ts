import { strict as assert } from "assert";
import { SeededRng } from "./prng";
import { SudokuGrid, createEmptyGrid, cloneGrid, boxIndex, countFilled } from "./grid";
import {
  isValidPlacement,
  getCandidates,
  findConflicts,
  isConsistent,
  isSolved,
} from "./validator";
import { solve, countSolutions, hasUniqueSolution, backtrack } from "./solver";
import { generatePuzzle, generateSolvedGrid, carvePuzzle } from "./generator";
import { parseGrid, gridToString, formatGrid } from "./format";

/** A valid solved grid built from shifted rows */
function patternGrid(): SudokuGrid {
  return Array.from({ length: 9 }, (_, r) =>
    Array.from({ length: 9 }, (_, c) => (((r % 3) * 3 + Math.floor(r / 3) + c) % 9) + 1)
  );
}

function assertEveryUnitIsPermutation(grid: SudokuGrid): void {
  const digits = [1, 2, 3, 4, 5, 6, 7, 8, 9];
  const sorted = (values: number[]) => [...values].sort((a, b) => a - b);
  for (let i = 0; i < 9; i++) {
    const row = grid[i];
    const col = grid.map((r) => r[i]);
    const box: number[] = [];
    for (let r = 0; r < 9; r++) {
      for (let c = 0; c < 9; c++) if (boxIndex(r, c) === i) box.push(grid[r][c]);
    }
    assert.deepEqual(sorted(row), digits, `row ${i}`);
    assert.deepEqual(sorted(col), digits, `column ${i}`);
    assert.deepEqual(sorted(box), digits, `box ${i}`);
  }
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

  it("works with an empty seed", () => {
    const rng = new SeededRng("");
    assert.notEqual(rng.next(), 0);
  });

  it("nextInt stays in range", () => {
    const rng = new SeededRng("range");
    for (let i = 0; i < 500; i++) {
      const n = rng.nextInt(9);
      assert.ok(Number.isInteger(n) && n >= 0 && n < 9, `got ${n}`);
    }
  });

  it("shuffle is a deterministic permutation", () => {
    const arr1 = new SeededRng("shuffle").shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    const arr2 = new SeededRng("shuffle").shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    assert.deepEqual(arr1, arr2);
    assert.deepEqual([...arr1].sort(), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("shuffle leaves its input untouched", () => {
    const input = [1, 2, 3, 4, 5];
    new SeededRng("copy").shuffle(input);
    assert.deepEqual(input, [1, 2, 3, 4, 5]);
  });
});

describe("Validator", () => {
  it("isValidPlacement detects row, column and box conflicts", () => {
    const grid = createEmptyGrid();
    grid[0][0] = 5;
    assert.equal(isValidPlacement(grid, 0, 8, 5), false); // same row
    assert.equal(isValidPlacement(grid, 8, 0, 5), false); // same col
    assert.equal(isValidPlacement(grid, 2, 2, 5), false); // same box
    assert.equal(isValidPlacement(grid, 3, 3, 5), true);
    assert.equal(isValidPlacement(grid, 0, 1, 3), true);
  });

  it("ignores the target cell itself", () => {
    const grid = patternGrid();
    assert.equal(isValidPlacement(grid, 4, 4, grid[4][4]), true);
    // Another digit in a full row always clashes
    assert.equal(isValidPlacement(grid, 4, 4, grid[4][5]), false);
  });

  it("rejects every cell of a unit that already holds the digit", () => {
    const grid = createEmptyGrid();
    grid[4][1] = 7;
    for (let i = 0; i < 9; i++) {
      if (i !== 1) assert.equal(isValidPlacement(grid, 4, i, 7), false, `row cell ${i}`);
      if (i !== 4) assert.equal(isValidPlacement(grid, i, 1, 7), false, `col cell ${i}`);
    }
    for (let r = 3; r < 6; r++) {
      for (let c = 0; c < 3; c++) {
        if (r !== 4 || c !== 1) assert.equal(isValidPlacement(grid, r, c, 7), false);
      }
    }
  });

  it("consults the live grid, not a cached state", () => {
    const grid = createEmptyGrid();
    grid[0][0] = 5;
    grid[0][4] = 5;
    for (let c = 0; c < 9; c++) {
      assert.equal(isValidPlacement(grid, 0, c, 5), false, `col ${c}`);
    }
    assert.equal(countSolutions(grid, 2), 0);
    assert.deepEqual(solve(grid), { status: "unsolvable" });

    grid[0][4] = 0;
    assert.equal(isValidPlacement(grid, 0, 0, 5), true);
    assert.equal(isValidPlacement(grid, 0, 4, 5), false);
  });

  it("rejects malformed input", () => {
    const grid = createEmptyGrid();
    assert.throws(() => isValidPlacement(grid, 9, 0, 1), /Invalid row: 9/);
    assert.throws(() => isValidPlacement(grid, 0, -1, 1), /Invalid column: -1/);
    assert.throws(() => isValidPlacement(grid, 0, 0, 0), /Invalid digit: 0/);
    assert.throws(() => isValidPlacement(grid, 0, 0, 10), /Invalid digit: 10/);
    assert.throws(() => isValidPlacement(grid, 1.5, 0, 1), /Invalid row: 1\.5/);
    assert.throws(() => isValidPlacement(grid.slice(0, 8), 0, 0, 1), /expected 9 rows/);

    const badRow = createEmptyGrid();
    badRow[3] = [0, 0, 0];
    assert.throws(() => isValidPlacement(badRow, 0, 0, 1), /row 3 must have 9 cells/);

    const badCell = createEmptyGrid();
    badCell[2][6] = 12;
    assert.throws(() => isValidPlacement(badCell, 0, 0, 1), /cell \(2,6\) holds 12/);
  });

  it("getCandidates returns all digits for an empty grid", () => {
    assert.deepEqual(getCandidates(createEmptyGrid(), 0, 0), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("getCandidates excludes row/col/box values", () => {
    const grid = createEmptyGrid();
    grid[0][1] = 5; // same row
    grid[3][0] = 3; // same col
    grid[1][1] = 7; // same box
    assert.deepEqual(getCandidates(grid, 0, 0), [1, 2, 4, 6, 8, 9]);
  });

  it("findConflicts reports both cells of a clash", () => {
    const grid = createEmptyGrid();
    grid[2][2] = 4;
    grid[0][0] = 4;
    grid[8][8] = 4;
    assert.deepEqual([...findConflicts(grid)].sort(), ["0,0", "2,2"]);
    assert.equal(isConsistent(grid), false);
  });

  it("isSolved rejects incomplete and clashing grids", () => {
    assert.equal(isSolved(createEmptyGrid()), false);

    const almost = patternGrid();
    almost[8][8] = 0;
    assert.equal(isSolved(almost), false);

    const swapped = patternGrid();
    [swapped[0][0], swapped[0][1]] = [swapped[0][1], swapped[0][0]];
    assert.equal(isSolved(swapped), false);
  });

  it("isSolved accepts a valid solution", () => {
    assert.equal(isSolved(patternGrid()), true);
    assert.equal(isConsistent(patternGrid()), true);
  });
});

describe("Solver", () => {
  it("solves an empty grid to the first grid in digit order", () => {
    const outcome = solve(createEmptyGrid());
    assert.equal(outcome.status, "solved");
    if (outcome.status !== "solved") return;

    assert.deepEqual(outcome.grid[0], [1, 2, 3, 4, 5, 6, 7, 8, 9]);
    assert.deepEqual(outcome.grid[1], [4, 5, 6, 7, 8, 9, 1, 2, 3]);
    assert.deepEqual(outcome.grid[2], [7, 8, 9, 1, 2, 3, 4, 5, 6]);
    assertEveryUnitIsPermutation(outcome.grid);
    assert.deepEqual(solve(createEmptyGrid()), outcome);
  });

  it("returns an already solved grid unchanged", () => {
    const grid = patternGrid();
    const first = solve(grid);
    assert.deepEqual(first, { status: "solved", grid: patternGrid() });
    if (first.status !== "solved") return;
    assert.deepEqual(solve(first.grid), first);
  });

  it("does not mutate its input", () => {
    const grid = patternGrid();
    grid[0][0] = 0;
    grid[5][5] = 0;
    const before = cloneGrid(grid);
    solve(grid);
    countSolutions(grid, 2);
    assert.deepEqual(grid, before);
  });

  it("fills a grid with missing cells back to its solution", () => {
    const grid = patternGrid();
    for (let c = 0; c < 9; c++) grid[4][c] = 0;
    grid[0][0] = 0;
    grid[8][3] = 0;
    assert.deepEqual(solve(grid), { status: "solved", grid: patternGrid() });
  });

  it("reports a full but clashing grid as unsolvable", () => {
    const grid = patternGrid();
    [grid[0][0], grid[0][1]] = [grid[0][1], grid[0][0]];
    assert.deepEqual(solve(grid), { status: "unsolvable" });
    assert.equal(countSolutions(grid, 2), 0);
  });

  it("reports a consistent dead end as unsolvable", () => {
    // (0,8) sees 1-8 in its row and 9 in its column
    const grid = createEmptyGrid();
    for (let c = 0; c < 8; c++) grid[0][c] = c + 1;
    grid[5][8] = 9;
    assert.equal(isConsistent(grid), true);
    assert.deepEqual(solve(grid), { status: "unsolvable" });
    assert.equal(countSolutions(grid, 2), 0);
  });

  it("a single missing cell has exactly one solution", () => {
    const grid = patternGrid();
    grid[6][2] = 0;
    assert.equal(countSolutions(grid, 2), 1);
    assert.equal(hasUniqueSolution(grid), true);
  });

  it("a complete valid grid counts as one solution", () => {
    assert.equal(countSolutions(patternGrid(), 2), 1);
  });

  it("stops counting at the limit", () => {
    assert.equal(countSolutions(createEmptyGrid(), 2), 2);
    assert.equal(countSolutions(createEmptyGrid(), 5), 5);
    assert.equal(countSolutions(createEmptyGrid(), 1), 1);
    assert.equal(hasUniqueSolution(createEmptyGrid()), false);
  });

  it("rejects a non-positive limit", () => {
    assert.throws(() => countSolutions(createEmptyGrid(), 0), /Invalid limit: 0/);
    assert.throws(() => countSolutions(createEmptyGrid(), 1.5), /Invalid limit: 1\.5/);
  });
});

describe("backtrack", () => {
  it("follows the given candidate order", () => {
    const grid = createEmptyGrid();
    const descending = (candidates: number[]) => [...candidates].reverse();
    assert.equal(backtrack(grid, () => true, descending), true);
    assert.deepEqual(grid[0], [9, 8, 7, 6, 5, 4, 3, 2, 1]);
    assert.deepEqual(grid[1], [6, 5, 4, 3, 2, 1, 9, 8, 7]);
  });

  it("restores every empty cell when the search runs out", () => {
    const grid = createEmptyGrid();
    grid[0][0] = 5;
    let visited = 0;
    assert.equal(
      backtrack(grid, () => {
        visited++;
        return visited >= 3;
      }),
      true
    );
    assert.equal(visited, 3);

    const dead = createEmptyGrid();
    // (0,8) has no candidate left: 1-8 in its row, 9 in its column
    for (let c = 0; c < 8; c++) dead[0][c] = c + 1;
    dead[1][8] = 9;
    const original = cloneGrid(dead);
    assert.equal(backtrack(dead, () => true), false);
    assert.deepEqual(dead, original);
  });
});

describe("Generator", () => {
  it("builds a complete grid where every unit is a permutation", () => {
    for (const seed of ["full-a", "full-b", "full-c"]) {
      const grid = generateSolvedGrid(new SeededRng(seed));
      assertEveryUnitIsPermutation(grid);
    }
  });

  it("different seeds give different solutions", () => {
    const a = generateSolvedGrid(new SeededRng("one"));
    const b = generateSolvedGrid(new SeededRng("two"));
    assert.notDeepEqual(a, b);
  });

  it("generates a puzzle with a unique solution equal to its pair", () => {
    const { puzzle, solution, seed } = generatePuzzle({ seed: "gen-test" });
    assert.equal(seed, "gen-test");
    assert.equal(isSolved(solution), true);
    assert.equal(countSolutions(puzzle, 2), 1);
    assert.deepEqual(solve(puzzle), { status: "solved", grid: solution });
  });

  it("every clue matches the solution", () => {
    const { puzzle, solution } = generatePuzzle({ seed: "clues" });
    for (let r = 0; r < 9; r++) {
      for (let c = 0; c < 9; c++) {
        if (puzzle[r][c] !== 0) assert.equal(puzzle[r][c], solution[r][c]);
      }
    }
    const clues = countFilled(puzzle);
    assert.ok(clues >= 17 && clues < 81, `Expected 17-80 clues, got ${clues}`);
  });

  it("same seed produces the same puzzle", () => {
    const a = generatePuzzle({ seed: "determinism" });
    const b = generatePuzzle({ seed: "determinism" });
    assert.deepEqual(a, b);
  });

  it("generates each puzzle in under a second", () => {
    for (const seed of ["cli", "timing-17", "determinism"]) {
      const start = Date.now();
      const { puzzle } = generatePuzzle({ seed });
      const ms = Date.now() - start;
      assert.ok(ms < 1000, `seed "${seed}" took ${ms}ms`);
      assert.equal(countSolutions(puzzle, 2), 1);
    }
  });

  it("draws a fresh seed when none is given", () => {
    const a = generatePuzzle();
    const b = generatePuzzle();
    assert.match(a.seed, /^[0-9a-f]{12}$/);
    assert.notEqual(a.seed, b.seed);
    assert.equal(countSolutions(a.puzzle, 2), 1);
  });

  it("carving leaves the solution grid untouched", () => {
    const solution = patternGrid();
    const puzzle = carvePuzzle(solution, new SeededRng("carve"));
    assert.deepEqual(solution, patternGrid());
    assert.equal(countSolutions(puzzle, 2), 1);
    assert.ok(countFilled(puzzle) < 81);
  });
});

describe("Grid format", () => {
  const text =
    "12..5.7.94.6.8.1.3789.........567...5.7.9.2.4......5673.5.7.9.2678.......1.3.5.7.";

  it("parses dots and zeros as empty cells", () => {
    const grid = parseGrid(text.replace(/\./g, "0"));
    assert.deepEqual(grid[0], [1, 2, 0, 0, 5, 0, 7, 0, 9]);
    assert.deepEqual(grid[8], [0, 1, 0, 3, 0, 5, 0, 7, 0]);
  });

  it("ignores whitespace and round-trips the compact form", () => {
    const spaced = text.match(/.{9}/g)?.join("\n") ?? "";
    assert.equal(gridToString(parseGrid(spaced)), text);
  });

  it("rejects the wrong length and stray characters", () => {
    assert.throws(() => parseGrid("123"), /81 cells, got 3/);
    assert.throws(() => parseGrid("x" + text.slice(1)), /Invalid character "x" at cell 1/);
  });

  it("formats a boxed grid", () => {
    const lines = formatGrid(parseGrid(text)).split("\n");
    assert.equal(lines.length, 13);
    assert.equal(lines[0], "+-------+-------+-------+");
    assert.equal(lines[1], "| 1 2 . | . 5 . | 7 . 9 |");
    assert.equal(lines[4], "+-------+-------+-------+");
    assert.equal(lines[12], "+-------+-------+-------+");
  });
});
