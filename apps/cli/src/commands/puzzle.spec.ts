import { strict as assert } from "assert";
import { formatGrid, generatePuzzle, gridToString, parseGrid } from "@sudokit/game-sudoku";
import { runGenerate, runSolve } from "./puzzle.js";

// Rows shifted by 3, 3, then 1 form a valid solved grid
const SOLVED = [
  "123456789",
  "456789123",
  "789123456",
  "234567891",
  "567891234",
  "891234567",
  "345678912",
  "678912345",
  "912345678",
].join("");

describe("generate command", () => {
  it("prints puzzle and solution on one line each when compact", () => {
    const out = runGenerate({ seed: "cli", compact: true });
    const expected = generatePuzzle({ seed: "cli" });
    assert.equal(out.exitCode, 0);
    assert.deepEqual(out.lines, [gridToString(expected.puzzle), gridToString(expected.solution)]);
  });

  it("prints the seed and boxed grids by default", () => {
    const out = runGenerate({ seed: "cli" });
    assert.equal(out.lines[0], "Seed: cli");
    assert.match(out.lines[2], /^Puzzle \(\d+ clues\):$/);
    assert.equal(out.lines[5], "Solution:");
    assert.equal(out.lines[6].split("\n").length, 13);
  });
});

describe("solve command", () => {
  it("fills a grid with one missing cell", () => {
    const out = runSolve("." + SOLVED.slice(1), {});
    assert.equal(out.exitCode, 0);
    assert.deepEqual(out.lines, [formatGrid(parseGrid(SOLVED))]);
  });

  it("reports an unsolvable grid with exit code 1", () => {
    const out = runSolve("11" + ".".repeat(79), {});
    assert.deepEqual(out, { lines: ["No solution."], exitCode: 1 });
  });

  it("counts solutions", () => {
    assert.deepEqual(runSolve(SOLVED, { count: true }), { lines: ["unique"], exitCode: 0 });
    assert.deepEqual(runSolve(".".repeat(81), { count: true }), { lines: ["multiple"], exitCode: 0 });
    assert.deepEqual(runSolve("11" + ".".repeat(79), { count: true }), { lines: ["none"], exitCode: 1 });
  });

  it("throws on malformed input", () => {
    assert.throws(() => runSolve("123", {}), /Grid must have 81 cells, got 3\./);
  });
});
