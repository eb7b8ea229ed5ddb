import { randomBytes } from "node:crypto";
import { SeededRng } from "./prng";
import { SudokuGrid, SIZE, cloneGrid, createEmptyGrid } from "./grid";
import { backtrack, countSolutions } from "./solver";

export interface GenerateOptions {
  /** Reproduces the same puzzle; a random seed is drawn when omitted */
  seed?: string;
}

export interface GeneratedPuzzle {
  puzzle: SudokuGrid;
  solution: SudokuGrid;
  seed: string;
}

export function randomSeed(): string {
  return randomBytes(6).toString("hex");
}

/**
 * Generate a complete valid Sudoku grid using backtracking
 * with the candidate order shuffled at every cell.
 */
export function generateSolvedGrid(rng: SeededRng): SudokuGrid {
  const grid = createEmptyGrid();
  if (!backtrack(grid, () => true, (candidates) => rng.shuffle(candidates))) {
    throw new Error("Failed to build a solved grid");
  }
  return grid;
}

/**
 * Empty cells of a solved grid one at a time, in shuffled order. A cell
 * stays empty only if the grid still has exactly one solution afterwards.
 * Every cell is attempted once.
 */
export function carvePuzzle(solution: SudokuGrid, rng: SeededRng): SudokuGrid {
  const puzzle = cloneGrid(solution);
  const positions = rng.shuffle(Array.from({ length: SIZE * SIZE }, (_, i) => i));

  for (const pos of positions) {
    const r = Math.floor(pos / SIZE);
    const c = pos % SIZE;
    const saved = puzzle[r][c];
    puzzle[r][c] = 0;

    if (countSolutions(puzzle, 2) !== 1) {
      puzzle[r][c] = saved;
    }
  }

  return puzzle;
}

/**
 * Generate a uniquely solvable puzzle together with its solution.
 * Each call seeds its own generator.
 */
export function generatePuzzle(options: GenerateOptions = {}): GeneratedPuzzle {
  const seed = options.seed ?? randomSeed();
  const rng = new SeededRng(seed);
  const solution = generateSolvedGrid(rng);
  const puzzle = carvePuzzle(solution, rng);
  return { puzzle, solution, seed };
}
