import { SudokuGrid, SIZE, assertGrid, boxIndex, cloneGrid } from "./grid";
import { gridIsConsistent } from "./validator";

export type SolveOutcome =
  | { status: "solved"; grid: SudokuGrid }
  | { status: "unsolvable" };

/** Orders the candidates tried at one search node */
export type CandidateOrder = (candidates: number[]) => number[];

/** Called on each completed grid; return true to stop the search */
export type SolutionVisitor = (grid: SudokuGrid) => boolean;

const ALL_DIGITS = 0x1ff;

/** Bit for digit 1-9 in a used-digit mask */
function digitBit(digit: number): number {
  return 1 << (digit - 1);
}

/** Digit of a single-bit mask */
function bitDigit(bit: number): number {
  return 32 - Math.clz32(bit);
}

function maskDigits(mask: number): number[] {
  const digits: number[] = [];
  for (let m = mask; m !== 0; m &= m - 1) {
    digits.push(bitDigit(m & -m));
  }
  return digits;
}

/**
 * Depth-first search state over one grid. Used digits are kept as 9-bit
 * masks per row, column and box, updated in place on every place and
 * unplace, so a node's candidates are `~(row | col | box)`.
 * The grid must be consistent.
 */
class GridSearch {
  private rows = new Uint16Array(SIZE);
  private cols = new Uint16Array(SIZE);
  private boxes = new Uint16Array(SIZE);
  /** Empty cells as row * 9 + col, row-major */
  private empties: number[] = [];

  constructor(
    private grid: SudokuGrid,
    private visit: SolutionVisitor,
    private order?: CandidateOrder
  ) {
    for (let r = 0; r < SIZE; r++) {
      for (let c = 0; c < SIZE; c++) {
        const v = grid[r][c];
        if (v === 0) {
          this.empties.push(r * SIZE + c);
        } else {
          this.mark(r, c, digitBit(v));
        }
      }
    }
  }

  private mark(row: number, col: number, bit: number): void {
    this.rows[row] ^= bit;
    this.cols[col] ^= bit;
    this.boxes[boxIndex(row, col)] ^= bit;
  }

  private tryDigit(row: number, col: number, digit: number, depth: number): boolean {
    const bit = digitBit(digit);
    this.grid[row][col] = digit;
    this.mark(row, col, bit);
    if (this.run(depth + 1)) return true;
    this.mark(row, col, bit);
    return false;
  }

  run(depth: number = 0): boolean {
    if (depth === this.empties.length) return this.visit(this.grid);

    const cell = this.empties[depth];
    const row = Math.floor(cell / SIZE);
    const col = cell % SIZE;
    const free = ~(this.rows[row] | this.cols[col] | this.boxes[boxIndex(row, col)]) & ALL_DIGITS;

    if (this.order) {
      for (const v of this.order(maskDigits(free))) {
        if (this.tryDigit(row, col, v, depth)) return true;
      }
    } else {
      // Lowest set bit first: ascending digits
      for (let m = free; m !== 0; m &= m - 1) {
        if (this.tryDigit(row, col, bitDigit(m & -m), depth)) return true;
      }
    }

    this.grid[row][col] = 0;
    return false;
  }
}

/**
 * Depth-first search over the first empty cell in row-major order:
 * place a candidate, recurse, and clear the cell again when the subtree
 * is exhausted. Digits go in ascending order unless `order` is given.
 * Returns true once `visit` asks to stop; the grid is then left holding
 * the completed solution.
 */
export function backtrack(
  grid: SudokuGrid,
  visit: SolutionVisitor,
  order?: CandidateOrder
): boolean {
  return new GridSearch(grid, visit, order).run();
}

/**
 * Solve a grid, trying digits 1-9 in increasing order at each cell.
 * Deterministic. Clues that already clash make the grid unsolvable even
 * when it has no empty cell left.
 */
export function solve(grid: SudokuGrid): SolveOutcome {
  assertGrid(grid);
  if (!gridIsConsistent(grid)) return { status: "unsolvable" };

  const work = cloneGrid(grid);
  if (backtrack(work, () => true)) {
    return { status: "solved", grid: work };
  }
  return { status: "unsolvable" };
}

/**
 * Count solutions up to `limit`. Returns the count (capped at limit).
 * Used to verify unique solution during puzzle generation.
 */
export function countSolutions(grid: SudokuGrid, limit: number = 2): number {
  assertGrid(grid);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid limit: ${limit}. Must be a positive integer.`);
  }
  if (!gridIsConsistent(grid)) return 0;

  let count = 0;
  backtrack(cloneGrid(grid), () => {
    count++;
    return count >= limit;
  });
  return count;
}

export function hasUniqueSolution(grid: SudokuGrid): boolean {
  return countSolutions(grid, 2) === 1;
}
