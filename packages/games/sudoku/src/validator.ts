import { SudokuGrid, BOX, SIZE, assertCell, assertDigit, assertGrid, cellKey } from "./grid";

/**
 * Placement rule without input checks. Compares `digit` with every other
 * cell of the row, column and box; the target cell itself is skipped.
 */
export function canPlace(grid: SudokuGrid, row: number, col: number, digit: number): boolean {
  for (let c = 0; c < SIZE; c++) {
    if (c !== col && grid[row][c] === digit) return false;
  }
  for (let r = 0; r < SIZE; r++) {
    if (r !== row && grid[r][col] === digit) return false;
  }
  const br = Math.floor(row / BOX) * BOX;
  const bc = Math.floor(col / BOX) * BOX;
  for (let r = br; r < br + BOX; r++) {
    for (let c = bc; c < bc + BOX; c++) {
      if ((r !== row || c !== col) && grid[r][c] === digit) return false;
    }
  }
  return true;
}

/** Digits 1-9 that `canPlace` accepts at (row, col), ascending */
export function candidatesAt(grid: SudokuGrid, row: number, col: number): number[] {
  const result: number[] = [];
  for (let v = 1; v <= 9; v++) {
    if (canPlace(grid, row, col, v)) result.push(v);
  }
  return result;
}

/** True when no filled cell repeats a digit in its row, column or box */
export function gridIsConsistent(grid: SudokuGrid): boolean {
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      const v = grid[r][c];
      if (v !== 0 && !canPlace(grid, r, c, v)) return false;
    }
  }
  return true;
}

/**
 * Check if placing `digit` at (row, col) is valid: the digit must not
 * occur elsewhere in the row, the column or the 3x3 box.
 *
 * The cell may already hold a value; only the other cells are consulted.
 * Throws on out-of-range coordinates, digits or a malformed grid.
 */
export function isValidPlacement(
  grid: SudokuGrid,
  row: number,
  col: number,
  digit: number
): boolean {
  assertGrid(grid);
  assertCell(row, col);
  assertDigit(digit);
  return canPlace(grid, row, col, digit);
}

/** Find candidate digits for cell (row, col) */
export function getCandidates(grid: SudokuGrid, row: number, col: number): number[] {
  assertGrid(grid);
  assertCell(row, col);
  return candidatesAt(grid, row, col);
}

/** Keys ("r,c") of filled cells whose digit clashes with another cell */
export function findConflicts(grid: SudokuGrid): Set<string> {
  assertGrid(grid);
  const conflicts = new Set<string>();
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      const v = grid[r][c];
      if (v !== 0 && !canPlace(grid, r, c, v)) conflicts.add(cellKey(r, c));
    }
  }
  return conflicts;
}

export function isConsistent(grid: SudokuGrid): boolean {
  assertGrid(grid);
  return gridIsConsistent(grid);
}

/** Check if the grid is completely and correctly solved */
export function isSolved(grid: SudokuGrid): boolean {
  assertGrid(grid);
  for (const row of grid) {
    if (row.includes(0)) return false;
  }
  return gridIsConsistent(grid);
}
