export type SudokuGrid = number[][]; // 9x9, values 0 (empty) or 1-9

export const SIZE = 9;
export const BOX = 3;

export interface CellRef {
  row: number;
  col: number;
}

export function createEmptyGrid(): SudokuGrid {
  return Array.from({ length: SIZE }, () => Array<number>(SIZE).fill(0));
}

/** Clone a 9x9 grid */
export function cloneGrid(grid: SudokuGrid): SudokuGrid {
  return grid.map((row) => [...row]);
}

export function boxIndex(row: number, col: number): number {
  return Math.floor(row / BOX) * BOX + Math.floor(col / BOX);
}

export function cellKey(row: number, col: number): string {
  return `${row},${col}`;
}

export function countFilled(grid: SudokuGrid): number {
  let filled = 0;
  for (const row of grid) {
    for (const v of row) if (v !== 0) filled++;
  }
  return filled;
}

function isIndex(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n < SIZE;
}

export function assertCell(row: number, col: number): void {
  if (!isIndex(row)) {
    throw new Error(`Invalid row: ${row}. Must be an integer 0-8.`);
  }
  if (!isIndex(col)) {
    throw new Error(`Invalid column: ${col}. Must be an integer 0-8.`);
  }
}

export function assertDigit(digit: number): void {
  if (!Number.isInteger(digit) || digit < 1 || digit > 9) {
    throw new Error(`Invalid digit: ${digit}. Must be an integer 1-9.`);
  }
}

/** Reject anything that is not 9 rows of 9 integers in 0..9 */
export function assertGrid(grid: SudokuGrid): void {
  if (!Array.isArray(grid) || grid.length !== SIZE) {
    throw new Error(`Invalid grid: expected ${SIZE} rows.`);
  }
  grid.forEach((row, r) => {
    if (!Array.isArray(row) || row.length !== SIZE) {
      throw new Error(`Invalid grid: row ${r} must have ${SIZE} cells.`);
    }
    row.forEach((v, c) => {
      if (!Number.isInteger(v) || v < 0 || v > 9) {
        throw new Error(`Invalid grid: cell (${r},${c}) holds ${v}, expected 0-9.`);
      }
    });
  });
}
