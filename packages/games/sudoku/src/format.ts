import { SudokuGrid, SIZE } from "./grid";

const SEPARATOR = "+-------+-------+-------+";

/**
 * Parse an 81-cell grid string. Digits 1-9 are clues, "0" or "." empty;
 * whitespace (including line breaks) is ignored.
 */
export function parseGrid(text: string): SudokuGrid {
  const s = text.replace(/\s+/g, "");
  if (s.length !== SIZE * SIZE) {
    throw new Error(`Grid must have 81 cells, got ${s.length}.`);
  }
  const grid: SudokuGrid = [];
  for (let r = 0; r < SIZE; r++) {
    const row: number[] = [];
    for (let c = 0; c < SIZE; c++) {
      const ch = s[r * SIZE + c];
      if (ch === "." || ch === "0") {
        row.push(0);
      } else if (ch >= "1" && ch <= "9") {
        row.push(Number(ch));
      } else {
        throw new Error(`Invalid character "${ch}" at cell ${r * SIZE + c + 1}.`);
      }
    }
    grid.push(row);
  }
  return grid;
}

/** Compact 81-character form, "." for empty cells */
export function gridToString(grid: SudokuGrid): string {
  return grid.map((row) => row.map((v) => (v === 0 ? "." : String(v))).join("")).join("");
}

/** Boxed multi-line rendering for plain terminals */
export function formatGrid(grid: SudokuGrid): string {
  const lines: string[] = [SEPARATOR];
  grid.forEach((row, r) => {
    const boxes: string[] = [];
    for (let b = 0; b < SIZE; b += 3) {
      boxes.push(row.slice(b, b + 3).map((v) => (v === 0 ? "." : String(v))).join(" "));
    }
    lines.push(`| ${boxes.join(" | ")} |`);
    if (r % 3 === 2) lines.push(SEPARATOR);
  });
  return lines.join("\n");
}
