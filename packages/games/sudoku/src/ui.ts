import { Action } from "@sudokit/core";
import { GameUISpec } from "@sudokit/engine";
import { SudokuView, isClueCell } from "./state";
import { canPlace } from "./validator";

export type CellStyle = "empty" | "clue" | "valid" | "error" | "entry";

const STYLE_CLASS: Record<Exclude<CellStyle, "empty">, string> = {
  clue: "sudoku-clue",
  valid: "sudoku-valid",
  error: "sudoku-error",
  entry: "sudoku-player",
};

/**
 * How a cell should be drawn. Player entries are checked with the same
 * placement rule the solver prunes with; with feedback off they are
 * drawn neutrally.
 */
export function classifyCell(view: SudokuView, row: number, col: number): CellStyle {
  const val = view.board[row][col];
  if (val === 0) return "empty";
  if (isClueCell(view.puzzle, row, col)) return "clue";
  if (view.feedback === false || view.revealed) return "entry";
  return canPlace(view.board, row, col, val) ? "valid" : "error";
}

function renderCell(view: SudokuView, row: number, col: number): string {
  const style = classifyCell(view, row, col);
  const text = style === "empty" ? "." : String(view.board[row][col]);
  const classes: string[] = style === "empty" ? [] : [STYLE_CLASS[style]];
  if (view.cursor && view.cursor.row === row && view.cursor.col === col) {
    classes.push("sudoku-cursor");
  }
  if (classes.length === 0) return text;
  return `<span class="${classes.join(" ")}">${text}</span>`;
}

function countCells(view: SudokuView): { empty: number; conflicts: number } {
  let empty = 0;
  let conflicts = 0;
  for (let r = 0; r < 9; r++) {
    for (let c = 0; c < 9; c++) {
      const val = view.board[r][c];
      if (val === 0) empty++;
      else if (!isClueCell(view.puzzle, r, c) && !canPlace(view.board, r, c, val)) conflicts++;
    }
  }
  return { empty, conflicts };
}

function cursorAction(view: SudokuView, value: number): Action | null {
  if (!view.cursor) return null;
  const { row, col } = view.cursor;
  if (value === 0) return { type: "clear", data: { row, col } };
  return { type: "place", data: { row, col, value } };
}

export const SudokuUI: GameUISpec<SudokuView> = {
  playerLabels: ["Player"],

  inputHint:
    'Type 1-9 to fill the selected cell, 0 to clear it, or "R C V", "clear R C", "reset", "solve"',

  renderBoard(view: SudokuView): string {
    const lines: string[] = [];
    lines.push("    1 2 3   4 5 6   7 8 9");
    lines.push("  +-------+-------+-------+");

    for (let r = 0; r < 9; r++) {
      if (r > 0 && r % 3 === 0) {
        lines.push("  +-------+-------+-------+");
      }
      let row = `${r + 1} |`;
      for (let c = 0; c < 9; c++) {
        if (c > 0 && c % 3 === 0) row += "|";
        row += ` ${renderCell(view, r, c)}`;
        if (c % 3 === 2) row += " ";
      }
      row += "|";
      lines.push(row);
    }
    lines.push("  +-------+-------+-------+");

    return lines.join("\n");
  },

  renderStatus(view: SudokuView): string | null {
    if (view.revealed) return "Solution revealed.";

    const { empty, conflicts } = countCells(view);
    if (empty === 0) {
      return conflicts === 0 ? "Solved!" : "Board is full, but some entries clash.";
    }

    const remaining = `${empty} ${empty === 1 ? "cell" : "cells"} remaining`;
    if (view.feedback === false || conflicts === 0) return remaining;
    return `${remaining}, ${conflicts} in conflict`;
  },

  parseInput(raw: string, view: SudokuView): Action | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "reset") return { type: "reset", data: {} };
    if (trimmed === "solve") return { type: "reveal", data: {} };

    // Single key at the cursor
    if (/^[1-9]$/.test(trimmed)) return cursorAction(view, Number(trimmed));
    if (trimmed === "0" || trimmed === ".") return cursorAction(view, 0);

    // "clear R C"
    const clearMatch = trimmed.match(/^clear\s+([1-9])\s+([1-9])$/);
    if (clearMatch) {
      return {
        type: "clear",
        data: { row: Number(clearMatch[1]) - 1, col: Number(clearMatch[2]) - 1 },
      };
    }

    // "R C V" places a digit
    const placeMatch = trimmed.match(/^([1-9])\s+([1-9])\s+([1-9])$/);
    if (placeMatch) {
      return {
        type: "place",
        data: {
          row: Number(placeMatch[1]) - 1,
          col: Number(placeMatch[2]) - 1,
          value: Number(placeMatch[3]),
        },
      };
    }

    return null;
  },

  formatAction(action: Action): string {
    const { row, col, value } = action.data;
    const at =
      typeof row === "number" && typeof col === "number" ? `(${row + 1},${col + 1})` : "(?)";
    switch (action.type) {
      case "place":
        return `place ${String(value)} at ${at}`;
      case "clear":
        return `clear ${at}`;
      case "reset":
        return "clear all entries";
      case "reveal":
        return "reveal solution";
      default:
        return action.type;
    }
  },

  getPlayerLabel(_playerId: string, _view: SudokuView): string {
    return "Player";
  },
};
