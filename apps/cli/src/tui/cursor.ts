import { type CellRef, SIZE } from "@sudokit/game-sudoku";

export type Direction = "up" | "down" | "left" | "right";

/** The subset of Ink's key flags used for movement */
export interface ArrowKeys {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
}

const VIM_KEYS: Record<string, Direction> = {
  k: "up",
  j: "down",
  h: "left",
  l: "right",
};

export function directionFor(input: string, key: ArrowKeys): Direction | null {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  return VIM_KEYS[input] ?? null;
}

/** Move one cell, stopping at the edges of the board */
export function moveCursor(cursor: CellRef, direction: Direction): CellRef {
  const clamp = (n: number) => Math.min(SIZE - 1, Math.max(0, n));
  switch (direction) {
    case "up":
      return { row: clamp(cursor.row - 1), col: cursor.col };
    case "down":
      return { row: clamp(cursor.row + 1), col: cursor.col };
    case "left":
      return { row: cursor.row, col: clamp(cursor.col - 1) };
    case "right":
      return { row: cursor.row, col: clamp(cursor.col + 1) };
  }
}
