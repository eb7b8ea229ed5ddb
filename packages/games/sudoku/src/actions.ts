import { Action, GameState } from "@sudokit/core";
import { SudokuData, isClueCell, isEntryCell } from "./state";
import { isSolved } from "./validator";

/** Place a digit action */
export interface PlaceDigitAction extends Action {
  type: "place";
  data: { row: number; col: number; value: number };
}

/** Clear a cell action */
export interface ClearCellAction extends Action {
  type: "clear";
  data: { row: number; col: number };
}

/** Remove every player entry, back to the original puzzle */
export interface ResetAction extends Action {
  type: "reset";
  data: Record<string, never>;
}

/** Fill the board with the solution and end the game */
export interface RevealAction extends Action {
  type: "reveal";
  data: Record<string, never>;
}

function isIndex(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 8;
}

export function isPlaceDigitAction(action: Action): action is PlaceDigitAction {
  const { row, col, value } = action.data;
  return (
    action.type === "place" &&
    isIndex(row) &&
    isIndex(col) &&
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 1 &&
    value <= 9
  );
}

export function isClearCellAction(action: Action): action is ClearCellAction {
  return action.type === "clear" && isIndex(action.data.row) && isIndex(action.data.col);
}

export function isResetAction(action: Action): action is ResetAction {
  return action.type === "reset";
}

export function isRevealAction(action: Action): action is RevealAction {
  return action.type === "reveal";
}

/** Finished sessions accept no further actions */
export function isFinished(data: SudokuData): boolean {
  return data.revealed || isSolved(data.board);
}

export function getLegalActionsForPlayer(state: GameState<SudokuData>, playerId: string): Action[] {
  if (state.currentPlayer !== playerId) return [];

  const data = state.data;
  if (isFinished(data)) return [];

  const actions: Action[] = [];

  for (let r = 0; r < 9; r++) {
    for (let c = 0; c < 9; c++) {
      if (isClueCell(data.puzzle, r, c)) continue;
      for (let v = 1; v <= 9; v++) {
        actions.push({ type: "place", data: { row: r, col: c, value: v } });
      }
      if (isEntryCell(data, r, c)) {
        actions.push({ type: "clear", data: { row: r, col: c } });
      }
    }
  }

  actions.push({ type: "reset", data: {} });
  actions.push({ type: "reveal", data: {} });

  return actions;
}
