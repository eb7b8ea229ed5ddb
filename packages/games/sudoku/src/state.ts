import { SudokuGrid, CellRef, cloneGrid } from "./grid";

/** The game-specific data stored in GameState.data */
export interface SudokuData {
  /** Working grid: clues plus the player's entries. 0 = empty */
  board: SudokuGrid;
  /** The original puzzle (clue cells). Never changes after init */
  puzzle: SudokuGrid;
  /** The solved grid (hidden from observation) */
  solution: SudokuGrid;
  /** Whether the player asked for the solution */
  revealed: boolean;
  /** Seed the puzzle was generated from */
  seed: string;
}

/** What the player may see of a session */
export interface SudokuPublicData {
  board: SudokuGrid;
  puzzle: SudokuGrid;
  revealed: boolean;
  seed: string;
}

/** Public data plus front-end state that only affects rendering and input */
export interface SudokuView extends SudokuPublicData {
  cursor?: CellRef;
  /** Colour entries by validity (default on) */
  feedback?: boolean;
}

/** Check if a cell is a clue (given) cell */
export function isClueCell(puzzle: SudokuGrid, row: number, col: number): boolean {
  return puzzle[row][col] !== 0;
}

/** Check if a cell holds a digit entered by the player */
export function isEntryCell(data: Pick<SudokuData, "board" | "puzzle">, row: number, col: number): boolean {
  return !isClueCell(data.puzzle, row, col) && data.board[row][col] !== 0;
}

/** Copy of the data with a new working board */
export function withBoard(data: SudokuData, board: SudokuGrid, revealed = data.revealed): SudokuData {
  return {
    board,
    puzzle: cloneGrid(data.puzzle),
    solution: cloneGrid(data.solution),
    revealed,
    seed: data.seed,
  };
}
