export { SudokuModule } from "./rules";
export { SudokuUI, classifyCell } from "./ui";
export type { CellStyle } from "./ui";
export type { SudokuData, SudokuPublicData, SudokuView } from "./state";
export { isClueCell, isEntryCell } from "./state";
export type {
  PlaceDigitAction,
  ClearCellAction,
  ResetAction,
  RevealAction,
} from "./actions";
export type { SudokuGrid, CellRef } from "./grid";
export {
  SIZE,
  BOX,
  createEmptyGrid,
  cloneGrid,
  boxIndex,
  countFilled,
  assertGrid,
  assertCell,
  assertDigit,
} from "./grid";
export {
  isValidPlacement,
  getCandidates,
  findConflicts,
  isConsistent,
  isSolved,
} from "./validator";
export { solve, countSolutions, hasUniqueSolution } from "./solver";
export type { SolveOutcome } from "./solver";
export { generatePuzzle, generateSolvedGrid, carvePuzzle, randomSeed } from "./generator";
export type { GenerateOptions, GeneratedPuzzle } from "./generator";
export { SeededRng } from "./prng";
export { parseGrid, gridToString, formatGrid } from "./format";
