import { GameConfig, GameState, Action, Outcome, Observation } from "@sudokit/core";
import { IGameModule } from "@sudokit/engine";
import { SudokuUI } from "./ui";
import { SudokuData, SudokuPublicData, isClueCell, isEntryCell, withBoard } from "./state";
import { cloneGrid } from "./grid";
import {
  isPlaceDigitAction,
  isClearCellAction,
  isResetAction,
  isRevealAction,
  isFinished,
  getLegalActionsForPlayer,
} from "./actions";
import { getObservationForPlayer } from "./observation";
import { generatePuzzle } from "./generator";
import { solve } from "./solver";
import { isSolved } from "./validator";

function nextState(state: GameState<SudokuData>, data: SudokuData): GameState<SudokuData> {
  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber + 1,
    data,
  };
}

export const SudokuModule: IGameModule<SudokuData, SudokuPublicData> = {
  gameId: "sudoku",
  name: "Sudoku",
  description:
    "Classic 9x9 Sudoku puzzle. Fill the grid so every row, column, and 3x3 box contains 1-9.",
  minPlayers: 1,
  maxPlayers: 1,
  ui: SudokuUI,

  init(config: GameConfig, players: string[], rngSeed: string): GameState<SudokuData> {
    if (players.length !== 1) {
      throw new Error("Sudoku requires exactly 1 player");
    }

    const { puzzle, solution, seed } = generatePuzzle({ seed: rngSeed });

    return {
      gameId: config.gameId,
      players,
      currentPlayer: players[0],
      turnNumber: 0,
      data: {
        board: cloneGrid(puzzle),
        puzzle,
        solution,
        revealed: false,
        seed,
      },
    };
  },

  validateAction(state: GameState<SudokuData>, playerId: string, action: Action): boolean {
    if (state.currentPlayer !== playerId) return false;

    const data = state.data;
    if (isFinished(data)) return false;

    if (isResetAction(action) || isRevealAction(action)) return true;

    if (isPlaceDigitAction(action)) {
      const { row, col } = action.data;
      return !isClueCell(data.puzzle, row, col);
    }

    if (isClearCellAction(action)) {
      const { row, col } = action.data;
      return isEntryCell(data, row, col);
    }

    return false;
  },

  applyAction(state: GameState<SudokuData>, _playerId: string, action: Action): GameState<SudokuData> {
    const data = state.data;

    if (isPlaceDigitAction(action)) {
      const { row, col, value } = action.data;
      const board = cloneGrid(data.board);
      board[row][col] = value;
      return nextState(state, withBoard(data, board));
    }

    if (isClearCellAction(action)) {
      const { row, col } = action.data;
      const board = cloneGrid(data.board);
      board[row][col] = 0;
      return nextState(state, withBoard(data, board));
    }

    if (isResetAction(action)) {
      return nextState(state, withBoard(data, cloneGrid(data.puzzle)));
    }

    if (isRevealAction(action)) {
      const outcome = solve(data.puzzle);
      if (outcome.status === "unsolvable") {
        throw new Error("Puzzle has no solution");
      }
      return nextState(state, withBoard(data, outcome.grid, true));
    }

    throw new Error(`Invalid action type: ${action.type}`);
  },

  isTerminal(state: GameState<SudokuData>): boolean {
    return isFinished(state.data);
  },

  getOutcome(state: GameState<SudokuData>): Outcome {
    const data = state.data;
    const player = state.players[0];

    if (data.revealed) {
      return {
        winner: null,
        draw: false,
        scores: { [player]: 0 },
        reason: "revealed",
      };
    }

    if (isSolved(data.board)) {
      return {
        winner: player,
        draw: false,
        scores: { [player]: 1 },
        reason: "puzzle_solved",
      };
    }

    return {
      winner: null,
      draw: false,
      scores: {},
      reason: "game_in_progress",
    };
  },

  getObservation(state: GameState<SudokuData>, playerId: string): Observation<SudokuPublicData> {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState<SudokuData>, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
