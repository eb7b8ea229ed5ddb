import { GameState, Observation } from "@sudokit/core";
import { cloneGrid } from "./grid";
import { SudokuData, SudokuPublicData } from "./state";

/**
 * Returns the observation for the player.
 * The solution grid stays out of publicData; the board only shows it
 * once the player asked for it.
 */
export function getObservationForPlayer(
  state: GameState<SudokuData>,
  _playerId: string
): Observation<SudokuPublicData> {
  const data = state.data;

  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: {
      board: cloneGrid(data.board),
      puzzle: cloneGrid(data.puzzle),
      revealed: data.revealed,
      seed: data.seed,
    },
  };
}
