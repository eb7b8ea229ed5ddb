import { GameConfig, GameData, GameState, Action, Outcome, Observation } from "@sudokit/core";

// ---------------------------------------------------------------------------
// Game UI specification, shipped by each game module for rendering
// ---------------------------------------------------------------------------

/**
 * UI specification that each game module provides so that a front end can
 * render the game without hardcoded per-game logic.
 *
 * Board output may wrap fragments in `<span class="...">` tags; front ends
 * map the classes to their own styling.
 */
export interface GameUISpec<TPublic = GameData> {
  /** Player role labels in order (e.g. ["Player"]) */
  playerLabels: string[];

  /** Hint text shown under the board (e.g. "Enter 1-9") */
  inputHint: string;

  /** Render the board as an ASCII string from publicData. */
  renderBoard(publicData: TPublic): string;

  /** Render a one-line status string, or null if nothing special. */
  renderStatus(publicData: TPublic): string | null;

  /** Parse raw user input into an Action, or return null if invalid. */
  parseInput(raw: string, publicData: TPublic): Action | null;

  /** Format an Action as a human-readable string for move history. */
  formatAction(action: Action): string;

  /** Get the display label for a player. */
  getPlayerLabel(playerId: string, publicData: TPublic): string;
}

// ---------------------------------------------------------------------------
// Game module ABI
// ---------------------------------------------------------------------------

/**
 * The function set every game module implements.
 *
 * Every function must be deterministic given the same inputs, so a session
 * can be replayed from its seed and move history.
 */
export interface IGameModule<TData = GameData, TPublic = GameData> {
  /** Unique identifier for this game (e.g., "sudoku") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the game */
  readonly description: string;

  /** Number of players required */
  readonly minPlayers: number;
  readonly maxPlayers: number;

  /** UI rendering specification. */
  readonly ui?: GameUISpec<TPublic>;

  /** Initialize a new game state */
  init(config: GameConfig, players: string[], rngSeed: string): GameState<TData>;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState<TData>, playerId: string, action: Action): boolean;

  /** Apply an action and return the new state (must be deterministic) */
  applyAction(state: GameState<TData>, playerId: string, action: Action): GameState<TData>;

  /** Check if the game has ended */
  isTerminal(state: GameState<TData>): boolean;

  /** Get the outcome of a game state */
  getOutcome(state: GameState<TData>): Outcome;

  /** Get the observable state for a specific player (hides private info) */
  getObservation(state: GameState<TData>, playerId: string): Observation<TPublic>;

  /** Get all legal actions for a player in the current state */
  getLegalActions(state: GameState<TData>, playerId: string): Action[];
}
