import { GameState, Action, Outcome, Observation, HistoryEntry } from "@sudokit/core";
import { IGameModule } from "./interfaces/IGameModule";

export interface SessionOrchestratorOptions<TData, TPublic> {
  game: IGameModule<TData, TPublic>;
  players: string[];
  rngSeed: string;
  settings?: Record<string, unknown>;
  /** Clock used to stamp history entries */
  now?: () => number;
}

export interface SubmitResult<TPublic> {
  observation: Observation<TPublic>;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Orchestrates a single game session: validates moves, applies state
 * transitions, and records the move history.
 */
export class SessionOrchestrator<TData, TPublic> {
  private game: IGameModule<TData, TPublic>;
  private state: GameState<TData>;
  private history: HistoryEntry[] = [];
  private now: () => number;
  readonly rngSeed: string;
  readonly startedAt: number;

  constructor(opts: SessionOrchestratorOptions<TData, TPublic>) {
    this.game = opts.game;
    this.rngSeed = opts.rngSeed;
    this.now = opts.now ?? Date.now;

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.state = opts.game.init(config, opts.players, opts.rngSeed);
    this.startedAt = this.now();
  }

  getState(): GameState<TData> {
    return this.state;
  }

  getCurrentPlayer(): string {
    return this.state.currentPlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(playerId: string): Observation<TPublic> {
    return this.game.getObservation(this.state, playerId);
  }

  getLegalActions(playerId: string): Action[] {
    return this.game.getLegalActions(this.state, playerId);
  }

  getHistory(): HistoryEntry[] {
    return [...this.history];
  }

  /**
   * Submit a move. Returns the new observation or throws if invalid.
   */
  submitAction(playerId: string, action: Action): SubmitResult<TPublic> {
    if (this.isTerminal()) {
      throw new Error("Game is already over");
    }

    if (this.state.currentPlayer !== playerId) {
      throw new Error(`Not your turn. Current player: ${this.state.currentPlayer}`);
    }

    if (!this.game.validateAction(this.state, playerId, action)) {
      throw new Error(`Invalid action: ${action.type}`);
    }

    this.state = this.game.applyAction(this.state, playerId, action);
    this.history.push({
      sequence: this.history.length,
      playerId,
      action,
      timestamp: this.now(),
    });

    const terminal = this.game.isTerminal(this.state);
    const observation = this.game.getObservation(this.state, playerId);

    return {
      observation,
      terminal,
      outcome: terminal ? this.game.getOutcome(this.state) : undefined,
    };
  }
}
