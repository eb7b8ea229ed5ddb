export type GameData = Record<string, unknown>;

export interface GameConfig {
  gameId: string;
  version: string;
  settings?: Record<string, unknown>;
}

export interface GameState<TData = GameData> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  data: TData;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

export interface Observation<TPublic = GameData> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  publicData: TPublic;
}

/** One applied action in a session's move history */
export interface HistoryEntry {
  sequence: number;
  playerId: string;
  action: Action;
  timestamp: number;
}
