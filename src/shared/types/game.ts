import type { TilePos } from '../engine/TilePos';

/** Side length of the (only supported) square board. */
export const BOARD_SIZE = 8;

/**
 * The two piece colours. Black always moves first.
 */
export type Piece = 'black' | 'white';

export const PIECES: readonly Piece[] = ['black', 'white'];

/** Contents of a single tile. */
export type Tile = Piece | null;

/**
 * Lifecycle of a game. Transitions happen only through a successful move
 * (or a forced pass); 'terminal' is absorbing.
 */
export type GamePhase = 'in_progress' | 'terminal';

export type GameOutcome = Piece | 'draw';

export type Scores = Record<Piece, number>;

/**
 * A move is a position plus the piece placed there. It is never stored on
 * its own; it only travels between callers and the engine.
 */
export interface Move {
  position: TilePos;
  player: Piece;
}

/**
 * Payload of a successful move application.
 */
export interface MoveApplication {
  position: TilePos;
  player: Piece;
  /** Captured tiles, in direction order and nearest first within a run. */
  flipped: TilePos[];
  /** Player to move after this move (the mover again if the opponent must pass). */
  nextPlayer: Piece;
  /** True when the opponent had no reply and the mover keeps the turn. */
  opponentPassed: boolean;
  /** True when neither player has a move left. */
  terminal: boolean;
}

/**
 * Result of a negamax search at the root: the chosen move and its score
 * from the point of view of the player to move.
 */
export interface SearchResult {
  move: TilePos;
  score: number;
}

export type AIStrategy = 'random' | 'negamax';

export type EvaluationKind = 'material' | 'positional';

/**
 * Tunables for an automated player.
 */
export interface AIConfig {
  strategy: AIStrategy;
  /** Plies searched by negamax. Ignored by the random strategy. */
  depth: number;
  evaluation: EvaluationKind;
  /** Leaf noise amplitude; 0 keeps the search deterministic. */
  noise: number;
  /** Alpha-beta pruning. Does not change the chosen move or score. */
  pruning: boolean;
  /** Optional wall-clock budget for the root search, in milliseconds. */
  thinkTimeMs?: number;
}
