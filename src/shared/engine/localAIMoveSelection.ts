import { AIConfig, AIStrategy } from '../types/game';
import { getEvaluator } from './heuristicEvaluation';
import { bestMove, SearchRng, SearchStats } from './negamax';
import type { Reversi } from './Reversi';
import type { TilePos } from './TilePos';

/**
 * Shared local move-selection policy. Given a state and an AI config,
 * choose a move for the player to move without touching the state.
 *
 * - 'random': uniform pick among the legal placements.
 * - 'negamax': depth-limited negamax with the configured evaluator; the
 *   rng is only consulted when the config asks for leaf noise.
 *
 * Side-effect free and synchronous, so hosts decide how to log or time it.
 */
export type LocalAIRng = SearchRng;

export interface LocalAIChoice {
  /** Null when the player to move has no placement. */
  move: TilePos | null;
  /** Negamax score at the root; null for random play or when no move exists. */
  score: number | null;
  strategy: AIStrategy;
  /** Search nodes visited (0 for random play). */
  nodes: number;
}

export function chooseRandomMove(state: Reversi, rng: LocalAIRng): TilePos | null {
  const moves = state.validMoves();
  if (!moves.length) {
    return null;
  }
  const idx = Math.floor(rng() * moves.length);
  return moves[idx] ?? null;
}

export function chooseLocalAIMove(
  state: Reversi,
  config: AIConfig,
  rng: LocalAIRng,
  clock: () => number = Date.now
): LocalAIChoice {
  if (config.strategy === 'random' || state.isTerminal() || state.mustPass()) {
    return {
      move: config.strategy === 'random' ? chooseRandomMove(state, rng) : null,
      score: null,
      strategy: config.strategy,
      nodes: 0,
    };
  }

  const stats: SearchStats = { nodes: 0, rootMovesSearched: 0 };
  const deadline = config.thinkTimeMs !== undefined ? clock() + config.thinkTimeMs : undefined;
  const result = bestMove(state, config.depth, {
    evaluate: getEvaluator(config.evaluation),
    pruning: config.pruning,
    noise: config.noise,
    rng,
    stats,
    deadline,
    clock,
  });

  return {
    move: result.move,
    score: result.score,
    strategy: 'negamax',
    nodes: stats.nodes,
  };
}
