import { Piece, SearchResult } from '../types/game';
import { EngineError, EngineErrorCode, RulesViolation, TerminalStateViolation } from './errors';
import { Evaluator, evaluateMaterial } from './heuristicEvaluation';
import type { Reversi } from './Reversi';
import type { TilePos } from './TilePos';

/** Source of uniform floats in [0, 1). */
export type SearchRng = () => number;

export interface SearchStats {
  /** Positions visited, root children included. */
  nodes: number;
  /** Root moves that were fully scored before the search returned. */
  rootMovesSearched: number;
}

export interface NegamaxOptions {
  /** Static evaluator for leaves. Defaults to the piece-count differential. */
  evaluate?: Evaluator;
  /** Alpha-beta pruning; same move and score, fewer nodes. */
  pruning?: boolean;
  /**
   * Amplitude of integer noise in [-noise, noise) added to each leaf
   * evaluation. Requires `rng`; 0 (the default) keeps the search
   * deterministic.
   */
  noise?: number;
  rng?: SearchRng;
  /** Filled in when provided. */
  stats?: SearchStats;
  /**
   * Wall-clock deadline (same clock as `clock`). Checked between root
   * moves only; the first root move is always scored.
   */
  deadline?: number;
  clock?: () => number;
}

interface SearchContext {
  evaluate: Evaluator;
  pruning: boolean;
  noise: number;
  rng: SearchRng | undefined;
  stats: SearchStats;
}

function buildContext(options: NegamaxOptions): SearchContext {
  const noise = options.noise ?? 0;
  if (!Number.isInteger(noise) || noise < 0) {
    throw new EngineError(
      EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
      `Search noise must be a non-negative integer, got ${noise}`,
      { noise },
      'Negamax'
    );
  }
  if (noise > 0 && !options.rng) {
    throw new EngineError(
      EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
      'Search noise requires an rng',
      { noise },
      'Negamax'
    );
  }
  return {
    evaluate: options.evaluate ?? evaluateMaterial,
    pruning: options.pruning ?? false,
    noise,
    rng: options.rng,
    stats: options.stats ?? { nodes: 0, rootMovesSearched: 0 },
  };
}

function leafValue(state: Reversi, perspective: Piece, ctx: SearchContext): number {
  const value = ctx.evaluate(state, perspective);
  if (ctx.noise > 0 && ctx.rng) {
    return value + Math.floor(ctx.rng() * 2 * ctx.noise) - ctx.noise;
  }
  return value;
}

/**
 * Value of `state` for the player to move in it. With pruning disabled the
 * window is ignored; with pruning enabled the result is exact whenever it
 * falls strictly inside (alpha, beta) and a bound otherwise (fail-soft).
 */
function search(
  state: Reversi,
  depth: number,
  alpha: number,
  beta: number,
  ctx: SearchContext
): number {
  ctx.stats.nodes++;
  const mover = state.currentPlayer();

  if (depth <= 0 || state.isTerminal()) {
    return leafValue(state, mover, ctx);
  }

  if (state.mustPass()) {
    const passed = state.clone();
    passed.passTurn();
    return -search(passed, depth - 1, -beta, -alpha, ctx);
  }

  let best = -Infinity;
  for (const move of state.validMoves(mover)) {
    const value = childValue(state, move, mover, depth, alpha, beta, ctx);
    if (value > best) {
      best = value;
    }
    if (ctx.pruning) {
      alpha = Math.max(alpha, value);
      if (alpha >= beta) break;
    }
  }
  return best;
}

/**
 * Value, from `mover`'s side, of playing `move` in `state`. The child keeps
 * the same perspective when the opponent has to pass, so only a real change
 * of side negates the score.
 */
function childValue(
  state: Reversi,
  move: TilePos,
  mover: Piece,
  depth: number,
  alpha: number,
  beta: number,
  ctx: SearchContext
): number {
  const child = state.clone();
  child.applyMoveOrThrow(move, mover);
  if (child.currentPlayer() === mover) {
    return search(child, depth - 1, alpha, beta, ctx);
  }
  return -search(child, depth - 1, -beta, -alpha, ctx);
}

/**
 * Negamax value of `state` seen by `perspective`.
 *
 * At depth 0 or on a terminal state this is the static evaluation with no
 * recursion. Otherwise the player to move picks the successor that is best
 * for them; a forced pass recurses one ply deeper on the same position.
 */
export function negamaxScore(
  state: Reversi,
  depth: number,
  perspective: Piece,
  options: NegamaxOptions = {}
): number {
  const ctx = buildContext(options);
  if (depth <= 0 || state.isTerminal()) {
    ctx.stats.nodes++;
    return leafValue(state, perspective, ctx);
  }
  const value = search(state, depth, -Infinity, Infinity, ctx);
  return perspective === state.currentPlayer() ? value : -value;
}

/**
 * Best move for the player to move, searching `depth` plies.
 *
 * Root moves are tried in `validMoves` order and only a strictly better
 * score replaces the current choice, so ties go to the first move.
 *
 * @throws TerminalStateViolation when the game is over
 * @throws RulesViolation when the player to move has to pass
 */
export function bestMove(state: Reversi, depth: number, options: NegamaxOptions = {}): SearchResult {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new EngineError(
      EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
      `Search depth must be a positive integer, got ${depth}`,
      { depth },
      'Negamax'
    );
  }
  if (state.isTerminal()) {
    throw new TerminalStateViolation('Cannot search a finished game', {}, 'Negamax');
  }

  const mover = state.currentPlayer();
  const moves = state.validMoves(mover);
  const first = moves[0];
  if (!first) {
    throw new RulesViolation(
      EngineErrorCode.RULES_NO_VALID_MOVE,
      `${mover} has no valid move and must pass`,
      { player: mover },
      'Negamax'
    );
  }

  const ctx = buildContext(options);
  const clock = options.clock ?? Date.now;
  ctx.stats.nodes++;

  let result: SearchResult = { move: first, score: -Infinity };
  let searched = 0;
  for (const move of moves) {
    if (searched > 0 && options.deadline !== undefined && clock() >= options.deadline) {
      break;
    }
    const alpha = ctx.pruning ? result.score : -Infinity;
    const score = childValue(state, move, mover, depth, alpha, Infinity, ctx);
    searched++;
    ctx.stats.rootMovesSearched++;
    if (score > result.score) {
      result = { move, score };
    }
  }

  return result;
}
