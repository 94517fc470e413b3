import { BOARD_SIZE, EvaluationKind, Piece } from '../types/game';
import { oppositePiece } from './piece';
import type { Reversi } from './Reversi';
import { TilePos } from './TilePos';

/**
 * Static position score from `perspective`'s point of view. Evaluators
 * must be antisymmetric (`e(s, p) === -e(s, opposite(p))`) so that the
 * negamax sign flip is sound.
 */
export type Evaluator = (state: Reversi, perspective: Piece) => number;

export const CORNER_BONUS = 4;
export const SIDE_BONUS = 2;

const LAST = BOARD_SIZE - 1;

const CORNERS: readonly TilePos[] = [
  TilePos.of(0, 0),
  TilePos.of(0, LAST),
  TilePos.of(LAST, 0),
  TilePos.of(LAST, LAST),
];

/**
 * Edge tiles, one entry per edge they sit on. Corners appear twice, so
 * they collect the side bonus once for each edge.
 */
const EDGE_ENTRIES: readonly TilePos[] = (() => {
  const entries: TilePos[] = [];
  for (let i = 0; i < BOARD_SIZE; i++) {
    entries.push(TilePos.of(i, 0), TilePos.of(i, LAST));
  }
  for (let i = 0; i < BOARD_SIZE; i++) {
    entries.push(TilePos.of(0, i), TilePos.of(LAST, i));
  }
  return entries;
})();

/** Piece-count differential. */
export function evaluateMaterial(state: Reversi, perspective: Piece): number {
  const scores = state.scores();
  return scores[perspective] - scores[oppositePiece(perspective)];
}

/**
 * Material plus bonuses for corners and edges, which cannot be flipped
 * back as easily as interior tiles.
 */
export function evaluatePositional(state: Reversi, perspective: Piece): number {
  let score = evaluateMaterial(state, perspective);

  const award = (pos: TilePos, value: number): void => {
    const owner = state.tileAt(pos);
    if (owner === null) return;
    score += owner === perspective ? value : -value;
  };

  for (const corner of CORNERS) {
    award(corner, CORNER_BONUS);
  }
  for (const edge of EDGE_ENTRIES) {
    award(edge, SIDE_BONUS);
  }

  return score;
}

const EVALUATORS: Record<EvaluationKind, Evaluator> = {
  material: evaluateMaterial,
  positional: evaluatePositional,
};

export function getEvaluator(kind: EvaluationKind): Evaluator {
  return EVALUATORS[kind];
}
