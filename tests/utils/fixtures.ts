/**
 * Test Fixtures and Utilities
 * Common positions and helper functions for engine tests
 */

import { Grid } from '../../src/shared/engine/Grid';
import { Reversi } from '../../src/shared/engine/Reversi';
import { TilePos } from '../../src/shared/engine/TilePos';
import type { Piece } from '../../src/shared/types/game';
import { SeededRNG } from '../../src/shared/utils/rng';

/**
 * Position helper - shorthand for TilePos.of
 */
export function pos(row: number, col: number): TilePos {
  return TilePos.of(row, col);
}

/**
 * `"r,c"` keys, for comparing position lists with toEqual.
 */
export function keys(positions: readonly TilePos[]): string[] {
  return positions.map((p) => p.toKey());
}

export function stateFromRows(rows: readonly string[], currentPlayer: Piece): Reversi {
  return Reversi.fromGrid(Grid.fromRows(rows), currentPlayer);
}

/**
 * Black's only piece sits in the top-left corner next to a lone white
 * piece, and the same pair repeats on the bottom row. White has no move;
 * black can capture at C1 and at C8.
 */
export const CORNER_PAIRS_ROWS: readonly string[] = [
  'BW......',
  '........',
  '........',
  '........',
  '........',
  '........',
  '........',
  'BW......',
];

/** Full of black except A1: nobody can move. */
export const DEAD_BOARD_ROWS: readonly string[] = [
  '.BBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
  'BBBBBBBB',
];

/**
 * Random legal playout from the opening, `plies` moves long or until the
 * game ends. Same seed, same game.
 */
export function playRandomGame(seed: number, plies: number): Reversi {
  const rng = new SeededRNG(seed);
  const state = Reversi.initial();
  for (let i = 0; i < plies && !state.isTerminal(); i++) {
    const moves = state.validMoves();
    state.applyMoveOrThrow(moves[rng.nextInt(0, moves.length)]);
  }
  return state;
}

/** Treat -0 as 0 so scores can be compared with toBe. */
export function normalizeScore(value: number): number {
  return value === 0 ? 0 : value;
}
