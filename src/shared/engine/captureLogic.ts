import { Piece } from '../types/game';
import { DIRECTIONS, Direction } from './directions';
import type { Grid } from './Grid';
import { oppositePiece } from './piece';
import { TilePos } from './TilePos';

/**
 * Opponent pieces captured along a single direction if `player` were to
 * play at `pos`. A run counts only when it holds at least one opponent
 * piece and ends on a `player` piece; an empty tile or the board edge
 * before that anchor captures nothing.
 */
export function computeRunFlips(
  grid: Grid,
  pos: TilePos,
  player: Piece,
  direction: Direction
): TilePos[] {
  const opponent = oppositePiece(player);
  const run: TilePos[] = [];

  let current = pos.translate(direction);
  while (current && grid.get(current) === opponent) {
    run.push(current);
    current = current.translate(direction);
  }

  if (current && run.length > 0 && grid.get(current) === player) {
    return run;
  }
  return [];
}

/**
 * All pieces flipped by playing `player` at `pos`, in direction order.
 * Occupied tiles flip nothing.
 */
export function computeFlips(grid: Grid, pos: TilePos, player: Piece): TilePos[] {
  if (grid.get(pos) !== null) {
    return [];
  }
  return DIRECTIONS.flatMap((direction) => computeRunFlips(grid, pos, player, direction));
}

export function isLegalPlacement(grid: Grid, pos: TilePos, player: Piece): boolean {
  if (grid.get(pos) !== null) {
    return false;
  }
  return DIRECTIONS.some((direction) => computeRunFlips(grid, pos, player, direction).length > 0);
}

/** Legal placements for `player`, row-major. */
export function computeValidMoves(grid: Grid, player: Piece): TilePos[] {
  return TilePos.all().filter((pos) => isLegalPlacement(grid, pos, player));
}

export function hasAnyValidMove(grid: Grid, player: Piece): boolean {
  return TilePos.all().some((pos) => isLegalPlacement(grid, pos, player));
}
