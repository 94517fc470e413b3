import { BOARD_SIZE } from '../types/game';
import { Direction, DIRECTIONS } from './directions';
import { BoardConstraintViolation, EngineErrorCode } from './errors';

function inBounds(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < BOARD_SIZE;
}

/**
 * Coordinate of a tile. Instances only exist for on-board coordinates, so
 * code holding a TilePos never needs to re-check bounds.
 */
export class TilePos {
  private static readonly cache: TilePos[] = TilePos.buildCache();

  private constructor(
    readonly row: number,
    readonly col: number
  ) {}

  private static buildCache(): TilePos[] {
    const cache: TilePos[] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        cache.push(new TilePos(row, col));
      }
    }
    return cache;
  }

  /**
   * Returns the position at (row, col), or null when either coordinate is
   * not an integer in [0, BOARD_SIZE).
   */
  static create(row: number, col: number): TilePos | null {
    if (!inBounds(row) || !inBounds(col)) {
      return null;
    }
    return TilePos.cache[row * BOARD_SIZE + col] ?? null;
  }

  /**
   * Like {@link TilePos.create} but throws a BoardConstraintViolation for
   * off-board coordinates.
   */
  static of(row: number, col: number): TilePos {
    const pos = TilePos.create(row, col);
    if (!pos) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Position (${row}, ${col}) is outside the ${BOARD_SIZE}x${BOARD_SIZE} board`,
        { row, col }
      );
    }
    return pos;
  }

  /** Every position on the board, row-major. */
  static all(): readonly TilePos[] {
    return TilePos.cache;
  }

  /** Position `steps` tiles away in `direction`, or null past the edge. */
  translate(direction: Direction, steps: number = 1): TilePos | null {
    return TilePos.create(this.row + direction.dRow * steps, this.col + direction.dCol * steps);
  }

  /** In-bounds adjacent positions, in {@link DIRECTIONS} order. */
  neighbors(): TilePos[] {
    const result: TilePos[] = [];
    for (const direction of DIRECTIONS) {
      const next = this.translate(direction);
      if (next) {
        result.push(next);
      }
    }
    return result;
  }

  equals(other: TilePos): boolean {
    return this.row === other.row && this.col === other.col;
  }

  /** Negative, zero or positive; row first, then column. */
  compareTo(other: TilePos): number {
    return this.row !== other.row ? this.row - other.row : this.col - other.col;
  }

  toKey(): string {
    return `${this.row},${this.col}`;
  }

  /** Board notation: column letter then 1-based row, e.g. (0,0) -> A1. */
  toString(): string {
    return `${String.fromCharCode('A'.charCodeAt(0) + this.col)}${this.row + 1}`;
  }
}
