import { BOARD_SIZE, Piece, Tile } from '../types/game';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import { TilePos } from './TilePos';

const LAYOUT_CHARS: Record<string, Tile> = {
  B: 'black',
  X: 'black',
  W: 'white',
  O: 'white',
  '.': null,
  '-': null,
  ' ': null,
};

/**
 * Fixed 8×8 container of tiles. Storage is a flat row-major array that
 * never leaves this class; callers read it through {@link Grid.get} and
 * {@link Grid.rows}.
 */
export class Grid {
  private readonly tiles: Tile[];

  constructor(tiles?: readonly Tile[]) {
    if (tiles && tiles.length !== BOARD_SIZE * BOARD_SIZE) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_LAYOUT,
        `Expected ${BOARD_SIZE * BOARD_SIZE} tiles, got ${tiles.length}`,
        { length: tiles.length }
      );
    }
    this.tiles = tiles ? [...tiles] : new Array<Tile>(BOARD_SIZE * BOARD_SIZE).fill(null);
  }

  /**
   * Build a grid from one string per row. `B`/`X` mark black, `W`/`O`
   * white, and `.`, `-` or a space an empty tile.
   *
   * @example
   * Grid.fromRows([
   *   '........',
   *   '........',
   *   '........',
   *   '...WB...',
   *   '...BW...',
   *   '........',
   *   '........',
   *   '........',
   * ]);
   */
  static fromRows(rows: readonly string[]): Grid {
    if (rows.length !== BOARD_SIZE) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_LAYOUT,
        `Expected ${BOARD_SIZE} rows, got ${rows.length}`,
        { rows: rows.length }
      );
    }

    const tiles: Tile[] = [];
    rows.forEach((line, row) => {
      if (line.length !== BOARD_SIZE) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_LAYOUT,
          `Row ${row} has ${line.length} tiles, expected ${BOARD_SIZE}`,
          { row, line }
        );
      }
      for (const char of line) {
        const tile = LAYOUT_CHARS[char.toUpperCase()];
        if (tile === undefined) {
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_LAYOUT,
            `Unknown tile character '${char}' in row ${row}`,
            { row, char }
          );
        }
        tiles.push(tile);
      }
    });

    return new Grid(tiles);
  }

  private index(pos: TilePos): number {
    if (pos.row < 0 || pos.row >= BOARD_SIZE || pos.col < 0 || pos.col >= BOARD_SIZE) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Position (${pos.row}, ${pos.col}) is outside the board`,
        { row: pos.row, col: pos.col }
      );
    }
    return pos.row * BOARD_SIZE + pos.col;
  }

  get(pos: TilePos): Tile {
    return this.tiles[this.index(pos)] ?? null;
  }

  /** Places or overwrites the piece at `pos`. */
  set(pos: TilePos, piece: Piece): void {
    this.tiles[this.index(pos)] = piece;
  }

  clear(pos: TilePos): void {
    this.tiles[this.index(pos)] = null;
  }

  isFull(): boolean {
    return TilePos.all().every((pos) => this.get(pos) !== null);
  }

  count(piece: Piece): number {
    return this.tiles.filter((tile) => tile === piece).length;
  }

  /**
   * Row-major traversal yielding `[rowIndex, tiles]`. Each call starts a
   * fresh traversal and every row is a copy.
   */
  *rows(): Generator<[number, readonly Tile[]]> {
    for (let row = 0; row < BOARD_SIZE; row++) {
      yield [row, this.tiles.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE)];
    }
  }

  clone(): Grid {
    return new Grid(this.tiles);
  }

  equals(other: Grid): boolean {
    return this.tiles.every((tile, i) => tile === other.tiles[i]);
  }
}
