import { Move, Tile } from '../types/game';
import type { Reversi } from './Reversi';
import { TilePos } from './TilePos';

/**
 * Shared notation helpers for logs, traces and tests.
 *
 * Positions use a column letter followed by a 1-based row number, so the
 * top-left tile (row 0, col 0) is `A1` and the bottom-right one is `H8`.
 */

const NOTATION_PATTERN = /^([a-z])(\d{1,2})$/i;

export function formatTilePos(pos: TilePos): string {
  return pos.toString();
}

/**
 * Parse `A1`..`H8` (case-insensitive, surrounding whitespace ignored).
 * Returns null for anything that is not an on-board coordinate.
 */
export function parseTilePos(text: string): TilePos | null {
  const match = NOTATION_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, letter, digits] = match;
  if (letter === undefined || digits === undefined) {
    return null;
  }
  const col = letter.toUpperCase().charCodeAt(0) - 'A'.charCodeAt(0);
  const row = Number.parseInt(digits, 10) - 1;
  return TilePos.create(row, col);
}

export function formatMove(move: Move): string {
  return `${move.player === 'black' ? 'B' : 'W'}:${formatTilePos(move.position)}`;
}

function tileChar(tile: Tile): string {
  if (tile === 'black') return 'B';
  if (tile === 'white') return 'W';
  return '.';
}

/**
 * One line per row of `B`, `W` and `.`; the same characters
 * `Grid.fromRows` accepts, so the output can be fed back in.
 */
export function formatBoardRows(state: Reversi): string[] {
  const lines: string[] = [];
  for (const [, tiles] of state.rows()) {
    lines.push(tiles.map(tileChar).join(''));
  }
  return lines;
}

export function formatBoard(state: Reversi): string {
  return formatBoardRows(state).join('\n');
}
