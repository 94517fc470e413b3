import { Piece } from '../types/game';

export function oppositePiece(piece: Piece): Piece {
  return piece === 'black' ? 'white' : 'black';
}

export function isPiece(value: unknown): value is Piece {
  return value === 'black' || value === 'white';
}
