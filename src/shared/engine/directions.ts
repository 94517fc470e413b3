/**
 * A unit step on the square grid.
 */
export interface Direction {
  readonly dRow: -1 | 0 | 1;
  readonly dCol: -1 | 0 | 1;
}

/**
 * The eight compass directions in row-major order. Move generation, flip
 * order and neighbour enumeration all follow this order, so it must not
 * be reshuffled.
 */
export const DIRECTIONS: readonly Direction[] = [
  { dRow: -1, dCol: -1 },
  { dRow: -1, dCol: 0 },
  { dRow: -1, dCol: 1 },
  { dRow: 0, dCol: -1 },
  { dRow: 0, dCol: 1 },
  { dRow: 1, dCol: -1 },
  { dRow: 1, dCol: 0 },
  { dRow: 1, dCol: 1 },
];
