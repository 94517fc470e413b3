import {
  computeFlips,
  computeRunFlips,
  computeValidMoves,
  hasAnyValidMove,
  isLegalPlacement,
} from '../../src/shared/engine/captureLogic';
import { Grid } from '../../src/shared/engine/Grid';
import { Reversi } from '../../src/shared/engine/Reversi';
import { keys, pos } from '../utils/fixtures';

describe('captureLogic', () => {
  const opening = Reversi.initial().snapshotGrid();

  it('lists the four opening moves for black, row-major', () => {
    expect(keys(computeValidMoves(opening, 'black'))).toEqual(['2,3', '3,2', '4,5', '5,4']);
  });

  it('lists the four opening moves for white, row-major', () => {
    expect(keys(computeValidMoves(opening, 'white'))).toEqual(['2,4', '3,5', '4,2', '5,3']);
  });

  it('flips nothing on an occupied tile', () => {
    expect(computeFlips(opening, pos(3, 3), 'black')).toEqual([]);
    expect(isLegalPlacement(opening, pos(3, 3), 'black')).toBe(false);
  });

  describe('runs', () => {
    // Target D4 (3,3):
    //  up:         W at D3, anchored by B at D2          -> captured
    //  left:       W W W then the board edge             -> nothing
    //  right:      W W then B                            -> captured
    //  down-right: W then an empty tile                  -> nothing
    const grid = Grid.fromRows([
      '........',
      '...B....',
      '...W....',
      'WWW.WWB.',
      '....W...',
      '........',
      '........',
      '........',
    ]);

    it('captures every anchored run in direction order, nearest first', () => {
      expect(keys(computeFlips(grid, pos(3, 3), 'black'))).toEqual(['2,3', '3,4', '3,5']);
    });

    it('does not capture a run that reaches the edge', () => {
      expect(computeRunFlips(grid, pos(3, 3), 'black', { dRow: 0, dCol: -1 })).toEqual([]);
    });

    it('does not capture a run that ends on an empty tile', () => {
      expect(computeRunFlips(grid, pos(3, 3), 'black', { dRow: 1, dCol: 1 })).toEqual([]);
    });

    it('needs at least one opponent piece in the run', () => {
      expect(isLegalPlacement(grid, pos(3, 3), 'white')).toBe(false);
    });
  });

  it('finds no move on an empty grid', () => {
    const empty = new Grid();
    expect(hasAnyValidMove(empty, 'black')).toBe(false);
    expect(computeValidMoves(empty, 'white')).toEqual([]);
  });
});
