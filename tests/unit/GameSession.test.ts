import { GameSession } from '../../src/server/game/GameSession';
import { EngineError, EngineErrorCode } from '../../src/shared/engine/errors';
import type { AIConfig } from '../../src/shared/types/game';
import { CORNER_PAIRS_ROWS, pos, stateFromRows } from '../utils/fixtures';

const shallow: Partial<AIConfig> = {
  strategy: 'negamax',
  depth: 1,
  evaluation: 'material',
  noise: 0,
};

describe('GameSession', () => {
  describe('human moves', () => {
    it('applies a legal move and records it', () => {
      const session = new GameSession({ gameId: 'game-1' });
      const outcome = session.submitMove(pos(2, 3), 'black');

      expect(outcome.valid).toBe(true);
      expect(session.history()).toEqual([
        { turn: 1, player: 'black', position: pos(2, 3), flipped: [pos(3, 3)] },
      ]);
      expect(session.summary()).toEqual({
        gameId: 'game-1',
        scores: { black: 4, white: 1 },
        winner: null,
        moveCount: 1,
        terminal: false,
        currentPlayer: 'white',
      });
    });

    it('returns rejections without changing anything', () => {
      const session = new GameSession();
      const outcome = session.submitMove(pos(0, 0), 'black');

      expect(outcome.valid).toBe(false);
      if (outcome.valid) return;
      expect(outcome.code).toBe(EngineErrorCode.RULES_INVALID_MOVE);
      expect(session.history()).toEqual([]);
      expect(session.summary().moveCount).toBe(0);
      expect(session.getState().scores()).toEqual({ black: 2, white: 2 });
    });

    it('rejects a move out of turn', () => {
      const session = new GameSession();
      const outcome = session.submitMove(pos(2, 4), 'white');
      expect(outcome.valid).toBe(false);
      if (outcome.valid) return;
      expect(outcome.code).toBe(EngineErrorCode.RULES_NOT_YOUR_TURN);
    });

    it('keeps a pending forced pass when the move after it is rejected', () => {
      const before = stateFromRows(CORNER_PAIRS_ROWS, 'white');
      const session = new GameSession({ initialState: before });

      const outcome = session.submitMove(pos(5, 5), 'white');
      expect(outcome.valid).toBe(false);
      if (outcome.valid) return;
      expect(outcome.code).toBe(EngineErrorCode.RULES_NOT_YOUR_TURN);
      expect(session.getState().equals(before)).toBe(true);
      expect(session.history()).toEqual([]);
      expect(session.summary().currentPlayer).toBe('white');
    });

    it('commits the forced pass together with an accepted move', () => {
      const session = new GameSession({
        initialState: stateFromRows(CORNER_PAIRS_ROWS, 'white'),
      });

      const outcome = session.submitMove(pos(0, 2), 'black');
      expect(outcome.valid).toBe(true);
      expect(session.history()).toEqual([
        { turn: 1, player: 'white', position: 'pass', flipped: [] },
        { turn: 2, player: 'black', position: pos(0, 2), flipped: [pos(0, 1)] },
        { turn: 3, player: 'white', position: 'pass', flipped: [] },
      ]);
      expect(session.summary()).toMatchObject({
        scores: { black: 4, white: 1 },
        moveCount: 1,
        currentPlayer: 'black',
      });
    });

    it('generates a game id when none is given', () => {
      expect(new GameSession().gameId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('AI turns', () => {
    it('refuses to play for a human player', () => {
      const session = new GameSession({ controllers: { white: shallow } });
      expect(session.isAIControlled('black')).toBe(false);
      expect(session.isAIControlled('white')).toBe(true);
      expect(() => session.playAITurn()).toThrow(EngineError);
    });

    it('leaves a forced pass unapplied when a human moves next', () => {
      const before = stateFromRows(CORNER_PAIRS_ROWS, 'white');
      const session = new GameSession({ initialState: before, controllers: { white: shallow } });

      expect(() => session.playAITurn()).toThrow(EngineError);
      expect(session.getState().equals(before)).toBe(true);
      expect(session.history()).toEqual([]);
    });

    it('records the opponent pass and finishes the game', () => {
      const session = new GameSession({
        initialState: stateFromRows(CORNER_PAIRS_ROWS, 'black'),
        controllers: { black: shallow },
      });

      const first = session.playAITurn();
      expect(first.valid).toBe(true);
      const second = session.playAITurn();
      expect(second.valid).toBe(true);

      const history = session.history();
      expect(history.map((entry) => entry.turn)).toEqual([1, 2, 3]);
      expect(history[0]).toEqual({
        turn: 1,
        player: 'black',
        position: pos(0, 2),
        flipped: [pos(0, 1)],
      });
      expect(history[1]).toEqual({ turn: 2, player: 'white', position: 'pass', flipped: [] });
      expect(history[2]).toEqual({
        turn: 3,
        player: 'black',
        position: pos(7, 2),
        flipped: [pos(7, 1)],
      });

      expect(session.summary()).toMatchObject({
        scores: { black: 6, white: 0 },
        winner: 'black',
        moveCount: 2,
        terminal: true,
      });

      const late = session.playAITurn();
      expect(late.valid).toBe(false);
      if (late.valid) return;
      expect(late.code).toBe(EngineErrorCode.STATE_GAME_OVER);
    });

    it('applies a forced pass before the AI moves', () => {
      const session = new GameSession({
        initialState: stateFromRows(CORNER_PAIRS_ROWS, 'white'),
        controllers: { black: shallow },
      });
      session.playAITurn();

      const history = session.history();
      expect(history[0]).toEqual({ turn: 1, player: 'white', position: 'pass', flipped: [] });
      expect(history[1]?.player).toBe('black');
      expect(history[1]?.position).toBe(pos(0, 2));
    });

    it('does not share the initial state with the caller', () => {
      const initialState = stateFromRows(CORNER_PAIRS_ROWS, 'black');
      const session = new GameSession({ initialState, controllers: { black: shallow } });
      session.playAITurn();
      expect(initialState.scores()).toEqual({ black: 2, white: 2 });
    });
  });

  describe('runToCompletion', () => {
    it('plays a random game to the end', () => {
      const session = new GameSession({
        seed: 7,
        controllers: { black: { strategy: 'random' }, white: { strategy: 'random' } },
      });
      const summary = session.runToCompletion();

      expect(summary.terminal).toBe(true);
      const { black, white } = summary.scores;
      expect(black + white).toBeLessThanOrEqual(64);
      expect(summary.moveCount).toBe(black + white - 4);

      const placements = session.history().filter((entry) => entry.position !== 'pass');
      expect(placements).toHaveLength(summary.moveCount);

      const expectedWinner = black === white ? 'draw' : black > white ? 'black' : 'white';
      expect(summary.winner).toBe(expectedWinner);
    });

    it('replays the same game from the same seed', () => {
      const play = (): string[] => {
        const session = new GameSession({
          seed: 99,
          controllers: { black: { strategy: 'random' }, white: shallow },
        });
        session.runToCompletion();
        return session
          .history()
          .flatMap((entry) => (entry.position === 'pass' ? [] : [entry.position.toKey()]));
      };
      expect(play()).toEqual(play());
    });

    it('stops after maxTurns moves', () => {
      const session = new GameSession({
        controllers: { black: shallow, white: shallow },
      });
      const summary = session.runToCompletion(2);
      expect(summary.moveCount).toBe(2);
      expect(summary.terminal).toBe(false);
      expect(summary.scores.black + summary.scores.white).toBe(6);
    });
  });
});
