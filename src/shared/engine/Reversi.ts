import {
  BOARD_SIZE,
  GameOutcome,
  GamePhase,
  MoveApplication,
  Piece,
  Scores,
  Tile,
} from '../types/game';
import { computeFlips, computeValidMoves, hasAnyValidMove, isLegalPlacement } from './captureLogic';
import {
  EngineErrorCode,
  RulesViolation,
  ValidationOutcome,
  invalidOutcome,
  toEngineError,
  validOutcome,
} from './errors';
import { Grid } from './Grid';
import { oppositePiece } from './piece';
import { TilePos } from './TilePos';

const MID = BOARD_SIZE / 2;

/**
 * Reversi game state: a grid plus the player to move.
 *
 * The state changes only through {@link Reversi.applyMove} (and the forced
 * {@link Reversi.passTurn}); a rejected call leaves both grid and turn
 * untouched. Search code works on {@link Reversi.clone} copies.
 */
export class Reversi {
  private constructor(
    private readonly grid: Grid,
    private player: Piece
  ) {}

  /** Standard opening: white on d4/e5, black on e4/d5, black to move. */
  static initial(): Reversi {
    const grid = new Grid();
    grid.set(TilePos.of(MID - 1, MID - 1), 'white');
    grid.set(TilePos.of(MID - 1, MID), 'black');
    grid.set(TilePos.of(MID, MID - 1), 'black');
    grid.set(TilePos.of(MID, MID), 'white');
    return new Reversi(grid, 'black');
  }

  /**
   * Start from an arbitrary position. The grid is copied. The current
   * player is taken as given even if they have no move; see
   * {@link Reversi.mustPass}.
   */
  static fromGrid(grid: Grid, currentPlayer: Piece): Reversi {
    return new Reversi(grid.clone(), currentPlayer);
  }

  currentPlayer(): Piece {
    return this.player;
  }

  tileAt(pos: TilePos): Tile {
    return this.grid.get(pos);
  }

  rows(): Generator<[number, readonly Tile[]]> {
    return this.grid.rows();
  }

  isFull(): boolean {
    return this.grid.isFull();
  }

  validMoves(player: Piece = this.player): TilePos[] {
    return computeValidMoves(this.grid, player);
  }

  isValidMove(pos: TilePos, player: Piece = this.player): boolean {
    return isLegalPlacement(this.grid, pos, player);
  }

  scores(): Scores {
    return {
      black: this.grid.count('black'),
      white: this.grid.count('white'),
    };
  }

  isTerminal(): boolean {
    return !hasAnyValidMove(this.grid, 'black') && !hasAnyValidMove(this.grid, 'white');
  }

  phase(): GamePhase {
    return this.isTerminal() ? 'terminal' : 'in_progress';
  }

  /** Winner by piece count once terminal, otherwise null. */
  winner(): GameOutcome | null {
    if (!this.isTerminal()) {
      return null;
    }
    const { black, white } = this.scores();
    if (black === white) return 'draw';
    return black > white ? 'black' : 'white';
  }

  /**
   * True when the player to move has no placement although the opponent
   * still has one. Moves applied through this class never leave the game
   * in that state; it only arises from {@link Reversi.fromGrid}.
   */
  mustPass(): boolean {
    return (
      !hasAnyValidMove(this.grid, this.player) &&
      hasAnyValidMove(this.grid, oppositePiece(this.player))
    );
  }

  /**
   * Hand the turn to the opponent when the current player cannot move.
   * Throws a RulesViolation if a move exists or the game is over.
   */
  passTurn(): void {
    if (!this.mustPass()) {
      throw new RulesViolation(
        EngineErrorCode.RULES_PASS_NOT_ALLOWED,
        `${this.player} cannot pass`,
        { player: this.player, terminal: this.isTerminal() },
        'Reversi'
      );
    }
    this.player = oppositePiece(this.player);
  }

  /**
   * Place `player`'s piece at `pos` and flip every captured run.
   *
   * After the move the opponent is to play if they have a legal move;
   * otherwise `player` moves again, and if neither side can move the game
   * is terminal. Any failure leaves the state exactly as it was.
   */
  applyMove(pos: TilePos, player: Piece = this.player): ValidationOutcome<MoveApplication> {
    if (this.isTerminal()) {
      return invalidOutcome<MoveApplication>(
        EngineErrorCode.STATE_GAME_OVER,
        'Game is over; no further moves are accepted',
        { position: pos.toString(), player }
      );
    }

    if (player !== this.player) {
      return invalidOutcome<MoveApplication>(
        EngineErrorCode.RULES_NOT_YOUR_TURN,
        `It is ${this.player}'s turn, not ${player}'s`,
        { position: pos.toString(), player, currentPlayer: this.player }
      );
    }

    const flipped = computeFlips(this.grid, pos, player);
    if (flipped.length === 0) {
      const occupied = this.grid.get(pos) !== null;
      const reason = occupied
        ? `${pos.toString()} is occupied`
        : `${pos.toString()} captures nothing for ${player}`;
      return invalidOutcome<MoveApplication>(
        EngineErrorCode.RULES_INVALID_MOVE,
        reason,
        { position: pos.toString(), player, occupied }
      );
    }

    this.grid.set(pos, player);
    for (const flip of flipped) {
      this.grid.set(flip, player);
    }

    const opponent = oppositePiece(player);
    const opponentCanMove = hasAnyValidMove(this.grid, opponent);
    const moverCanMove = opponentCanMove ? true : hasAnyValidMove(this.grid, player);
    this.player = opponentCanMove ? opponent : player;

    return validOutcome({
      position: pos,
      player,
      flipped,
      nextPlayer: this.player,
      opponentPassed: !opponentCanMove && moverCanMove,
      terminal: !opponentCanMove && !moverCanMove,
    });
  }

  /** {@link Reversi.applyMove}, throwing the matching EngineError on failure. */
  applyMoveOrThrow(pos: TilePos, player: Piece = this.player): MoveApplication {
    const outcome = this.applyMove(pos, player);
    if (!outcome.valid) {
      throw toEngineError(outcome);
    }
    return outcome.data;
  }

  clone(): Reversi {
    return new Reversi(this.grid.clone(), this.player);
  }

  /** Same tiles and same player to move. */
  equals(other: Reversi): boolean {
    return this.player === other.player && this.grid.equals(other.grid);
  }

  /** Independent copy of the underlying grid. */
  snapshotGrid(): Grid {
    return this.grid.clone();
  }
}
