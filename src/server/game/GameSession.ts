import { v4 as uuidv4 } from 'uuid';
import {
  AIConfig,
  BOARD_SIZE,
  GameOutcome,
  MoveApplication,
  PIECES,
  Piece,
  Scores,
} from '../../shared/types/game';
import { Reversi } from '../../shared/engine/Reversi';
import type { TilePos } from '../../shared/engine/TilePos';
import {
  EngineError,
  EngineErrorCode,
  ValidationOutcome,
  invalidOutcome,
  validOutcome,
} from '../../shared/engine/errors';
import { oppositePiece } from '../../shared/engine/piece';
import { formatBoard } from '../../shared/engine/notation';
import { AIEngine } from './ai/AIEngine';
import { logger } from '../utils/logger';

/**
 * Who plays a piece: a human submitting moves, or an AI whose settings
 * override the configured defaults (`{}` takes them all).
 */
export type PlayerController = 'human' | Partial<AIConfig>;

export interface GameSessionOptions {
  gameId?: string;
  controllers?: Partial<Record<Piece, PlayerController>>;
  /** Base seed for the AI players' RNGs. */
  seed?: number;
  /** Starting position; copied. Defaults to the standard opening. */
  initialState?: Reversi;
}

export interface HistoryEntry {
  /** 1-based, counting passes. */
  turn: number;
  player: Piece;
  position: TilePos | 'pass';
  flipped: TilePos[];
}

export interface GameSummary {
  gameId: string;
  scores: Scores;
  winner: GameOutcome | null;
  moveCount: number;
  terminal: boolean;
  currentPlayer: Piece;
}

/** Placements available on an empty board, an upper bound on game length. */
const MAX_PLACEMENTS = BOARD_SIZE * BOARD_SIZE - 4;

/**
 * GameSession drives a single game:
 * - routes human submissions and AI turns to the rules engine
 * - applies forced passes
 * - keeps the move history and reports the result
 */
export class GameSession {
  public readonly gameId: string;
  private readonly state: Reversi;
  private readonly aiEngine: AIEngine;
  private readonly entries: HistoryEntry[] = [];
  private moveCount = 0;
  private finishedLogged = false;

  constructor(options: GameSessionOptions = {}) {
    this.gameId = options.gameId ?? uuidv4();
    this.state = options.initialState ? options.initialState.clone() : Reversi.initial();
    this.aiEngine = new AIEngine(options.seed);

    for (const piece of PIECES) {
      const controller = options.controllers?.[piece] ?? 'human';
      if (controller !== 'human') {
        this.aiEngine.createAI(piece, controller);
      }
    }

    logger.info('GameSession initialized', {
      gameId: this.gameId,
      black: this.aiEngine.isAIControlled('black') ? 'ai' : 'human',
      white: this.aiEngine.isAIControlled('white') ? 'ai' : 'human',
    });
  }

  /** Independent copy of the current position. */
  getState(): Reversi {
    return this.state.clone();
  }

  isAIControlled(piece: Piece): boolean {
    return this.aiEngine.isAIControlled(piece);
  }

  /**
   * Apply a move submitted for `player`. Rejections are logged and returned
   * unchanged; the session state is untouched in that case.
   */
  submitMove(pos: TilePos, player: Piece): ValidationOutcome<MoveApplication> {
    // A forced pass is only committed together with an accepted move.
    const pending = this.state.mustPass() ? this.state.clone() : null;
    pending?.passTurn();

    const outcome = (pending ?? this.state).applyMove(pos, player);
    if (!outcome.valid) {
      logger.warn('Engine rejected move', {
        gameId: this.gameId,
        player,
        position: pos.toString(),
        code: outcome.code,
        reason: outcome.reason,
      });
      return outcome;
    }

    if (pending) {
      this.applyForcedPass();
      this.state.applyMoveOrThrow(pos, player);
    }
    this.record(outcome.data);
    return outcome;
  }

  /**
   * Let the AI play for the player to move.
   *
   * @throws EngineError when that player is not AI controlled
   */
  playAITurn(): ValidationOutcome<MoveApplication> {
    if (this.state.isTerminal()) {
      return invalidOutcome<MoveApplication>(
        EngineErrorCode.STATE_GAME_OVER,
        'Game is over; no further moves are accepted',
        { gameId: this.gameId }
      );
    }

    const stuck = this.state.currentPlayer();
    const piece = this.state.mustPass() ? oppositePiece(stuck) : stuck;
    if (!this.aiEngine.isAIControlled(piece)) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
        `${piece} is not AI controlled`,
        { gameId: this.gameId, piece },
        'GameSession'
      );
    }

    this.applyForcedPass();
    logger.debug('Starting AI turn', { gameId: this.gameId, piece });
    const choice = this.aiEngine.getAIMove(this.state);
    if (!choice.move) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `AI found no move for ${piece} in a live position`,
        { gameId: this.gameId, piece, board: formatBoard(this.state) },
        'GameSession'
      );
    }

    const application = this.state.applyMoveOrThrow(choice.move, piece);
    this.record(application);
    return validOutcome(application);
  }

  /**
   * Play AI turns until the game ends or `maxTurns` moves have been made
   * in this call. Both players must be AI controlled.
   */
  runToCompletion(maxTurns: number = MAX_PLACEMENTS): GameSummary {
    let turns = 0;
    while (!this.state.isTerminal() && turns < maxTurns) {
      const outcome = this.playAITurn();
      if (!outcome.valid) break;
      turns++;
    }

    if (!this.state.isTerminal()) {
      logger.warn('Playout stopped before the game ended', {
        gameId: this.gameId,
        maxTurns,
        moveCount: this.moveCount,
      });
    }
    return this.summary();
  }

  history(): readonly HistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry, flipped: [...entry.flipped] }));
  }

  summary(): GameSummary {
    return {
      gameId: this.gameId,
      scores: this.state.scores(),
      winner: this.state.winner(),
      moveCount: this.moveCount,
      terminal: this.state.isTerminal(),
      currentPlayer: this.state.currentPlayer(),
    };
  }

  private applyForcedPass(): void {
    if (!this.state.mustPass()) return;
    const player = this.state.currentPlayer();
    this.state.passTurn();
    this.pushEntry(player, 'pass', []);
    logger.debug('Forced pass', { gameId: this.gameId, player });
  }

  private record(application: MoveApplication): void {
    this.moveCount++;
    this.pushEntry(application.player, application.position, application.flipped);

    logger.debug('Move applied', {
      gameId: this.gameId,
      player: application.player,
      position: application.position.toString(),
      flipped: application.flipped.length,
      nextPlayer: application.nextPlayer,
    });

    if (application.opponentPassed) {
      this.pushEntry(oppositePiece(application.player), 'pass', []);
    }

    if (application.terminal && !this.finishedLogged) {
      this.finishedLogged = true;
      logger.info('Game finished', {
        gameId: this.gameId,
        scores: this.state.scores(),
        winner: this.state.winner(),
        moveCount: this.moveCount,
      });
    }
  }

  private pushEntry(player: Piece, position: TilePos | 'pass', flipped: TilePos[]): void {
    this.entries.push({ turn: this.entries.length + 1, player, position, flipped });
  }
}
