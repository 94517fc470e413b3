/**
 * AI Engine - Manages AI players and move selection for both pieces.
 */

import type { AIConfig, Piece } from '../../../shared/types/game';
import type { Reversi } from '../../../shared/engine/Reversi';
import { EngineError, EngineErrorCode } from '../../../shared/engine/errors';
import {
  chooseLocalAIMove,
  LocalAIChoice,
  LocalAIRng,
} from '../../../shared/engine/localAIMoveSelection';
import { formatBoard } from '../../../shared/engine/notation';
import { MAX_AI_DEPTH } from '../../config/env';
import { config as appConfig, defaultAIConfig } from '../../config';
import { logger } from '../../utils/logger';
import { isAITraceEnabled } from '../../../shared/utils/envFlags';
import { SeededRNG, generateGameSeed } from '../../../shared/utils/rng';

/**
 * AI difficulty presets, from a shallow random player to a deep
 * positional searcher.
 */
export const AI_DIFFICULTY_PRESETS: Record<number, Partial<AIConfig>> = {
  1: { strategy: 'random' },
  2: { strategy: 'negamax', depth: 1, evaluation: 'material', noise: 4 },
  3: { strategy: 'negamax', depth: 2, evaluation: 'positional', noise: 2 },
  4: { strategy: 'negamax', depth: 3, evaluation: 'positional', noise: 0 },
  5: { strategy: 'negamax', depth: 4, evaluation: 'positional', noise: 0 },
  6: { strategy: 'negamax', depth: 5, evaluation: 'positional', noise: 0 },
};

export class AIEngine {
  private aiConfigs: Map<Piece, AIConfig> = new Map();
  private rngs: Map<Piece, LocalAIRng> = new Map();
  private readonly baseSeed: number;

  /**
   * @param baseSeed - Seed shared by both players' RNGs; each piece mixes
   *   in its own salt so the two streams differ but stay reproducible.
   */
  constructor(baseSeed: number = appConfig.ai.seed ?? generateGameSeed()) {
    this.baseSeed = baseSeed;
  }

  /**
   * Configure the AI for `piece`. Missing fields come from the
   * environment-driven defaults.
   */
  createAI(piece: Piece, overrides: Partial<AIConfig> = {}): AIConfig {
    const config: AIConfig = { ...defaultAIConfig(appConfig), ...overrides };

    if (!Number.isInteger(config.depth) || config.depth < 1 || config.depth > MAX_AI_DEPTH) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
        `AI depth must be an integer between 1 and ${MAX_AI_DEPTH}`,
        { piece, depth: config.depth },
        'AIEngine'
      );
    }

    if (!Number.isInteger(config.noise) || config.noise < 0) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
        'AI noise must be a non-negative integer',
        { piece, noise: config.noise },
        'AIEngine'
      );
    }

    this.aiConfigs.set(piece, config);
    this.rngs.set(piece, this.createDeterministicRng(piece));

    logger.info('AI player configured', {
      piece,
      strategy: config.strategy,
      depth: config.depth,
      evaluation: config.evaluation,
      noise: config.noise,
      pruning: config.pruning,
    });
    return config;
  }

  /**
   * Configure the AI for `piece` from a difficulty preset (1-6).
   */
  createAIFromDifficulty(piece: Piece, difficulty: number): AIConfig {
    const preset = AI_DIFFICULTY_PRESETS[difficulty];
    if (!preset) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
        `Unknown AI difficulty ${difficulty}`,
        { piece, difficulty },
        'AIEngine'
      );
    }
    return this.createAI(piece, preset);
  }

  getAIConfig(piece: Piece): AIConfig | undefined {
    return this.aiConfigs.get(piece);
  }

  isAIControlled(piece: Piece): boolean {
    return this.aiConfigs.has(piece);
  }

  removeAI(piece: Piece): boolean {
    this.rngs.delete(piece);
    return this.aiConfigs.delete(piece);
  }

  /**
   * Choose a move for the player to move in `state`. The state itself is
   * never modified.
   *
   * @throws EngineError when that player has no AI configured
   */
  getAIMove(state: Reversi): LocalAIChoice {
    const piece = state.currentPlayer();
    const config = this.aiConfigs.get(piece);
    const rng = this.rngs.get(piece);

    if (!config || !rng) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_INVALID_ARGUMENT,
        `No AI configuration found for ${piece}`,
        { piece },
        'AIEngine'
      );
    }

    const startedAt = Date.now();
    const choice = chooseLocalAIMove(state, config, rng);

    if (!choice.move) {
      logger.warn('No valid moves available for AI player', { piece });
      return choice;
    }

    logger.debug('AI move selected', {
      piece,
      strategy: choice.strategy,
      move: choice.move.toString(),
      score: choice.score,
      nodes: choice.nodes,
      durationMs: Date.now() - startedAt,
      ...(isAITraceEnabled() && { board: formatBoard(state) }),
    });

    return choice;
  }

  /**
   * Derive a reproducible RNG for `piece` from the engine's base seed.
   */
  private createDeterministicRng(piece: Piece): LocalAIRng {
    const salt = piece === 'black' ? 1 : 2;
    const mixed = (this.baseSeed ^ (salt * 0x9e3779b1)) >>> 0;
    const seeded = new SeededRNG(mixed);
    return () => seeded.next();
  }
}
