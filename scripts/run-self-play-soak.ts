#!/usr/bin/env ts-node
/**
 * Self-play soak & invariant harness.
 *
 * Plays many seeded AI-vs-AI games through GameSession and checks the
 * rules invariants after every move:
 * - piece count grows by exactly one per placement
 * - isValidMove agrees with validMoves for every tile
 * - isTerminal holds exactly when neither side has a move
 *
 * Writes a JSON summary and exits non-zero on violations when asked to.
 *
 * Usage:
 *   ts-node scripts/run-self-play-soak.ts --games 20 --seed 7 \
 *     --black negamax --white random --depth 2 --output results/soak.json
 */

import fs from 'fs';
import path from 'path';

import { GameSession } from '../src/server/game/GameSession';
import { AIStrategySchema } from '../src/server/config';
import { PIECES, TilePos, formatBoard } from '../src/shared/engine';
import type { AIStrategy, GameOutcome, Reversi } from '../src/shared/engine';
import { SeededRNG } from '../src/shared/utils/rng';

interface SoakConfig {
  games: number;
  seed: number;
  depth: number;
  black: AIStrategy;
  white: AIStrategy;
  outputPath: string;
  failOnViolation: boolean;
}

interface InvariantViolation {
  game: number;
  turn: number;
  message: string;
  board: string;
}

interface SoakSummary {
  config: SoakConfig;
  totalGames: number;
  completedGames: number;
  averageMoves: number;
  outcomes: Record<GameOutcome, number>;
  violations: InvariantViolation[];
}

type ParsedArgs = Record<string, string | boolean | undefined>;

function parseArgs(argv: string[]): SoakConfig {
  const args: ParsedArgs = {};

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (raw === undefined || !raw.startsWith('--')) {
      continue;
    }
    const eqIndex = raw.indexOf('=');
    if (eqIndex !== -1) {
      args[raw.slice(2, eqIndex)] = raw.slice(eqIndex + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[raw.slice(2)] = next;
      i += 1;
    } else {
      args[raw.slice(2)] = true;
    }
  }

  const numberArg = (key: string, fallback: number): number => {
    const value = args[key];
    if (typeof value !== 'string') return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new Error(`--${key} must be a non-negative integer, got "${value}"`);
    }
    return parsed;
  };

  const strategyArg = (key: string): AIStrategy => {
    const value = args[key];
    return AIStrategySchema.parse(typeof value === 'string' ? value : 'negamax');
  };

  const output = args.output;
  return {
    games: numberArg('games', 10),
    seed: numberArg('seed', 1),
    depth: numberArg('depth', 2),
    black: strategyArg('black'),
    white: strategyArg('white'),
    outputPath: typeof output === 'string' ? output : 'results/self_play_soak.json',
    failOnViolation: args.failOnViolation === true || args.failOnViolation === 'true',
  };
}

function checkInvariants(state: Reversi): string[] {
  const problems: string[] = [];
  const listed = new Set(state.validMoves().map((pos) => pos.toKey()));
  for (const pos of TilePos.all()) {
    if (state.isValidMove(pos) !== listed.has(pos.toKey())) {
      problems.push(`isValidMove disagrees with validMoves at ${pos.toString()}`);
    }
  }
  const bothStuck = PIECES.every((piece) => state.validMoves(piece).length === 0);
  if (state.isTerminal() !== bothStuck) {
    problems.push(`isTerminal()=${state.isTerminal()} but both stuck=${bothStuck}`);
  }
  return problems;
}

function run(): void {
  const config = parseArgs(process.argv);
  const rng = new SeededRNG(config.seed);
  const outcomes: Record<GameOutcome, number> = { black: 0, white: 0, draw: 0 };
  const violations: InvariantViolation[] = [];
  let completedGames = 0;
  let totalMoves = 0;

  console.log(
    `Self-play soak: games=${config.games} seed=${config.seed} ` +
      `black=${config.black} white=${config.white} depth=${config.depth}`
  );

  for (let game = 0; game < config.games; game += 1) {
    const session = new GameSession({
      gameId: `soak-${config.seed}-${game}`,
      seed: rng.nextInt(0, 0x7fffffff),
      controllers: {
        black: { strategy: config.black, depth: config.depth },
        white: { strategy: config.white, depth: config.depth },
      },
    });

    let turn = 0;
    let before = session.getState().scores();
    while (!session.getState().isTerminal()) {
      const outcome = session.playAITurn();
      turn += 1;
      const state = session.getState();
      const after = state.scores();
      if (!outcome.valid) {
        violations.push({ game, turn, message: outcome.reason, board: formatBoard(state) });
        break;
      }
      if (after.black + after.white !== before.black + before.white + 1) {
        violations.push({
          game,
          turn,
          message: `piece count went from ${before.black + before.white} to ${after.black + after.white}`,
          board: formatBoard(state),
        });
      }
      for (const message of checkInvariants(state)) {
        violations.push({ game, turn, message, board: formatBoard(state) });
      }
      before = after;
    }

    const summary = session.summary();
    totalMoves += summary.moveCount;
    if (summary.terminal && summary.winner) {
      completedGames += 1;
      outcomes[summary.winner] += 1;
    }
  }

  const summary: SoakSummary = {
    config,
    totalGames: config.games,
    completedGames,
    averageMoves: config.games > 0 ? totalMoves / config.games : 0,
    outcomes,
    violations,
  };

  const outputPath = path.resolve(config.outputPath);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(summary, null, 2), 'utf8');

  console.log('');
  console.log('Soak run complete.');
  console.log(
    `Total games=${summary.totalGames}, completed=${completedGames}, ` +
      `black=${outcomes.black}, white=${outcomes.white}, draw=${outcomes.draw}, ` +
      `violations=${violations.length}`
  );
  console.log(`Summary written to: ${outputPath}`);

  if (config.failOnViolation && violations.length > 0) {
    console.log('Failing with non-zero exit code due to invariant violations.');
    process.exitCode = 1;
  }
}

try {
  run();
} catch (err) {
  console.error('Fatal error in self-play soak harness:', err);
  process.exitCode = 1;
}
