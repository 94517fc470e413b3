// =============================================================================
// REVERSI ENGINE - PUBLIC API
// =============================================================================
// Hosts (game sessions, AI engine, scripts) should only import from this file.
//
// - Board geometry: TilePos, DIRECTIONS, Grid
// - Rules: Reversi game state and capture logic
// - Search: static evaluation and negamax
// - Support: notation, errors, local AI selection
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Piece,
  Tile,
  GamePhase,
  GameOutcome,
  Scores,
  Move,
  MoveApplication,
  SearchResult,
  AIStrategy,
  AIConfig,
  EvaluationKind,
} from '../types/game';
export { BOARD_SIZE, PIECES } from '../types/game';

// =============================================================================
// BOARD GEOMETRY
// =============================================================================

export { TilePos } from './TilePos';
export { DIRECTIONS } from './directions';
export type { Direction } from './directions';
export { Grid } from './Grid';
export { oppositePiece, isPiece } from './piece';

// =============================================================================
// RULES
// =============================================================================

export { Reversi } from './Reversi';
export {
  computeFlips,
  computeRunFlips,
  computeValidMoves,
  hasAnyValidMove,
  isLegalPlacement,
} from './captureLogic';

// =============================================================================
// SEARCH
// =============================================================================

export {
  evaluateMaterial,
  evaluatePositional,
  getEvaluator,
  CORNER_BONUS,
  SIDE_BONUS,
} from './heuristicEvaluation';
export type { Evaluator } from './heuristicEvaluation';
export { negamaxScore, bestMove } from './negamax';
export type { NegamaxOptions, SearchRng, SearchStats } from './negamax';
export { chooseLocalAIMove, chooseRandomMove } from './localAIMoveSelection';
export type { LocalAIChoice, LocalAIRng } from './localAIMoveSelection';

// =============================================================================
// NOTATION & ERRORS
// =============================================================================

export { formatTilePos, parseTilePos, formatMove, formatBoard, formatBoardRows } from './notation';
export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  InvalidMoveError,
  TerminalStateViolation,
  BoardConstraintViolation,
  ERROR_CATEGORY_DESCRIPTIONS,
  isEngineError,
  isRulesViolation,
  isInvalidMoveError,
  isTerminalStateViolation,
  isBoardConstraintViolation,
  isValidOutcome,
  validOutcome,
  invalidOutcome,
  toEngineError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON, ValidationOutcome, InvalidOutcome } from './errors';
