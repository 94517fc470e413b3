/**
 * Engine Domain Errors - Structured error types for the Reversi engine
 *
 * Error Categories:
 * - **BoardConstraintViolation**: coordinates or layouts that do not fit the 8×8 board
 * - **InvalidMoveError**: a move the rules do not allow (never fatal; the caller picks again)
 * - **TerminalStateViolation**: a move or search requested after the game ended
 * - **RulesViolation**: other rule breaches, such as passing while a move exists
 *
 * Failed moves are reported as a {@link ValidationOutcome} by `Reversi.applyMove`;
 * `toEngineError` turns such an outcome back into the matching error class.
 *
 * Usage:
 * ```typescript
 * const outcome = game.applyMove(pos);
 * if (!outcome.valid) {
 *   throw toEngineError(outcome);
 * }
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Error codes are prefixed by category:
 * - RULES_*: moves the rules reject
 * - STATE_*: operations on a state that cannot accept them
 * - BOARD_*: board geometry issues
 * - INTERNAL_*: misuse of the API or engine bugs
 */
export enum EngineErrorCode {
  /** Position is occupied or captures nothing */
  RULES_INVALID_MOVE = 'RULES_INVALID_MOVE',
  /** Move submitted for the player who is not to move */
  RULES_NOT_YOUR_TURN = 'RULES_NOT_YOUR_TURN',
  /** Pass requested while the player still has a move (or none is possible) */
  RULES_PASS_NOT_ALLOWED = 'RULES_PASS_NOT_ALLOWED',
  /** Move requested for a player who has none and must pass */
  RULES_NO_VALID_MOVE = 'RULES_NO_VALID_MOVE',

  /** Neither player can move; the game is over */
  STATE_GAME_OVER = 'STATE_GAME_OVER',

  /** Coordinates outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Board layout with the wrong shape or unknown tile characters */
  BOARD_INVALID_LAYOUT = 'BOARD_INVALID_LAYOUT',

  /** Argument outside the accepted range */
  INTERNAL_INVALID_ARGUMENT = 'INTERNAL_INVALID_ARGUMENT',
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Operation not allowed in the current game state',
  BOARD_: 'Board geometry constraint violation',
  INTERNAL_: 'Internal engine error',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'Reversi', 'Negamax') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * A move or action the rules do not allow.
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Illegal placement: occupied tile, no capture, or wrong player. The board
 * is left unchanged and the caller is expected to choose another move.
 */
export class InvalidMoveError extends RulesViolation {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: EngineErrorCode = EngineErrorCode.RULES_INVALID_MOVE
  ) {
    super(code, message, context, 'Reversi');
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * A move or search was requested after the game ended. This is a driver
 * bug rather than a bad move, so it is kept apart from InvalidMoveError.
 */
export class TerminalStateViolation extends EngineError {
  constructor(
    message: string = 'Game is over',
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(EngineErrorCode.STATE_GAME_OVER, message, context, domain);
    this.name = 'TerminalStateViolation';
    Object.setPrototypeOf(this, TerminalStateViolation.prototype);
  }
}

/**
 * Coordinates or board layouts that do not fit the board.
 *
 * Examples:
 * - TilePos.of(8, 0)
 * - Grid.fromRows() with seven rows
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// VALIDATION OUTCOME
// =============================================================================

/**
 * Result of a fallible operation that does not throw.
 *
 * @example
 * const success: ValidationOutcome<number> = { valid: true, data: 3 };
 * const failure: ValidationOutcome<number> = {
 *   valid: false,
 *   code: EngineErrorCode.RULES_INVALID_MOVE,
 *   reason: 'D4 is occupied',
 * };
 */
export type ValidationOutcome<T = void> =
  | { valid: true; data: T }
  | { valid: false; code: EngineErrorCode; reason: string; context?: Record<string, unknown> };

export type InvalidOutcome = Extract<ValidationOutcome<unknown>, { valid: false }>;

export function isValidOutcome<T>(
  outcome: ValidationOutcome<T>
): outcome is { valid: true; data: T } {
  return outcome.valid === true;
}

export function validOutcome<T>(data: T): ValidationOutcome<T> {
  return { valid: true, data };
}

export function invalidOutcome<T = void>(
  code: EngineErrorCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationOutcome<T> {
  return { valid: false, code, reason, context };
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidMoveError(error: unknown): error is InvalidMoveError {
  return error instanceof InvalidMoveError;
}

export function isTerminalStateViolation(error: unknown): error is TerminalStateViolation {
  return error instanceof TerminalStateViolation;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    { ...context, originalStack: stack },
    domain
  );
}

/**
 * Rebuild the error class that matches a failed outcome's code.
 */
export function toEngineError(outcome: InvalidOutcome): EngineError {
  const context = outcome.context ?? {};
  switch (outcome.code) {
    case EngineErrorCode.RULES_INVALID_MOVE:
    case EngineErrorCode.RULES_NOT_YOUR_TURN:
      return new InvalidMoveError(outcome.reason, context, outcome.code);
    case EngineErrorCode.STATE_GAME_OVER:
      return new TerminalStateViolation(outcome.reason, context);
    case EngineErrorCode.RULES_PASS_NOT_ALLOWED:
    case EngineErrorCode.RULES_NO_VALID_MOVE:
      return new RulesViolation(outcome.code, outcome.reason, context);
    case EngineErrorCode.BOARD_INVALID_POSITION:
    case EngineErrorCode.BOARD_INVALID_LAYOUT:
      return new BoardConstraintViolation(outcome.code, outcome.reason, context);
    default:
      return new EngineError(outcome.code, outcome.reason, context);
  }
}
