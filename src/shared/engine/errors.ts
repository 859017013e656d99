/**
 * Engine Domain Errors - Structured error types for the chess rules engine
 *
 * Three kinds of failure leave the engine, and callers must be able to tell
 * them apart:
 *
 * - **FormatError**: a malformed position string, square label, move label or
 *   move request. Raised while decoding input, never while executing a move.
 * - **IllegalMoveError**: a well-formed move that is not in the legal-move set
 *   for the acting side. Expected and frequent; the caller answers "rejected".
 * - **CorruptStateError**: the board contradicts its own invariants (for
 *   example a king that should be present is missing). Fatal; do not retry.
 *
 * Usage:
 * ```typescript
 * import { IllegalMoveError, EngineErrorCode } from './errors';
 *
 * throw new IllegalMoveError(EngineErrorCode.RULES_NOT_YOUR_TURN, 'Not your turn', {
 *   move: 'e7e5',
 *   sideToMove: 'white',
 * });
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - FORMAT_*: Malformed input (position strings, labels, requests)
 * - RULES_*: Well-formed moves the rules reject
 * - STATE_*: Board state corruption/inconsistency
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  // Format Errors - malformed input
  /** Position-encoding string is missing fields or has a malformed field */
  FORMAT_INVALID_POSITION_STRING = 'FORMAT_INVALID_POSITION_STRING',
  /** Square label is not file a-h followed by rank 1-8 */
  FORMAT_INVALID_SQUARE = 'FORMAT_INVALID_SQUARE',
  /** Rank or file outside 1..8 */
  FORMAT_POSITION_OUT_OF_BOUNDS = 'FORMAT_POSITION_OUT_OF_BOUNDS',
  /** Unrecognized piece letter */
  FORMAT_INVALID_PIECE = 'FORMAT_INVALID_PIECE',
  /** Move label is not two squares plus an optional promotion letter */
  FORMAT_INVALID_MOVE_LABEL = 'FORMAT_INVALID_MOVE_LABEL',
  /** Move request payload failed schema validation */
  FORMAT_INVALID_MOVE_REQUEST = 'FORMAT_INVALID_MOVE_REQUEST',

  // Rules Errors - well-formed but rejected moves
  /** No piece on the origin square */
  RULES_NO_PIECE = 'RULES_NO_PIECE',
  /** The piece on the origin square belongs to the side not on move */
  RULES_NOT_YOUR_TURN = 'RULES_NOT_YOUR_TURN',
  /** The move is not in the legal-move set of the origin square */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',
  /** The position is already terminal; no further moves are accepted */
  RULES_GAME_OVER = 'RULES_GAME_OVER',

  // State Errors - corrupted board
  /** A king that must be on the board could not be found */
  STATE_KING_NOT_FOUND = 'STATE_KING_NOT_FOUND',
  /** A board invariant failed after a move was executed */
  STATE_INVARIANT_VIOLATED = 'STATE_INVARIANT_VIOLATED',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  FORMAT_: 'Malformed input',
  RULES_: 'Move rejected by the rules',
  STATE_: 'Corrupted or inconsistent board state',
  INTERNAL_: 'Internal engine error (bug)',
};

/**
 * HTTP status codes by error code prefix, for the game service that turns
 * engine errors into responses.
 */
export const ERROR_HTTP_STATUS: Record<string, number> = {
  FORMAT_: 400,
  RULES_: 422,
  STATE_: 500,
  INTERNAL_: 500,
};

function codePrefix(code: string): string {
  return code.split('_')[0] + '_';
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 * - Fatal flag (corrupt state must not be retried)
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'BoardCodec', 'MoveValidator') */
  readonly domain: string;

  /** Whether this error is fatal (the game should be aborted) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine',
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    return ERROR_CATEGORY_DESCRIPTIONS[codePrefix(this.code)] ?? 'Unknown error category';
  }

  /** Get HTTP status code for this error */
  get httpStatus(): number {
    return ERROR_HTTP_STATUS[codePrefix(this.code)] ?? 500;
  }

  /** Serialize to a JSON-safe object for logging and API responses */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  isFatal: boolean;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for malformed input.
 *
 * Examples:
 * - Position string with fewer than four fields
 * - Square label "i9"
 * - Unknown piece letter in a placement field
 */
export class FormatError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Format'
  ) {
    super(code, message, context, domain, false);
    this.name = 'FormatError';
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

/**
 * Error for a well-formed move the rules reject.
 */
export class IllegalMoveError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain, false);
    this.name = 'IllegalMoveError';
    Object.setPrototypeOf(this, IllegalMoveError.prototype);
  }
}

/**
 * Error for a board that contradicts its own invariants.
 *
 * This indicates upstream data corruption (or an engine bug), so it is
 * always fatal.
 */
export class CorruptStateError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain, true);
    this.name = 'CorruptStateError';
    Object.setPrototypeOf(this, CorruptStateError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError;
}

export function isIllegalMoveError(error: unknown): error is IllegalMoveError {
  return error instanceof IllegalMoveError;
}

export function isCorruptStateError(error: unknown): error is CorruptStateError {
  return error instanceof CorruptStateError;
}

/**
 * Check if an error is fatal.
 */
export function isFatalError(error: unknown): boolean {
  return isEngineError(error) && error.isFatal;
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
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create the standard "king not found" CorruptStateError.
 */
export function kingNotFound(color: string, context: Record<string, unknown> = {}): CorruptStateError {
  return new CorruptStateError(
    EngineErrorCode.STATE_KING_NOT_FOUND,
    `No ${color} king on the board`,
    { color, ...context }
  );
}
