// =============================================================================
// CHESS RULES ENGINE - PUBLIC API
// =============================================================================
// Adapters (the rules facade, tooling, tests) should import from this file
// only.
//
// Every operation takes the Board it works on as an argument. Nothing in the
// engine keeps state between calls.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Color,
  PieceKind,
  PromotionKind,
  GameStatus,
  ExternalTerminalStatus,
  GameOutcomeStatus,
} from '../types/chess';

export {
  PROMOTION_KINDS,
  isTerminalStatus,
  oppositeColor,
  pawnDirection,
  backRank,
  pawnStartRank,
  promotionRank,
  enPassantCaptureRank,
} from '../types/chess';

// =============================================================================
// VALUE OBJECTS
// =============================================================================

export { Position, FILE_LETTERS } from './position';
export { Piece, PIECE_KIND_INFO, pieceKindFromLetter, type PieceKindInfo } from './piece';
export { Move, type MoveFlags } from './move';
export { Board, type BoardInit, type CastleSide, type PlacedPiece } from './board';

// =============================================================================
// POSITION ENCODING
// =============================================================================

export {
  STARTING_POSITION,
  encodePosition,
  decodePosition,
  encodePlacement,
  decodePlacement,
  encodeCastlingRights,
  decodeCastlingRights,
  type CastlingRights,
  type CastleSides,
  type DecodedPosition,
} from './boardCodec';

// =============================================================================
// MOVE GENERATION & VALIDATION
// =============================================================================

export {
  pseudoLegalMoves,
  pseudoLegalMovesForPiece,
  isSquareAttacked,
  CASTLING_KING_TARGET_FILE,
} from './moveGenerator';

export {
  legalMoves,
  legalMovesFor,
  isMoveLegal,
  validateMove,
  resolveMove,
  assertMoveLegal,
  executeMove,
  isKingInCheck,
  canCastleThrough,
} from './moveValidator';

// =============================================================================
// GAME STATE
// =============================================================================

export {
  inCheck,
  hasLegalMoves,
  isCheckmate,
  isStalemate,
  isFiftyMoveDraw,
  isThreefoldRepetition,
  hasInsufficientMaterial,
  determineGameStatus,
  describePosition,
  winnerOf,
  FIFTY_MOVE_HALF_MOVES,
  REPETITION_THRESHOLD,
  type PositionSummary,
} from './gameStateService';

// =============================================================================
// NOTATION
// =============================================================================

export { toSan, formatMoveList } from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  FormatError,
  IllegalMoveError,
  CorruptStateError,
  ERROR_CATEGORY_DESCRIPTIONS,
  ERROR_HTTP_STATUS,
  isEngineError,
  isFormatError,
  isIllegalMoveError,
  isCorruptStateError,
  isFatalError,
  wrapEngineError,
  kingNotFound,
  type EngineErrorJSON,
} from './errors';
