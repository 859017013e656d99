/**
 * Legal-move filtering and move execution.
 *
 * Legality is decided by copying the board, executing the candidate on the
 * copy and asking whether the mover's king is attacked afterwards. There is
 * no make/unmake; the live board is only touched by {@link executeMove}.
 */

import type { Color } from '../types/chess';
import { backRank, oppositeColor, pawnDirection } from '../types/chess';
import { isInvariantCheckingEnabled } from '../utils/envFlags';
import { Board } from './board';
import {
  CorruptStateError,
  EngineErrorCode,
  IllegalMoveError,
  kingNotFound,
} from './errors';
import type { Move } from './move';
import { isSquareAttacked, pseudoLegalMoves, pseudoLegalMovesForPiece } from './moveGenerator';
import { Piece } from './piece';
import { Position } from './position';

/** Files the king stands on while castling, after leaving its home square. */
const KING_PATH_FILES = {
  kingside: [6, 7],
  queenside: [4, 3],
} as const;

function castlingAllowed(board: Board, move: Move, color: Color): boolean {
  return !move.isCastle || canCastleThrough(board, color, move.to.file === 7);
}

// =============================================================================
// Legal moves
// =============================================================================

/**
 * Every legal move for `color`.
 */
export function legalMoves(board: Board, color: Color): Move[] {
  return pseudoLegalMoves(board, color).filter(
    (move) => castlingAllowed(board, move, color) && isMoveLegal(board, move, color)
  );
}

/**
 * Legal moves of the piece on `from`, for that piece's own color regardless
 * of whose turn it is. Empty for an empty square.
 */
export function legalMovesFor(board: Board, from: Position): Move[] {
  const piece = board.get(from);
  if (!piece) {
    return [];
  }
  return pseudoLegalMovesForPiece(board, from).filter(
    (move) => castlingAllowed(board, move, piece.color) && isMoveLegal(board, move, piece.color)
  );
}

/**
 * Whether `move` leaves `color`'s king unattacked. Runs on a scratch copy.
 *
 * Returns false when the copy has no king for `color`, which only happens
 * on a corrupt board.
 */
export function isMoveLegal(board: Board, move: Move, color: Color): boolean {
  const scratch = board.copy();
  applyMove(scratch, move);
  const king = scratch.findKing(color);
  if (!king) {
    return false;
  }
  return !isSquareAttacked(scratch, king, oppositeColor(color));
}

/**
 * The generated legal move matching `move` on origin, destination and
 * promotion, carrying the capture/castle/en-passant flags. Null when the
 * origin is empty, holds a piece of the side not on move, or no legal move
 * matches.
 */
export function resolveMove(board: Board, move: Move): Move | null {
  const piece = board.get(move.from);
  if (!piece || piece.color !== board.sideToMove) {
    return null;
  }
  return legalMovesFor(board, move.from).find((candidate) => candidate.sameAction(move)) ?? null;
}

export function validateMove(board: Board, move: Move): boolean {
  return resolveMove(board, move) !== null;
}

/**
 * Like {@link resolveMove}, but throws an IllegalMoveError naming the
 * reason instead of returning null.
 */
export function assertMoveLegal(board: Board, move: Move): Move {
  const label = move.toLabel();
  const piece = board.get(move.from);
  if (!piece) {
    throw new IllegalMoveError(
      EngineErrorCode.RULES_NO_PIECE,
      `No piece on ${move.from.toLabel()}`,
      { move: label },
      'MoveValidator'
    );
  }
  if (piece.color !== board.sideToMove) {
    throw new IllegalMoveError(
      EngineErrorCode.RULES_NOT_YOUR_TURN,
      `It is ${board.sideToMove}'s turn`,
      { move: label, sideToMove: board.sideToMove, pieceColor: piece.color },
      'MoveValidator'
    );
  }
  const resolved = resolveMove(board, move);
  if (!resolved) {
    throw new IllegalMoveError(
      EngineErrorCode.RULES_ILLEGAL_MOVE,
      `Illegal move: ${label}`,
      { move: label, piece: piece.toString() },
      'MoveValidator'
    );
  }
  return resolved;
}

// =============================================================================
// Check and castling safety
// =============================================================================

/**
 * @throws CorruptStateError when `color` has no king.
 */
export function isKingInCheck(board: Board, color: Color): boolean {
  const king = board.findKing(color);
  if (!king) {
    throw kingNotFound(color, { position: board.encode() });
  }
  return isSquareAttacked(board, king, oppositeColor(color));
}

/**
 * True when `color`'s king is not in check and none of the squares it
 * crosses or lands on are attacked. The rook's path is not considered.
 */
export function canCastleThrough(board: Board, color: Color, kingside: boolean): boolean {
  const king = board.findKing(color);
  if (!king) {
    return false;
  }
  const opponent = oppositeColor(color);
  if (isSquareAttacked(board, king, opponent)) {
    return false;
  }
  const rank = backRank(color);
  const files = kingside ? KING_PATH_FILES.kingside : KING_PATH_FILES.queenside;
  return files.every((file) => !isSquareAttacked(board, new Position(rank, file), opponent));
}

// =============================================================================
// Execution
// =============================================================================

function updateCastlingRights(board: Board, move: Move, mover: Piece): void {
  const color = mover.color;
  if (mover.kind === 'king') {
    board.setCastlingRight(color, 'kingside', false);
    board.setCastlingRight(color, 'queenside', false);
  }
  const opponent = oppositeColor(color);
  for (const side of ['kingside', 'queenside'] as const) {
    if (mover.kind === 'rook' && move.from.equals(Board.rookHome(color, side))) {
      board.setCastlingRight(color, side, false);
    }
    // anything landing on an enemy rook corner takes that right away
    if (move.to.equals(Board.rookHome(opponent, side))) {
      board.setCastlingRight(opponent, side, false);
    }
  }
}

function applyMove(board: Board, move: Move): void {
  const piece = board.get(move.from);
  if (!piece) {
    throw new IllegalMoveError(
      EngineErrorCode.RULES_NO_PIECE,
      `No piece on ${move.from.toLabel()}`,
      { move: move.toLabel() },
      'MoveValidator'
    );
  }

  board.enPassantTarget = null;

  if (move.isCastle) {
    const kingside = move.to.file === 7;
    const rookFrom = new Position(move.from.rank, kingside ? 8 : 1);
    const rookTo = new Position(move.from.rank, kingside ? 6 : 4);
    const rook = board.get(rookFrom);
    board.set(move.from, null);
    board.set(move.to, piece);
    piece.markMoved();
    if (rook) {
      board.set(rookFrom, null);
      board.set(rookTo, rook);
      rook.markMoved();
    }
    board.halfMoveClock++;
    board.setCastlingRight(piece.color, 'kingside', false);
    board.setCastlingRight(piece.color, 'queenside', false);
  } else if (move.isEnPassant) {
    board.set(move.from, null);
    board.set(move.to, piece);
    const capturedAt = move.to.offset(-pawnDirection(piece.color), 0);
    if (capturedAt) {
      board.set(capturedAt, null);
    }
    piece.markMoved();
    board.halfMoveClock = 0;
  } else if (move.promotion) {
    board.set(move.from, null);
    board.set(move.to, new Piece(move.promotion, piece.color, true));
    board.halfMoveClock = 0;
  } else {
    const isCapture = board.get(move.to) !== null;
    board.set(move.from, null);
    board.set(move.to, piece);
    piece.markMoved();
    if (piece.kind === 'pawn' && Math.abs(move.to.rank - move.from.rank) === 2) {
      board.enPassantTarget = new Position((move.from.rank + move.to.rank) / 2, move.from.file);
    }
    if (isCapture || piece.kind === 'pawn') {
      board.halfMoveClock = 0;
    } else {
      board.halfMoveClock++;
    }
  }

  updateCastlingRights(board, move, piece);

  board.sideToMove = oppositeColor(board.sideToMove);
  if (board.sideToMove === 'white') {
    board.fullMoveNumber++;
  }
  board.recordPlacement();
}

/**
 * Apply `move` to `board` in place.
 *
 * The move should come from the generator (or {@link resolveMove}) so that
 * its special-move flags are set; a bare move with a castling geometry but
 * no castle flag is executed as an ordinary king step.
 *
 * @throws CorruptStateError when invariant checking is enabled and the
 *   resulting board is inconsistent.
 */
export function executeMove(board: Board, move: Move): void {
  applyMove(board, move);

  if (isInvariantCheckingEnabled()) {
    const violations = board.invariantViolations();
    if (violations.length > 0) {
      throw new CorruptStateError(
        EngineErrorCode.STATE_INVARIANT_VIOLATED,
        `Board invariant violated after ${move.toLabel()}: ${violations.join('; ')}`,
        { move: move.toLabel(), violations, position: board.encode() },
        'MoveValidator'
      );
    }
  }
}
