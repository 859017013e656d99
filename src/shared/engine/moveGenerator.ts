/**
 * Pseudo-legal move generation.
 *
 * Moves produced here obey piece geometry and blocking only. They may leave
 * the mover's own king attacked, and castling candidates are not checked
 * for attacked transit squares; both filters live in the validator.
 */

import type { Color } from '../types/chess';
import {
  PROMOTION_KINDS,
  backRank,
  enPassantCaptureRank,
  pawnDirection,
  pawnStartRank,
  promotionRank,
} from '../types/chess';
import { Board, type CastleSide } from './board';
import { Move } from './move';
import type { Piece } from './piece';
import { Position } from './position';

// =============================================================================
// Direction tables
// =============================================================================

type Offset = readonly [number, number];

const KNIGHT_OFFSETS: readonly Offset[] = [
  [2, 1],
  [2, -1],
  [-2, 1],
  [-2, -1],
  [1, 2],
  [1, -2],
  [-1, 2],
  [-1, -2],
];

const ORTHOGONAL: readonly Offset[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

const DIAGONAL: readonly Offset[] = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1],
];

const KING_OFFSETS: readonly Offset[] = [...ORTHOGONAL, ...DIAGONAL];

/** Files strictly between the king's home square and each rook corner. */
const CASTLING_GAP_FILES: Record<CastleSide, readonly number[]> = {
  kingside: [6, 7],
  queenside: [2, 3, 4],
};

/** File the king lands on when castling. */
export const CASTLING_KING_TARGET_FILE: Record<CastleSide, number> = {
  kingside: 7,
  queenside: 3,
};

const KING_HOME_FILE = 5;

interface GenerationOptions {
  includeCastling: boolean;
}

// =============================================================================
// Per-kind generators
// =============================================================================

function pushPawnMove(moves: Move[], from: Position, to: Position, color: Color, isCapture: boolean): void {
  if (to.rank === promotionRank(color)) {
    for (const kind of PROMOTION_KINDS) {
      moves.push(new Move(from, to, kind, { isCapture }));
    }
    return;
  }
  moves.push(new Move(from, to, null, { isCapture }));
}

function pawnMoves(board: Board, from: Position, piece: Piece, moves: Move[]): void {
  const color = piece.color;
  const dir = pawnDirection(color);

  const one = from.offset(dir, 0);
  if (one && !board.get(one)) {
    pushPawnMove(moves, from, one, color, false);
    const two = from.offset(2 * dir, 0);
    if (from.rank === pawnStartRank(color) && two && !board.get(two)) {
      moves.push(new Move(from, two));
    }
  }

  for (const fileDelta of [-1, 1]) {
    const target = from.offset(dir, fileDelta);
    if (!target) {
      continue;
    }
    const occupant = board.get(target);
    if (occupant) {
      if (occupant.color !== color) {
        pushPawnMove(moves, from, target, color, true);
      }
    } else if (
      board.enPassantTarget?.equals(target) &&
      from.rank === enPassantCaptureRank(color)
    ) {
      moves.push(new Move(from, target, null, { isCapture: true, isEnPassant: true }));
    }
  }
}

function stepMoves(
  board: Board,
  from: Position,
  piece: Piece,
  offsets: readonly Offset[],
  moves: Move[]
): void {
  for (const [dr, df] of offsets) {
    const to = from.offset(dr, df);
    if (!to) {
      continue;
    }
    const occupant = board.get(to);
    if (!occupant) {
      moves.push(new Move(from, to));
    } else if (occupant.color !== piece.color) {
      moves.push(new Move(from, to, null, { isCapture: true }));
    }
  }
}

function slideMoves(
  board: Board,
  from: Position,
  piece: Piece,
  directions: readonly Offset[],
  moves: Move[]
): void {
  for (const [dr, df] of directions) {
    let to = from.offset(dr, df);
    while (to) {
      const occupant = board.get(to);
      if (occupant) {
        if (occupant.color !== piece.color) {
          moves.push(new Move(from, to, null, { isCapture: true }));
        }
        break;
      }
      moves.push(new Move(from, to));
      to = to.offset(dr, df);
    }
  }
}

function castlingMoves(board: Board, from: Position, king: Piece, moves: Move[]): void {
  const color = king.color;
  const rank = backRank(color);
  if (king.hasMoved || from.rank !== rank || from.file !== KING_HOME_FILE) {
    return;
  }

  for (const side of ['kingside', 'queenside'] as const) {
    if (!board.canCastle(color, side)) {
      continue;
    }
    const rook = board.get(Board.rookHome(color, side));
    if (!rook || !rook.is('rook', color) || rook.hasMoved) {
      continue;
    }
    const clear = CASTLING_GAP_FILES[side].every((file) => !board.get(new Position(rank, file)));
    if (clear) {
      moves.push(
        new Move(from, new Position(rank, CASTLING_KING_TARGET_FILE[side]), null, {
          isCastle: true,
        })
      );
    }
  }
}

function generatePieceMoves(
  board: Board,
  from: Position,
  piece: Piece,
  options: GenerationOptions
): Move[] {
  const moves: Move[] = [];
  switch (piece.kind) {
    case 'pawn':
      pawnMoves(board, from, piece, moves);
      break;
    case 'knight':
      stepMoves(board, from, piece, KNIGHT_OFFSETS, moves);
      break;
    case 'bishop':
      slideMoves(board, from, piece, DIAGONAL, moves);
      break;
    case 'rook':
      slideMoves(board, from, piece, ORTHOGONAL, moves);
      break;
    case 'queen':
      slideMoves(board, from, piece, KING_OFFSETS, moves);
      break;
    case 'king':
      stepMoves(board, from, piece, KING_OFFSETS, moves);
      if (options.includeCastling) {
        castlingMoves(board, from, piece, moves);
      }
      break;
  }
  return moves;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * All pseudo-legal moves for `color`, squares visited a1 to h8.
 */
export function pseudoLegalMoves(board: Board, color: Color): Move[] {
  const moves: Move[] = [];
  for (const { position, piece } of board.piecesOf(color)) {
    moves.push(...generatePieceMoves(board, position, piece, { includeCastling: true }));
  }
  return moves;
}

/**
 * Pseudo-legal moves of whatever piece stands on `from`; empty for an empty
 * square.
 */
export function pseudoLegalMovesForPiece(board: Board, from: Position): Move[] {
  const piece = board.get(from);
  if (!piece) {
    return [];
  }
  return generatePieceMoves(board, from, piece, { includeCastling: true });
}

/**
 * Whether any piece of `byColor` attacks `square`.
 *
 * Pawns attack their two forward diagonals whether or not anything stands
 * there; a forward push never attacks. Castling never attacks.
 */
export function isSquareAttacked(board: Board, square: Position, byColor: Color): boolean {
  for (const { position, piece } of board.piecesOf(byColor)) {
    if (piece.kind === 'pawn') {
      const dir = pawnDirection(byColor);
      if (
        square.rank === position.rank + dir &&
        Math.abs(square.file - position.file) === 1
      ) {
        return true;
      }
      continue;
    }
    const moves = generatePieceMoves(board, position, piece, { includeCastling: false });
    if (moves.some((move) => move.to.equals(square))) {
      return true;
    }
  }
  return false;
}
