/**
 * Terminal-state classification.
 *
 * Every function here is a pure read of the board passed in. The only
 * producer of a {@link GameStatus} is {@link determineGameStatus};
 * resignation, timeouts and abandonment are decided by the game service.
 */

import type { Color, GameStatus } from '../types/chess';
import { oppositeColor } from '../types/chess';
import type { Board, PlacedPiece } from './board';
import { isKingInCheck, legalMoves } from './moveValidator';

/** Half-moves without a capture or pawn move that draw the game. */
export const FIFTY_MOVE_HALF_MOVES = 100;

/** Occurrences of a placement that draw the game. */
export const REPETITION_THRESHOLD = 3;

export interface PositionSummary {
  position: string;
  sideToMove: Color;
  status: GameStatus;
  isCheck: boolean;
  legalMoveCount: number;
  halfMoveClock: number;
  fullMoveNumber: number;
}

/**
 * @throws CorruptStateError when `color` has no king.
 */
export function inCheck(board: Board, color: Color): boolean {
  return isKingInCheck(board, color);
}

export function hasLegalMoves(board: Board, color: Color): boolean {
  return legalMoves(board, color).length > 0;
}

export function isCheckmate(board: Board, color: Color): boolean {
  return inCheck(board, color) && !hasLegalMoves(board, color);
}

export function isStalemate(board: Board, color: Color): boolean {
  return !inCheck(board, color) && !hasLegalMoves(board, color);
}

export function isFiftyMoveDraw(board: Board): boolean {
  return board.halfMoveClock >= FIFTY_MOVE_HALF_MOVES;
}

/**
 * Counts history entries equal to the current piece placement. Side to
 * move, castling rights and the en-passant target are not compared, and
 * the position a board was decoded from is not in its history.
 */
export function isThreefoldRepetition(board: Board): boolean {
  return board.countPlacementOccurrences(board.placementField()) >= REPETITION_THRESHOLD;
}

function isMinor(entry: PlacedPiece): boolean {
  return entry.piece.kind === 'bishop' || entry.piece.kind === 'knight';
}

/**
 * K v K, K+minor v K, or K+B v K+B with both bishops on the same square
 * colour.
 */
export function hasInsufficientMaterial(board: Board): boolean {
  const white = board.piecesOf('white').filter(({ piece }) => piece.kind !== 'king');
  const black = board.piecesOf('black').filter(({ piece }) => piece.kind !== 'king');

  if (white.length === 0 && black.length === 0) {
    return true;
  }
  if (white.length === 0 && black.length === 1 && isMinor(black[0])) {
    return true;
  }
  if (black.length === 0 && white.length === 1 && isMinor(white[0])) {
    return true;
  }
  if (white.length === 1 && black.length === 1) {
    const [w] = white;
    const [b] = black;
    return (
      w.piece.kind === 'bishop' &&
      b.piece.kind === 'bishop' &&
      w.position.shade === b.position.shade
    );
  }
  return false;
}

/**
 * Classify the position for the side to move. Checked in order: checkmate,
 * stalemate, fifty-move rule, repetition, insufficient material.
 */
export function determineGameStatus(board: Board): GameStatus {
  const color = board.sideToMove;
  const check = inCheck(board, color);
  const canMove = hasLegalMoves(board, color);

  if (check && !canMove) return 'checkmate';
  if (!check && !canMove) return 'stalemate';
  if (isFiftyMoveDraw(board)) return 'draw_fifty_move';
  if (isThreefoldRepetition(board)) return 'draw_repetition';
  if (hasInsufficientMaterial(board)) return 'draw_insufficient_material';
  return 'in_progress';
}

/** The side that delivered mate, or null for any other status. */
export function winnerOf(board: Board, status: GameStatus): Color | null {
  return status === 'checkmate' ? oppositeColor(board.sideToMove) : null;
}

export function describePosition(board: Board): PositionSummary {
  const color = board.sideToMove;
  return {
    position: board.encode(),
    sideToMove: color,
    status: determineGameStatus(board),
    isCheck: inCheck(board, color),
    legalMoveCount: legalMoves(board, color).length,
    halfMoveClock: board.halfMoveClock,
    fullMoveNumber: board.fullMoveNumber,
  };
}
