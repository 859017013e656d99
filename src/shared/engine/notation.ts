import { EngineErrorCode, IllegalMoveError } from './errors';
import type { Board } from './board';
import { inCheck, isCheckmate } from './gameStateService';
import type { Move } from './move';
import { executeMove } from './moveValidator';
import { PIECE_KIND_INFO } from './piece';
import { FILE_LETTERS } from './position';

/**
 * Short algebraic notation for move logs.
 *
 * This is the simple form the game service stores: no disambiguation
 * between two identical pieces that can reach the same square. Castling is
 * rendered without a check suffix.
 */

/**
 * Render `move` in short algebraic notation, from the board as it stood
 * before the move. `before` is not modified.
 *
 * Pass a generated (flagged) move; an unflagged castling geometry is
 * rendered as a plain king step.
 */
export function toSan(before: Board, move: Move): string {
  const piece = before.get(move.from);
  if (!piece) {
    throw new IllegalMoveError(
      EngineErrorCode.RULES_NO_PIECE,
      `No piece on ${move.from.toLabel()}`,
      { move: move.toLabel() },
      'Notation'
    );
  }

  if (move.isCastle) {
    return move.to.file === 7 ? 'O-O' : 'O-O-O';
  }

  const isCapture = move.isCapture || before.get(move.to) !== null;
  let san = '';
  if (piece.kind === 'pawn') {
    if (isCapture) {
      san += FILE_LETTERS[move.from.file - 1];
    }
  } else {
    san += piece.letter;
  }
  if (isCapture) {
    san += 'x';
  }
  san += move.to.toLabel();
  if (move.promotion) {
    san += `=${PIECE_KIND_INFO[move.promotion].letter}`;
  }

  const after = before.copy();
  executeMove(after, move);
  const opponent = after.sideToMove;
  if (isCheckmate(after, opponent)) {
    san += '#';
  } else if (inCheck(after, opponent)) {
    san += '+';
  }
  return san;
}

/**
 * Number a list of SAN strings the way move logs print them:
 * ["e4", "e5", "Nf3"] -> ["1. e4 e5", "2. Nf3"].
 *
 * `firstMoveNumber` and `blackFirst` allow a log that starts from a decoded
 * position.
 */
export function formatMoveList(
  sans: readonly string[],
  firstMoveNumber: number = 1,
  blackFirst: boolean = false
): string[] {
  const lines: string[] = [];
  let index = 0;
  let moveNumber = firstMoveNumber;
  if (blackFirst && sans.length > 0) {
    lines.push(`${moveNumber}... ${sans[0]}`);
    index = 1;
    moveNumber++;
  }
  for (; index < sans.length; index += 2) {
    const pair = sans.slice(index, index + 2).join(' ');
    lines.push(`${moveNumber}. ${pair}`);
    moveNumber++;
  }
  return lines;
}
