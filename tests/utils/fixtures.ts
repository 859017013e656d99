import {
  Board,
  Move,
  assertMoveLegal,
  executeMove,
} from '../../src/shared/engine';

/** Positions shared by several suites. */
export const FIXTURES = {
  /** Both sides can castle either way; nothing between kings and rooks. */
  castlingReady: 'r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1',
  /** White pawn on a7 about to promote, kings on the e-file. */
  promotion: '4k3/P7/8/8/8/8/8/4K3 w - - 0 1',
  bareKings: '8/8/8/4k3/8/8/8/4K3 w - - 0 1',
  /** Black to move, no legal moves, not in check. */
  stalemate: '7k/5Q2/6K1/8/8/8/8/8 b - - 0 1',
  /** Black to move, mated on the back rank. */
  backRankMate: 'R5k1/5ppp/8/8/8/8/8/6K1 b - - 0 1',
} as const;

/**
 * Play a sequence of move labels on `board`, resolving each against the
 * legal-move set first. Throws on the first illegal move.
 */
export function play(board: Board, ...labels: string[]): Board {
  for (const label of labels) {
    executeMove(board, assertMoveLegal(board, Move.fromLabel(label)));
  }
  return board;
}

/** Start position with `labels` already played. */
export function fromStart(...labels: string[]): Board {
  return play(Board.initial(), ...labels);
}

export function labelsOf(moves: readonly Move[]): string[] {
  return moves.map((move) => move.toLabel());
}

/** Run `fn` and return what it throws; fails the test when nothing is thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
