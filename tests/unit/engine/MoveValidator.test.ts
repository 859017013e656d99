/**
 * Test suite for src/shared/engine/moveValidator.ts
 */

import {
  Board,
  CorruptStateError,
  EngineErrorCode,
  IllegalMoveError,
  Move,
  Position,
  assertMoveLegal,
  canCastleThrough,
  executeMove,
  isKingInCheck,
  isMoveLegal,
  legalMoves,
  legalMovesFor,
  resolveMove,
  validateMove,
} from '../../../src/shared/engine';
import { FIXTURES, captureError, fromStart, labelsOf, play } from '../../utils/fixtures';

const sq = (label: string): Position => Position.fromLabel(label);

function castlesFrom(board: Board, square: string): string[] {
  return labelsOf(legalMovesFor(board, sq(square)).filter((move) => move.isCastle));
}

describe('MoveValidator', () => {
  describe('legalMoves', () => {
    it('should find exactly 20 legal moves from the start', () => {
      expect(legalMoves(Board.initial(), 'white')).toHaveLength(20);
    });

    it('should leave a pinned piece without moves', () => {
      const board = Board.decode('4k3/4r3/8/8/8/8/4B3/4K3 w - - 0 1');

      expect(legalMovesFor(board, sq('e2'))).toEqual([]);
    });

    it('should keep the king off attacked squares', () => {
      const board = Board.decode('4k3/8/8/8/8/8/3r4/4K3 w - - 0 1');

      expect(labelsOf(legalMovesFor(board, sq('e1')))).toEqual(['e1f1', 'e1d2']);
    });

    it('should only allow check evasions while in check', () => {
      const board = fromStart('f2f3', 'e7e5', 'g2g4');

      expect(labelsOf(legalMoves(board, 'black'))).toContain('d8h4');
      play(board, 'd8h4');
      expect(legalMoves(board, 'white')).toEqual([]);
    });

    it('should answer for the piece owner regardless of whose turn it is', () => {
      const board = Board.initial();

      expect(labelsOf(legalMovesFor(board, sq('g8')))).toEqual(['g8h6', 'g8f6']);
      expect(legalMovesFor(board, sq('e4'))).toEqual([]);
    });
  });

  describe('castling', () => {
    it('should allow kingside castling with an unmoved king and rook and a safe path', () => {
      const board = Board.decode('4k3/8/8/8/8/8/8/4K2R w K - 0 1');

      expect(castlesFrom(board, 'e1')).toEqual(['e1g1']);
      expect(canCastleThrough(board, 'white', true)).toBe(true);
    });

    it('should refuse to castle out of check', () => {
      const board = Board.decode('4r1k1/8/8/8/8/8/8/4K2R w K - 0 1');

      expect(canCastleThrough(board, 'white', true)).toBe(false);
      expect(castlesFrom(board, 'e1')).toEqual([]);
    });

    it('should refuse to castle through an attacked square', () => {
      const board = Board.decode('4kr2/8/8/8/8/8/8/4K2R w K - 0 1');

      expect(castlesFrom(board, 'e1')).toEqual([]);
    });

    it('should refuse to castle onto an attacked square', () => {
      const board = Board.decode('4k1r1/8/8/8/8/8/8/4K2R w K - 0 1');

      expect(castlesFrom(board, 'e1')).toEqual([]);
    });

    it('should ignore attacks on the rook and its own path', () => {
      const kingside = Board.decode('4k2r/8/8/8/8/8/8/4K2R w K - 0 1');
      expect(castlesFrom(kingside, 'e1')).toEqual(['e1g1']);

      // b1 is crossed by the rook only
      const queenside = Board.decode('1r2k3/8/8/8/8/8/8/R3K3 w Q - 0 1');
      expect(castlesFrom(queenside, 'e1')).toEqual(['e1c1']);
    });

    it('should refuse to castle with a piece in between', () => {
      const board = Board.decode('4k3/8/8/8/8/8/8/4K1NR w K - 0 1');

      expect(castlesFrom(board, 'e1')).toEqual([]);
    });

    it('should lose the right for good once the rook has moved', () => {
      const board = Board.decode('4k3/8/8/8/8/8/8/4K2R w K - 0 1');
      play(board, 'h1h2', 'e8e7', 'h2h1', 'e7e8');

      expect(board.canCastle('white', 'kingside')).toBe(false);
      expect(castlesFrom(board, 'e1')).toEqual([]);
      expect(board.encode()).toBe('4k3/8/8/8/8/8/8/4K2R w - - 4 3');
    });

    it('should lose both rights once the king has moved', () => {
      const board = Board.decode(FIXTURES.castlingReady);
      play(board, 'e1f1', 'e8d8', 'f1e1', 'd8e8');

      expect(castlesFrom(board, 'e1')).toEqual([]);
      expect(castlesFrom(board, 'e8')).toEqual([]);
      expect(board.encode()).toBe('r3k2r/8/8/8/8/8/8/R3K2R w - - 4 3');
    });

    it('should relocate king and rook when castling', () => {
      const board = Board.decode(FIXTURES.castlingReady);

      play(board, 'e1g1');
      expect(board.encode()).toBe('r3k2r/8/8/8/8/8/8/R4RK1 b kq - 1 1');

      play(board, 'e8c8');
      expect(board.encode()).toBe('2kr3r/8/8/8/8/8/8/R4RK1 w - - 2 2');
      expect(board.get(sq('f1'))?.hasMoved).toBe(true);
      expect(board.get(sq('d8'))?.hasMoved).toBe(true);
    });

    it('should let a rook reach an empty corner when the right had no rook behind it', () => {
      const board = Board.decode('4k3/8/8/8/8/8/8/4K1R1 w K - 0 1');

      play(board, 'g1h1');

      expect(board.encode()).toBe('4k3/8/8/8/8/8/8/4K2R b - - 1 1');
      expect(board.invariantViolations()).toEqual([]);
    });

    it('should take away the opponent right when capturing on its rook corner', () => {
      const board = Board.decode(FIXTURES.castlingReady);

      play(board, 'a1a8');

      expect(board.encode()).toBe('R3k2r/8/8/8/8/8/8/4K2R b Kk - 0 1');
    });
  });

  describe('en passant', () => {
    it('should allow the capture only on the ply right after the double step', () => {
      const board = fromStart('e2e4', 'a7a6', 'e4e5', 'd7d5');

      expect(board.enPassantTarget?.toLabel()).toBe('d6');
      const capture = legalMovesFor(board, sq('e5')).find((move) => move.isEnPassant);
      expect(capture?.toLabel()).toBe('e5d6');

      play(board, 'h2h3', 'h7h6');

      expect(board.enPassantTarget).toBeNull();
      expect(labelsOf(legalMovesFor(board, sq('e5')))).toEqual(['e5e6']);
    });

    it('should remove the captured pawn from behind the destination', () => {
      const board = fromStart('e2e4', 'a7a6', 'e4e5', 'd7d5', 'e5d6');

      expect(board.get(sq('d5'))).toBeNull();
      expect(board.get(sq('d6'))?.toSymbol()).toBe('P');
      expect(board.halfMoveClock).toBe(0);
      expect(board.encode()).toBe('rnbqkbnr/1pp1pppp/p2P4/8/8/8/PPPP1PPP/RNBQKBNR b KQkq - 0 3');
    });
  });

  describe('executeMove', () => {
    it('should produce the documented position after e2e4', () => {
      const board = fromStart('e2e4');

      expect(board.encode()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
      expect(board.positionHistory).toEqual(['rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR']);
    });

    it('should count the half-move clock and full-move number', () => {
      const board = fromStart('g1f3', 'g8f6', 'b1c3');

      expect(board.halfMoveClock).toBe(3);
      expect(board.fullMoveNumber).toBe(2);
      expect(board.sideToMove).toBe('black');

      play(board, 'e7e5');
      expect(board.halfMoveClock).toBe(0);
      expect(board.fullMoveNumber).toBe(3);
    });

    it('should place a moved piece of the chosen kind on promotion', () => {
      const board = Board.decode('4k3/P7/8/8/8/8/8/4K3 w - - 3 10');

      play(board, 'a7a8q');

      const queen = board.get(sq('a8'));
      expect(queen?.toSymbol()).toBe('Q');
      expect(queen?.hasMoved).toBe(true);
      expect(board.get(sq('a7'))).toBeNull();
      expect(board.encode()).toBe('Q3k3/8/8/8/8/8/8/4K3 b - - 0 10');
    });

    it('should throw CorruptStateError when a move breaks a board invariant', () => {
      const board = Board.decode('4k3/8/8/8/8/8/8/K3K3 w - - 0 1');

      const error = captureError(() => executeMove(board, Move.fromLabel('a1a2')));

      expect(error).toBeInstanceOf(CorruptStateError);
      expect(error).toMatchObject({
        code: EngineErrorCode.STATE_INVARIANT_VIOLATED,
        context: { move: 'a1a2', violations: ['white has 2 kings'] },
      });
    });
  });

  describe('validateMove / resolveMove / assertMoveLegal', () => {
    it('should resolve a bare request to the flagged generated move', () => {
      const board = Board.decode(FIXTURES.castlingReady);
      const resolved = resolveMove(board, Move.fromLabel('e1g1'));

      expect(resolved?.isCastle).toBe(true);
      expect(validateMove(board, Move.fromLabel('e1g1'))).toBe(true);
    });

    it('should match the promotion kind', () => {
      const board = Board.decode(FIXTURES.promotion);

      expect(validateMove(board, Move.fromLabel('a7a8n'))).toBe(true);
      expect(validateMove(board, Move.fromLabel('a7a8'))).toBe(false);
      expect(validateMove(board, Move.fromLabel('a7a8k'))).toBe(false);
    });

    it('should reject moves by the side not on move', () => {
      expect(validateMove(Board.initial(), Move.fromLabel('e7e5'))).toBe(false);
      expect(resolveMove(Board.initial(), Move.fromLabel('e7e5'))).toBeNull();
    });

    it.each([
      ['e3e4', EngineErrorCode.RULES_NO_PIECE],
      ['e7e5', EngineErrorCode.RULES_NOT_YOUR_TURN],
      ['e2e5', EngineErrorCode.RULES_ILLEGAL_MOVE],
    ])('should reject %s with %s', (label, code) => {
      const error = captureError(() => assertMoveLegal(Board.initial(), Move.fromLabel(label)));

      expect(error).toBeInstanceOf(IllegalMoveError);
      expect(error).toMatchObject({ code, context: expect.objectContaining({ move: label }) });
    });
  });

  describe('king lookups', () => {
    const kingless = '8/8/8/8/8/8/8/4K3 w - - 0 1';

    it('should throw CorruptStateError when the king is missing', () => {
      const error = captureError(() => isKingInCheck(Board.decode(kingless), 'black'));

      expect(error).toBeInstanceOf(CorruptStateError);
      expect(error).toMatchObject({ code: EngineErrorCode.STATE_KING_NOT_FOUND });
    });

    it('should treat moves as illegal and castling as impossible without a king', () => {
      const board = Board.decode(kingless);

      expect(isMoveLegal(board, Move.fromLabel('e1e2'), 'black')).toBe(false);
      expect(canCastleThrough(board, 'black', true)).toBe(false);
    });

    it('should report check', () => {
      const board = fromStart('e2e4', 'f7f6', 'd1h5');

      expect(isKingInCheck(board, 'black')).toBe(true);
      expect(isKingInCheck(board, 'white')).toBe(false);
    });
  });
});
