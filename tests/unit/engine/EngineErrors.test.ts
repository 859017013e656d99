/**
 * Test suite for src/shared/engine/errors.ts
 *
 * Covers the error classes, code categories, HTTP mapping, type guards and
 * utility functions.
 */

import {
  EngineError,
  EngineErrorCode,
  FormatError,
  IllegalMoveError,
  CorruptStateError,
  isEngineError,
  isFormatError,
  isIllegalMoveError,
  isCorruptStateError,
  isFatalError,
  wrapEngineError,
  kingNotFound,
} from '../../../src/shared/engine/errors';

describe('EngineErrors', () => {
  describe('EngineError base class', () => {
    it('should create an EngineError with all fields', () => {
      const error = new EngineError(
        EngineErrorCode.RULES_ILLEGAL_MOVE,
        'Illegal move: e2e5',
        { move: 'e2e5' },
        'MoveValidator'
      );

      expect(error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
      expect(error.message).toBe('Illegal move: e2e5');
      expect(error.context).toEqual({ move: 'e2e5' });
      expect(error.domain).toBe('MoveValidator');
      expect(error.name).toBe('EngineError');
      expect(error.isFatal).toBe(false);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should use default domain when not specified', () => {
      const error = new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'Assertion failed');

      expect(error.domain).toBe('Engine');
      expect(error.context).toEqual({});
    });

    it('should return category description based on error code prefix', () => {
      expect(new EngineError(EngineErrorCode.FORMAT_INVALID_SQUARE, 'x').category).toBe(
        'Malformed input'
      );
      expect(new EngineError(EngineErrorCode.RULES_NOT_YOUR_TURN, 'x').category).toBe(
        'Move rejected by the rules'
      );
      expect(new EngineError(EngineErrorCode.STATE_KING_NOT_FOUND, 'x').category).toBe(
        'Corrupted or inconsistent board state'
      );
      expect(new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'x').category).toBe(
        'Internal engine error (bug)'
      );
    });

    it('should map error code prefixes to HTTP status codes', () => {
      expect(new EngineError(EngineErrorCode.FORMAT_INVALID_MOVE_REQUEST, 'x').httpStatus).toBe(
        400
      );
      expect(new EngineError(EngineErrorCode.RULES_GAME_OVER, 'x').httpStatus).toBe(422);
      expect(new EngineError(EngineErrorCode.STATE_INVARIANT_VIOLATED, 'x').httpStatus).toBe(500);
      expect(new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'x').httpStatus).toBe(500);
    });

    it('should serialize to JSON correctly', () => {
      const error = new EngineError(
        EngineErrorCode.FORMAT_INVALID_POSITION_STRING,
        'Position string needs at least four fields',
        { fieldCount: 2 },
        'BoardCodec'
      );

      const json = error.toJSON();

      expect(json.error).toBe(true);
      expect(json.type).toBe('EngineError');
      expect(json.code).toBe('FORMAT_INVALID_POSITION_STRING');
      expect(json.message).toBe('Position string needs at least four fields');
      expect(json.domain).toBe('BoardCodec');
      expect(json.context).toEqual({ fieldCount: 2 });
      expect(json.category).toBe('Malformed input');
      expect(json.isFatal).toBe(false);
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });

    it('should be an instance of Error', () => {
      const error = new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'Boom');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EngineError);
    });
  });

  describe('FormatError', () => {
    it('should use the Format domain and never be fatal', () => {
      const error = new FormatError(EngineErrorCode.FORMAT_INVALID_PIECE, 'Invalid piece: x');

      expect(error.name).toBe('FormatError');
      expect(error.domain).toBe('Format');
      expect(error.isFatal).toBe(false);
      expect(error.httpStatus).toBe(400);
      expect(error).toBeInstanceOf(EngineError);
      expect(error).toBeInstanceOf(FormatError);
    });
  });

  describe('IllegalMoveError', () => {
    it('should use the Rules domain and never be fatal', () => {
      const error = new IllegalMoveError(
        EngineErrorCode.RULES_NOT_YOUR_TURN,
        "It is white's turn",
        { move: 'e7e5' }
      );

      expect(error.name).toBe('IllegalMoveError');
      expect(error.domain).toBe('Rules');
      expect(error.isFatal).toBe(false);
      expect(error.httpStatus).toBe(422);
      expect(error).toBeInstanceOf(EngineError);
      expect(error).toBeInstanceOf(IllegalMoveError);
    });
  });

  describe('CorruptStateError', () => {
    it('should use the State domain and always be fatal', () => {
      const error = new CorruptStateError(
        EngineErrorCode.STATE_INVARIANT_VIOLATED,
        'white has 2 kings'
      );

      expect(error.name).toBe('CorruptStateError');
      expect(error.domain).toBe('State');
      expect(error.isFatal).toBe(true);
      expect(error.httpStatus).toBe(500);
      expect(error).toBeInstanceOf(EngineError);
      expect(error).toBeInstanceOf(CorruptStateError);
    });
  });

  describe('type guards', () => {
    const format = new FormatError(EngineErrorCode.FORMAT_INVALID_SQUARE, 'bad square');
    const illegal = new IllegalMoveError(EngineErrorCode.RULES_ILLEGAL_MOVE, 'illegal');
    const corrupt = new CorruptStateError(EngineErrorCode.STATE_KING_NOT_FOUND, 'no king');

    it('should tell the three kinds apart', () => {
      expect(isFormatError(format)).toBe(true);
      expect(isFormatError(illegal)).toBe(false);
      expect(isIllegalMoveError(illegal)).toBe(true);
      expect(isIllegalMoveError(corrupt)).toBe(false);
      expect(isCorruptStateError(corrupt)).toBe(true);
      expect(isCorruptStateError(format)).toBe(false);
    });

    it('should recognise every subclass as an EngineError', () => {
      expect(isEngineError(format)).toBe(true);
      expect(isEngineError(illegal)).toBe(true);
      expect(isEngineError(corrupt)).toBe(true);
      expect(isEngineError(new Error('plain'))).toBe(false);
      expect(isEngineError('string')).toBe(false);
      expect(isEngineError(null)).toBe(false);
    });

    it('should only report corrupt state as fatal', () => {
      expect(isFatalError(corrupt)).toBe(true);
      expect(isFatalError(illegal)).toBe(false);
      expect(isFatalError(format)).toBe(false);
      expect(isFatalError(new Error('plain'))).toBe(false);
    });
  });

  describe('wrapEngineError', () => {
    it('should return an EngineError unchanged', () => {
      const original = new IllegalMoveError(EngineErrorCode.RULES_ILLEGAL_MOVE, 'illegal');

      expect(wrapEngineError(original)).toBe(original);
    });

    it('should wrap a standard Error as an internal assertion', () => {
      const original = new Error('Something went wrong');
      const wrapped = wrapEngineError(original, 'Facade', { operation: 'playMove' });

      expect(wrapped.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
      expect(wrapped.message).toBe('Something went wrong');
      expect(wrapped.domain).toBe('Facade');
      expect(wrapped.context.operation).toBe('playMove');
      expect(wrapped.context.originalStack).toBe(original.stack);
    });

    it('should wrap a non-Error value', () => {
      const wrapped = wrapEngineError('string error');

      expect(wrapped.message).toBe('string error');
      expect(wrapped.domain).toBe('Engine');
      expect(wrapped.context.originalStack).toBeUndefined();
    });
  });

  describe('kingNotFound', () => {
    it('should build a fatal STATE_KING_NOT_FOUND error', () => {
      const error = kingNotFound('black', { position: '8/8/8/8/8/8/8/4K3 w - - 0 1' });

      expect(error).toBeInstanceOf(CorruptStateError);
      expect(error.code).toBe(EngineErrorCode.STATE_KING_NOT_FOUND);
      expect(error.message).toBe('No black king on the board');
      expect(error.context).toEqual({ color: 'black', position: '8/8/8/8/8/8/8/4K3 w - - 0 1' });
      expect(error.isFatal).toBe(true);
    });
  });
});
