/**
 * Position-encoding string codec.
 *
 * Six space-separated fields:
 *
 *   rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1
 *   placement      side  castling  en-passant  half-move clock  full-move number
 *
 * Decoding tolerates a string with only the first four fields (clock 0,
 * move number 1). Everything here works on plain data so that {@link Board}
 * can build itself from the result without a circular import.
 */

import type { Color } from '../types/chess';
import { EngineErrorCode, FormatError } from './errors';
import { Piece } from './piece';
import { Position } from './position';

export const STARTING_POSITION = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export interface CastleSides {
  kingside: boolean;
  queenside: boolean;
}

export type CastlingRights = Record<Color, CastleSides>;

export interface DecodedPosition {
  /** 64 slots, a1 first (see {@link Position.index}). */
  squares: Array<Piece | null>;
  sideToMove: Color;
  castlingRights: CastlingRights;
  enPassantTarget: Position | null;
  halfMoveClock: number;
  fullMoveNumber: number;
}

function formatError(message: string, context: Record<string, unknown>): FormatError {
  return new FormatError(
    EngineErrorCode.FORMAT_INVALID_POSITION_STRING,
    message,
    context,
    'BoardCodec'
  );
}

// =============================================================================
// ENCODE
// =============================================================================

export function encodePlacement(squares: ReadonlyArray<Piece | null>): string {
  const ranks: string[] = [];
  for (let rank = 8; rank >= 1; rank--) {
    let text = '';
    let empty = 0;
    for (let file = 1; file <= 8; file++) {
      const piece = squares[(rank - 1) * 8 + (file - 1)];
      if (!piece) {
        empty++;
        continue;
      }
      if (empty > 0) {
        text += String(empty);
        empty = 0;
      }
      text += piece.toSymbol();
    }
    if (empty > 0) {
      text += String(empty);
    }
    ranks.push(text);
  }
  return ranks.join('/');
}

export function encodeCastlingRights(rights: CastlingRights): string {
  const text =
    (rights.white.kingside ? 'K' : '') +
    (rights.white.queenside ? 'Q' : '') +
    (rights.black.kingside ? 'k' : '') +
    (rights.black.queenside ? 'q' : '');
  return text || '-';
}

export function encodePosition(position: DecodedPosition): string {
  return [
    encodePlacement(position.squares),
    position.sideToMove === 'white' ? 'w' : 'b',
    encodeCastlingRights(position.castlingRights),
    position.enPassantTarget ? position.enPassantTarget.toLabel() : '-',
    String(position.halfMoveClock),
    String(position.fullMoveNumber),
  ].join(' ');
}

// =============================================================================
// DECODE
// =============================================================================

export function decodePlacement(field: string): Array<Piece | null> {
  const rows = field.split('/');
  if (rows.length !== 8) {
    throw formatError(`Placement must describe 8 ranks, got ${rows.length}`, { placement: field });
  }

  const squares: Array<Piece | null> = new Array<Piece | null>(64).fill(null);
  rows.forEach((row, i) => {
    const rank = 8 - i;
    let file = 1;
    for (const ch of row) {
      if (file > 8) {
        // overflow: more than 8 squares on this rank
        file = 0;
        break;
      }
      if (ch >= '1' && ch <= '8') {
        file += Number(ch);
      } else {
        squares[(rank - 1) * 8 + (file - 1)] = Piece.fromSymbol(ch);
        file++;
      }
    }
    if (file !== 9) {
      throw formatError(`Rank ${rank} does not describe exactly 8 squares`, {
        placement: field,
        rank,
        row,
      });
    }
  });
  return squares;
}

export function decodeCastlingRights(field: string): CastlingRights {
  if (field !== '-' && !/^[KQkq]{1,4}$/.test(field)) {
    throw formatError(`Invalid castling field: ${field}`, { castling: field });
  }
  return {
    white: { kingside: field.includes('K'), queenside: field.includes('Q') },
    black: { kingside: field.includes('k'), queenside: field.includes('q') },
  };
}

function decodeCounter(field: string, name: string, min: number): number {
  if (!/^\d+$/.test(field) || Number(field) < min) {
    throw formatError(`Invalid ${name}: ${field}`, { [name]: field });
  }
  return Number(field);
}

export function decodePosition(encoded: string): DecodedPosition {
  const fields = typeof encoded === 'string' ? encoded.trim().split(/\s+/) : [];
  if (fields.length < 4) {
    throw formatError('Position string needs at least four fields', {
      encoded,
      fieldCount: fields.length,
    });
  }
  const [placement, side, castling, enPassant, clock = '0', moveNumber = '1'] = fields;

  if (side !== 'w' && side !== 'b') {
    throw formatError(`Invalid side to move: ${side}`, { side });
  }

  return {
    squares: decodePlacement(placement),
    sideToMove: side === 'w' ? 'white' : 'black',
    castlingRights: decodeCastlingRights(castling),
    enPassantTarget: enPassant === '-' ? null : Position.fromLabel(enPassant),
    halfMoveClock: decodeCounter(clock, 'halfMoveClock', 0),
    fullMoveNumber: decodeCounter(moveNumber, 'fullMoveNumber', 1),
  };
}
