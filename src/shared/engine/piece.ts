import type { Color, PieceKind } from '../types/chess';
import { EngineErrorCode, FormatError } from './errors';

export interface PieceKindInfo {
  /** Uppercase notation letter. */
  letter: string;
  /** Relative material value. */
  value: number;
}

export const PIECE_KIND_INFO: Record<PieceKind, PieceKindInfo> = {
  pawn: { letter: 'P', value: 1 },
  knight: { letter: 'N', value: 3 },
  bishop: { letter: 'B', value: 3 },
  rook: { letter: 'R', value: 5 },
  queen: { letter: 'Q', value: 9 },
  king: { letter: 'K', value: 1000 },
};

const KIND_BY_LETTER: Record<string, PieceKind> = {
  P: 'pawn',
  N: 'knight',
  B: 'bishop',
  R: 'rook',
  Q: 'queen',
  K: 'king',
};

/** Resolve a notation letter (either case) to a piece kind. */
export function pieceKindFromLetter(letter: string): PieceKind {
  const kind = KIND_BY_LETTER[letter.toUpperCase()];
  if (!kind) {
    throw new FormatError(
      EngineErrorCode.FORMAT_INVALID_PIECE,
      `Invalid piece notation: ${letter}`,
      { letter },
      'Piece'
    );
  }
  return kind;
}

/**
 * A piece on the board.
 *
 * Kind and color never change. `hasMoved` is flipped by the validator when
 * the piece is moved and gates castling only.
 */
export class Piece {
  readonly kind: PieceKind;
  readonly color: Color;
  private moved: boolean;

  constructor(kind: PieceKind, color: Color, hasMoved: boolean = false) {
    this.kind = kind;
    this.color = color;
    this.moved = hasMoved;
  }

  /** Decode a placement-field character: uppercase white, lowercase black. */
  static fromSymbol(symbol: string): Piece {
    if (symbol.length !== 1) {
      throw new FormatError(
        EngineErrorCode.FORMAT_INVALID_PIECE,
        `Invalid piece notation: ${symbol}`,
        { symbol },
        'Piece'
      );
    }
    const kind = pieceKindFromLetter(symbol);
    const color: Color = symbol === symbol.toUpperCase() ? 'white' : 'black';
    return new Piece(kind, color);
  }

  get hasMoved(): boolean {
    return this.moved;
  }

  get letter(): string {
    return PIECE_KIND_INFO[this.kind].letter;
  }

  get value(): number {
    return PIECE_KIND_INFO[this.kind].value;
  }

  markMoved(): void {
    this.moved = true;
  }

  /** Placement-field character. */
  toSymbol(): string {
    return this.color === 'white' ? this.letter : this.letter.toLowerCase();
  }

  is(kind: PieceKind, color?: Color): boolean {
    return this.kind === kind && (color === undefined || this.color === color);
  }

  clone(): Piece {
    return new Piece(this.kind, this.color, this.moved);
  }

  equals(other: Piece | null | undefined): boolean {
    return (
      other != null &&
      other.kind === this.kind &&
      other.color === this.color &&
      other.hasMoved === this.moved
    );
  }

  toString(): string {
    return `${this.color} ${this.kind}`;
  }
}
