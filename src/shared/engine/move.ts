import type { PieceKind } from '../types/chess';
import { EngineErrorCode, FormatError } from './errors';
import { PIECE_KIND_INFO, pieceKindFromLetter } from './piece';
import { Position } from './position';

export interface MoveFlags {
  isCapture?: boolean;
  isCastle?: boolean;
  isEnPassant?: boolean;
}

/**
 * A single ply: origin, destination, optional promotion kind and the three
 * special-move flags set by the generator.
 *
 * Moves built from a label or a request carry no flags; resolve them against
 * the legal-move set before executing.
 */
export class Move {
  readonly from: Position;
  readonly to: Position;
  readonly promotion: PieceKind | null;
  readonly isCapture: boolean;
  readonly isCastle: boolean;
  readonly isEnPassant: boolean;

  constructor(
    from: Position,
    to: Position,
    promotion: PieceKind | null = null,
    flags: MoveFlags = {}
  ) {
    this.from = from;
    this.to = to;
    this.promotion = promotion;
    this.isCapture = flags.isCapture ?? false;
    this.isCastle = flags.isCastle ?? false;
    this.isEnPassant = flags.isEnPassant ?? false;
  }

  /**
   * Parse a move label: origin square, destination square and an optional
   * promotion letter ("e2e4", "e7e8q").
   */
  static fromLabel(label: string): Move {
    if (typeof label !== 'string' || (label.length !== 4 && label.length !== 5)) {
      throw new FormatError(
        EngineErrorCode.FORMAT_INVALID_MOVE_LABEL,
        `Invalid move label: ${String(label)}`,
        { label },
        'Move'
      );
    }
    const from = Position.fromLabel(label.slice(0, 2));
    const to = Position.fromLabel(label.slice(2, 4));
    const promotion = label.length === 5 ? pieceKindFromLetter(label.charAt(4)) : null;
    return new Move(from, to, promotion);
  }

  /** Same origin, destination and promotion; flags are ignored. */
  sameAction(other: Move): boolean {
    return (
      this.from.equals(other.from) &&
      this.to.equals(other.to) &&
      this.promotion === other.promotion
    );
  }

  equals(other: Move | null | undefined): boolean {
    return (
      other != null &&
      this.sameAction(other) &&
      this.isCapture === other.isCapture &&
      this.isCastle === other.isCastle &&
      this.isEnPassant === other.isEnPassant
    );
  }

  toLabel(): string {
    const suffix = this.promotion ? PIECE_KIND_INFO[this.promotion].letter.toLowerCase() : '';
    return `${this.from.toLabel()}${this.to.toLabel()}${suffix}`;
  }

  toString(): string {
    return this.toLabel();
  }
}
