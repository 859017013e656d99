import type { Color } from '../types/chess';
import { backRank } from '../types/chess';
import {
  STARTING_POSITION,
  decodePosition,
  encodePlacement,
  encodePosition,
  type CastlingRights,
  type CastleSides,
} from './boardCodec';
import { FILE_LETTERS, Position } from './position';
import type { Piece } from './piece';

export type CastleSide = keyof CastleSides;

export interface PlacedPiece {
  position: Position;
  piece: Piece;
}

export interface BoardInit {
  squares?: Array<Piece | null>;
  sideToMove?: Color;
  castlingRights?: CastlingRights;
  enPassantTarget?: Position | null;
  halfMoveClock?: number;
  fullMoveNumber?: number;
  history?: string[];
}

function noCastlingRights(): CastlingRights {
  return {
    white: { kingside: false, queenside: false },
    black: { kingside: false, queenside: false },
  };
}

/**
 * Full game position: piece placement, side to move, castling rights,
 * en-passant target, clocks and the placement history used for repetition.
 *
 * A Board is owned by exactly one caller at a time. The validator mutates it
 * in place; legality checks run against {@link copy}.
 */
export class Board {
  private readonly squares: Array<Piece | null>;
  sideToMove: Color;
  enPassantTarget: Position | null;
  halfMoveClock: number;
  fullMoveNumber: number;
  private readonly rights: CastlingRights;
  private readonly history: string[];

  constructor(init: BoardInit = {}) {
    this.squares = init.squares
      ? init.squares.slice(0, 64)
      : new Array<Piece | null>(64).fill(null);
    while (this.squares.length < 64) {
      this.squares.push(null);
    }
    this.sideToMove = init.sideToMove ?? 'white';
    this.rights = init.castlingRights ?? noCastlingRights();
    this.enPassantTarget = init.enPassantTarget ?? null;
    this.halfMoveClock = init.halfMoveClock ?? 0;
    this.fullMoveNumber = init.fullMoveNumber ?? 1;
    this.history = init.history ? [...init.history] : [];
  }

  /** The standard starting layout, white to move. */
  static initial(): Board {
    return Board.decode(STARTING_POSITION);
  }

  /**
   * Build a board from a position-encoding string. Castling rights that the
   * placement cannot back are dropped.
   *
   * @throws FormatError on a malformed string.
   */
  static decode(encoded: string): Board {
    const decoded = decodePosition(encoded);
    const board = new Board({ ...decoded, history: [] });
    board.dropUnbackedCastlingRights();
    return board;
  }

  /**
   * Clear any right whose king is not on its e-file home square or whose
   * rook is not on its corner.
   */
  private dropUnbackedCastlingRights(): void {
    for (const color of ['white', 'black'] as const) {
      const kingHome = new Position(backRank(color), 5);
      const kingInPlace = this.get(kingHome)?.is('king', color) ?? false;
      for (const side of ['kingside', 'queenside'] as const) {
        const rookInPlace = this.get(Board.rookHome(color, side))?.is('rook', color) ?? false;
        if (!kingInPlace || !rookInPlace) {
          this.setCastlingRight(color, side, false);
        }
      }
    }
  }

  encode(): string {
    return encodePosition({
      squares: this.squares,
      sideToMove: this.sideToMove,
      castlingRights: this.rights,
      enPassantTarget: this.enPassantTarget,
      halfMoveClock: this.halfMoveClock,
      fullMoveNumber: this.fullMoveNumber,
    });
  }

  // ===========================================================================
  // Squares
  // ===========================================================================

  get(position: Position): Piece | null {
    return this.squares[position.index] ?? null;
  }

  set(position: Position, piece: Piece | null): void {
    this.squares[position.index] = piece;
  }

  /** Every occupied square, a1 first. */
  pieces(): PlacedPiece[] {
    const result: PlacedPiece[] = [];
    this.squares.forEach((piece, index) => {
      if (piece) {
        result.push({ position: Position.fromIndex(index), piece });
      }
    });
    return result;
  }

  piecesOf(color: Color): PlacedPiece[] {
    return this.pieces().filter(({ piece }) => piece.color === color);
  }

  /** The square of `color`'s king, or null when there is none. */
  findKing(color: Color): Position | null {
    const index = this.squares.findIndex((piece) => piece?.is('king', color) ?? false);
    return index === -1 ? null : Position.fromIndex(index);
  }

  // ===========================================================================
  // Castling rights
  // ===========================================================================

  canCastle(color: Color, side: CastleSide): boolean {
    return this.rights[color][side];
  }

  setCastlingRight(color: Color, side: CastleSide, allowed: boolean): void {
    this.rights[color][side] = allowed;
  }

  /** Home corner of the rook belonging to `side`. */
  static rookHome(color: Color, side: CastleSide): Position {
    return new Position(backRank(color), side === 'kingside' ? 8 : 1);
  }

  // ===========================================================================
  // History
  // ===========================================================================

  placementField(): string {
    return encodePlacement(this.squares);
  }

  recordPlacement(): void {
    this.history.push(this.placementField());
  }

  get positionHistory(): readonly string[] {
    return this.history;
  }

  countPlacementOccurrences(placement: string): number {
    return this.history.filter((entry) => entry === placement).length;
  }

  // ===========================================================================
  // Copy / debug
  // ===========================================================================

  /** Independent clone: pieces, rights and history are all copied. */
  copy(): Board {
    return new Board({
      squares: this.squares.map((piece) => (piece ? piece.clone() : null)),
      sideToMove: this.sideToMove,
      castlingRights: {
        white: { ...this.rights.white },
        black: { ...this.rights.black },
      },
      enPassantTarget: this.enPassantTarget,
      halfMoveClock: this.halfMoveClock,
      fullMoveNumber: this.fullMoveNumber,
      history: this.history,
    });
  }

  /**
   * Invariants that must hold after every executed move. Returns the list of
   * violations (empty when the board is consistent).
   */
  invariantViolations(): string[] {
    const violations: string[] = [];
    if (!Number.isInteger(this.halfMoveClock) || this.halfMoveClock < 0) {
      violations.push(`half-move clock is ${this.halfMoveClock}`);
    }

    for (const color of ['white', 'black'] as const) {
      const kings = this.piecesOf(color).filter(({ piece }) => piece.kind === 'king');
      if (kings.length > 1) {
        violations.push(`${color} has ${kings.length} kings`);
      }
      const movedKing = kings.some(({ piece }) => piece.hasMoved);
      for (const side of ['kingside', 'queenside'] as const) {
        if (!this.canCastle(color, side)) {
          continue;
        }
        if (movedKing) {
          violations.push(`${color} keeps ${side} castling after the king moved`);
        }
        const rook = this.get(Board.rookHome(color, side));
        if (rook && rook.is('rook', color) && rook.hasMoved) {
          violations.push(`${color} keeps ${side} castling after the rook moved`);
        }
      }
    }
    return violations;
  }

  toString(): string {
    const header = `  ${FILE_LETTERS.join(' ')}`;
    const lines = [header];
    for (let rank = 8; rank >= 1; rank--) {
      const cells: string[] = [];
      for (let file = 1; file <= 8; file++) {
        const piece = this.squares[(rank - 1) * 8 + (file - 1)];
        cells.push(piece ? piece.toSymbol() : '.');
      }
      lines.push(`${rank} ${cells.join(' ')} ${rank}`);
    }
    lines.push(header);
    return lines.join('\n');
  }
}
