import { EngineErrorCode, FormatError } from './errors';

export const FILE_LETTERS = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

function inBounds(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 8;
}

/**
 * A square on the board, rank and file both 1-based (a1 = rank 1, file 1).
 *
 * Positions are immutable value objects; compare them with {@link equals},
 * never with `===`.
 */
export class Position {
  readonly rank: number;
  readonly file: number;

  constructor(rank: number, file: number) {
    if (!inBounds(rank) || !inBounds(file)) {
      throw new FormatError(
        EngineErrorCode.FORMAT_POSITION_OUT_OF_BOUNDS,
        `Invalid position: rank=${rank}, file=${file}`,
        { rank, file },
        'Position'
      );
    }
    this.rank = rank;
    this.file = file;
  }

  static isValid(rank: number, file: number): boolean {
    return inBounds(rank) && inBounds(file);
  }

  /** Parse a square label such as "e4". */
  static fromLabel(label: string): Position {
    const text = typeof label === 'string' ? label : '';
    if (text.length !== 2) {
      throw new FormatError(
        EngineErrorCode.FORMAT_INVALID_SQUARE,
        `Invalid square label: ${String(label)}`,
        { label },
        'Position'
      );
    }
    const file = text.charCodeAt(0) - 'a'.charCodeAt(0) + 1;
    const rank = text.charCodeAt(1) - '0'.charCodeAt(0);
    if (!inBounds(file) || !inBounds(rank)) {
      throw new FormatError(
        EngineErrorCode.FORMAT_INVALID_SQUARE,
        `Invalid square label: ${text}`,
        { label: text },
        'Position'
      );
    }
    return new Position(rank, file);
  }

  /** Inverse of {@link index}. */
  static fromIndex(index: number): Position {
    return new Position(Math.floor(index / 8) + 1, (index % 8) + 1);
  }

  /** Flat board index: a1 = 0, h1 = 7, a2 = 8, ..., h8 = 63. */
  get index(): number {
    return (this.rank - 1) * 8 + (this.file - 1);
  }

  /** 0 for dark squares (a1), 1 for light squares (b1). */
  get shade(): 0 | 1 {
    return (this.rank + this.file) % 2 === 0 ? 0 : 1;
  }

  toLabel(): string {
    return `${FILE_LETTERS[this.file - 1]}${this.rank}`;
  }

  /** The square `rankDelta`/`fileDelta` away, or null when that is off the board. */
  offset(rankDelta: number, fileDelta: number): Position | null {
    const rank = this.rank + rankDelta;
    const file = this.file + fileDelta;
    return Position.isValid(rank, file) ? new Position(rank, file) : null;
  }

  equals(other: Position | null | undefined): boolean {
    return other != null && other.rank === this.rank && other.file === this.file;
  }

  toString(): string {
    return this.toLabel();
  }
}
