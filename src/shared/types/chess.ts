/**
 * Core chess domain types shared by the engine and the game-service facade.
 *
 * Keep these types transport-agnostic: everything here is a plain string
 * union so that it survives JSON round-trips unchanged.
 */

export type Color = 'white' | 'black';

export type PieceKind = 'pawn' | 'knight' | 'bishop' | 'rook' | 'queen' | 'king';

/** Kinds a pawn may promote to, in the order the generator emits them. */
export type PromotionKind = Extract<PieceKind, 'queen' | 'rook' | 'bishop' | 'knight'>;

export const PROMOTION_KINDS: readonly PromotionKind[] = ['queen', 'rook', 'bishop', 'knight'];

/**
 * Terminal classification produced by the engine.
 *
 * 'in_progress' is the only non-terminal value.
 */
export type GameStatus =
  | 'in_progress'
  | 'checkmate'
  | 'stalemate'
  | 'draw_fifty_move'
  | 'draw_repetition'
  | 'draw_insufficient_material';

/**
 * Terminal states the external game service assigns on its own. The engine
 * never produces these; they are listed so that a full game outcome can be
 * typed in one place.
 */
export type ExternalTerminalStatus = 'resignation' | 'timeout' | 'abandoned' | 'draw_agreement';

export type GameOutcomeStatus = GameStatus | ExternalTerminalStatus;

export function isTerminalStatus(status: GameOutcomeStatus): boolean {
  return status !== 'in_progress';
}

export function oppositeColor(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/** Rank delta of a pawn step for `color`. */
export function pawnDirection(color: Color): 1 | -1 {
  return color === 'white' ? 1 : -1;
}

/** Rank the king and rooks start on. */
export function backRank(color: Color): 1 | 8 {
  return color === 'white' ? 1 : 8;
}

export function pawnStartRank(color: Color): 2 | 7 {
  return color === 'white' ? 2 : 7;
}

export function promotionRank(color: Color): 8 | 1 {
  return color === 'white' ? 8 : 1;
}

/** Rank a pawn of `color` must stand on to capture en passant. */
export function enPassantCaptureRank(color: Color): 5 | 4 {
  return color === 'white' ? 5 : 4;
}
