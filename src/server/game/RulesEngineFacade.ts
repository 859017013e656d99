import type winston from 'winston';
import type { Color, GameStatus, PieceKind } from '../../shared/engine';
import {
  Board,
  EngineErrorCode,
  IllegalMoveError,
  Position,
  assertMoveLegal,
  describePosition,
  determineGameStatus,
  executeMove,
  inCheck,
  isEngineError,
  legalMovesFor,
  toSan,
  winnerOf,
  wrapEngineError,
  type PositionSummary,
} from '../../shared/engine';
import {
  moveFromRequest,
  parseMoveRequest,
  parsePositionString,
} from '../../shared/validation/schemas';
import { logger as defaultLogger } from '../utils/logger';

/** Destinations reachable from one square, as returned to clients. */
export interface LegalDestinations {
  square: string;
  legalMoves: string[];
}

/**
 * Everything the game service records about one accepted move.
 */
export interface MoveOutcome {
  /** Move label, e.g. "e7e8q". */
  move: string;
  san: string;
  piece: PieceKind;
  isCapture: boolean;
  isCastle: boolean;
  isEnPassant: boolean;
  /** Whether the side now to move is in check. */
  isCheck: boolean;
  isCheckmate: boolean;
  /** Position-encoding string after the move. */
  position: string;
  status: GameStatus;
  sideToMove: Color;
  winner: Color | null;
}

export interface PlayMoveOptions {
  /**
   * Color of the player submitting the move. When given, a move submitted
   * out of turn is rejected even if the piece belongs to the side to move.
   */
  actingColor?: Color;
}

/**
 * Counters the game service can scrape to spot misbehaving clients or
 * corrupted stored positions.
 */
export interface RulesDiagnostics {
  acceptedMoves: number;
  rejectedMoves: number;
  malformedRequests: number;
  corruptStates: number;
}

/**
 * RulesEngineFacade
 *
 * The narrow surface the external game service calls: load a stored
 * position, answer "where can this piece go", and process one player action.
 *
 * The facade keeps no board state of its own. Every call works on the
 * Board passed in, and only {@link playMove} mutates it. Engine errors are
 * logged and rethrown unchanged so the caller can map them to responses
 * (see EngineError.httpStatus); anything else is wrapped first.
 */
export class RulesEngineFacade {
  private diagnostics: RulesDiagnostics = {
    acceptedMoves: 0,
    rejectedMoves: 0,
    malformedRequests: 0,
    corruptStates: 0,
  };

  constructor(private readonly log: winston.Logger = defaultLogger) {}

  /**
   * Decode a stored position, or the standard starting position when
   * `encoded` is undefined.
   */
  loadPosition(encoded?: unknown): Board {
    if (encoded === undefined) {
      return Board.initial();
    }
    return this.guard('loadPosition', () => Board.decode(parsePositionString(encoded)));
  }

  /**
   * Destinations of the piece on `square`, whichever side owns it. Promotion
   * choices collapse into one destination.
   */
  legalDestinations(board: Board, square: string): LegalDestinations {
    return this.guard('legalDestinations', () => {
      const from = Position.fromLabel(square);
      const destinations = legalMovesFor(board, from).map((move) => move.to.toLabel());
      return { square, legalMoves: [...new Set(destinations)] };
    });
  }

  /**
   * Validate and apply one move request (`{ from, to, promotion? }`) to
   * `board`. The board is untouched when the move is rejected.
   */
  playMove(board: Board, request: unknown, options: PlayMoveOptions = {}): MoveOutcome {
    return this.guard('playMove', () => {
      const requested = moveFromRequest(parseMoveRequest(request));
      const label = requested.toLabel();

      if (options.actingColor && options.actingColor !== board.sideToMove) {
        throw new IllegalMoveError(
          EngineErrorCode.RULES_NOT_YOUR_TURN,
          `It is ${board.sideToMove}'s turn`,
          { move: label, sideToMove: board.sideToMove, actingColor: options.actingColor },
          'RulesEngineFacade'
        );
      }

      const statusBefore = determineGameStatus(board);
      if (statusBefore !== 'in_progress') {
        throw new IllegalMoveError(
          EngineErrorCode.RULES_GAME_OVER,
          `Game is over (${statusBefore})`,
          { move: label, status: statusBefore },
          'RulesEngineFacade'
        );
      }

      const move = assertMoveLegal(board, requested);
      const mover = board.get(move.from);
      if (!mover) {
        // assertMoveLegal has already checked the origin square
        throw new IllegalMoveError(
          EngineErrorCode.RULES_NO_PIECE,
          `No piece on ${move.from.toLabel()}`,
          { move: label },
          'RulesEngineFacade'
        );
      }
      const san = toSan(board, move);

      executeMove(board, move);

      const status = determineGameStatus(board);
      const outcome: MoveOutcome = {
        move: move.toLabel(),
        san,
        piece: mover.kind,
        isCapture: move.isCapture,
        isCastle: move.isCastle,
        isEnPassant: move.isEnPassant,
        isCheck: inCheck(board, board.sideToMove),
        isCheckmate: status === 'checkmate',
        position: board.encode(),
        status,
        sideToMove: board.sideToMove,
        winner: winnerOf(board, status),
      };

      this.diagnostics.acceptedMoves++;
      this.log.debug('Move accepted', {
        move: outcome.move,
        san: outcome.san,
        status: outcome.status,
        position: outcome.position,
      });
      if (status !== 'in_progress') {
        this.log.info('Game reached a terminal position', {
          status,
          winner: outcome.winner,
          position: outcome.position,
        });
      }
      return outcome;
    });
  }

  describe(board: Board): PositionSummary {
    return this.guard('describe', () => describePosition(board));
  }

  getDiagnostics(): RulesDiagnostics {
    return { ...this.diagnostics };
  }

  /**
   * Run `fn`, logging failures by kind. Engine errors are rethrown as they
   * are; anything else is wrapped as an internal engine error.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (!isEngineError(error)) {
        const wrapped = wrapEngineError(error, 'RulesEngineFacade', { operation });
        this.log.error('Unexpected engine failure', { operation, error: wrapped });
        throw wrapped;
      }
      if (error.isFatal) {
        this.diagnostics.corruptStates++;
        this.log.error('Corrupt board state', { operation, error });
      } else if (error.code.startsWith('FORMAT_')) {
        this.diagnostics.malformedRequests++;
        this.log.warn('Malformed input', { operation, code: error.code, message: error.message });
      } else {
        this.diagnostics.rejectedMoves++;
        this.log.warn('Move rejected', { operation, code: error.code, context: error.context });
      }
      throw error;
    }
  }
}
