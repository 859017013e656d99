import { z } from 'zod';
import { EngineErrorCode, FormatError } from '../engine/errors';
import { Move } from '../engine/move';
import { pieceKindFromLetter } from '../engine/piece';
import { Position } from '../engine/position';

export const SQUARE_LABEL_REGEX = /^[a-h][1-8]$/;

// Square label validation ("e4")
export const SquareLabelSchema = z
  .string()
  .regex(SQUARE_LABEL_REGEX, 'Square must be a file a-h followed by a rank 1-8');

// Move request validation
// NOTE: this is the wire-level payload the game service accepts for one
// player action. An empty promotion string is treated as "no promotion".
export const MoveRequestSchema = z.object({
  from: SquareLabelSchema,
  to: SquareLabelSchema,
  promotion: z
    .string()
    .regex(/^[QRBNqrbn]?$/, 'Promotion must be one of Q, R, B, N')
    .optional(),
});

export type MoveRequest = z.infer<typeof MoveRequestSchema>;

// Position-encoding string: shape only, the codec checks the fields.
export const PositionStringSchema = z.string().trim().min(1, 'Position string is required');

export type ValidationSchema<T> = z.ZodType<T>;

/**
 * Parse `input` against `schema`, turning a zod failure into a FormatError
 * with the issues in its context.
 */
export function parseOrThrow<T>(
  schema: ValidationSchema<T>,
  input: unknown,
  code: EngineErrorCode,
  what: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new FormatError(code, `Invalid ${what}`, { issues }, 'Validation');
  }
  return result.data;
}

export function parseMoveRequest(input: unknown): MoveRequest {
  return parseOrThrow(
    MoveRequestSchema,
    input,
    EngineErrorCode.FORMAT_INVALID_MOVE_REQUEST,
    'move request'
  );
}

export function parsePositionString(input: unknown): string {
  return parseOrThrow(
    PositionStringSchema,
    input,
    EngineErrorCode.FORMAT_INVALID_POSITION_STRING,
    'position string'
  );
}

/** Build an unflagged Move from a validated request. */
export function moveFromRequest(request: MoveRequest): Move {
  const promotion = request.promotion ? pieceKindFromLetter(request.promotion) : null;
  return new Move(Position.fromLabel(request.from), Position.fromLabel(request.to), promotion);
}
