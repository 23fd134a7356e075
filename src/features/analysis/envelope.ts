import { match, P } from "ts-pattern";
import { IllegalMoveError, InvalidRecordError, InvalidStartPositionError } from "./errors";
import type { EnvelopeError, ErrorCode, KeyMoment, PlyRecord, ResultEnvelope } from "./types";

interface PartialResult {
  per_ply?: PlyRecord[];
  key_moments?: KeyMoment[];
}

export function ok({ per_ply = [], key_moments = [] }: PartialResult = {}): ResultEnvelope {
  return {
    status: "ok",
    legal: true,
    per_ply,
    key_moments,
    error: null,
  };
}

export function fail(
  code: ErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  { per_ply = [], key_moments = [] }: PartialResult = {},
): ResultEnvelope {
  return {
    status: "error",
    legal: false,
    per_ply,
    key_moments,
    error: { code, message, details },
  };
}

export function describeError(err: unknown, context: { ply?: number } = {}): EnvelopeError {
  return match(err)
    .with(P.instanceOf(InvalidRecordError), (e): EnvelopeError => ({
      code: "INVALID_PGN",
      message: e.message,
      details: e.offset === undefined ? {} : { offset: e.offset },
    }))
    .with(P.instanceOf(InvalidStartPositionError), (e): EnvelopeError => ({
      code: "INVALID_FEN",
      message: e.message,
      details: { fen: e.fen },
    }))
    .with(P.instanceOf(IllegalMoveError), (e): EnvelopeError => ({
      code: "ILLEGAL_MOVE",
      message: e.message,
      details: {
        first_illegal_move: {
          ply: e.move.ply,
          uci: e.move.uci,
          fen_before: e.move.fenBefore,
        },
      },
    }))
    .otherwise((e): EnvelopeError => ({
      code: "INTERNAL_ERROR",
      message: e instanceof Error ? e.message : "Unknown error occurred",
      details: context.ply === undefined ? {} : { ply: context.ply },
    }));
}

/** Wraps any failure in an error envelope, keeping the plies analysed before it. */
export function failWith(err: unknown, partial: PartialResult = {}, context: { ply?: number } = {}): ResultEnvelope {
  const { code, message, details } = describeError(err, context);
  return fail(code, message, details, partial);
}
