export interface AnalyzeRequest {
  record: string;
  initialPosition?: string;
  depth: number;
  lineCount: number;
  timeBudgetSeconds: number;
}

export interface CandidateLine {
  rank: number;
  uci: string;
  san: string;
  eval_cp: number;
}

export interface PlyRecord {
  ply: number;
  played_uci: string;
  played_san: string;
  fen_after: string;
  /** Principal line, centipawns from white's side. Mate is ±100000. */
  eval_cp: number | null;
  delta_cp: number | null;
  pvs: CandidateLine[];
}

export interface KeyMoment {
  ply: number;
  played_san: string;
  eval_cp: number;
  swing: number;
}

export type ErrorCode = "INVALID_PGN" | "INVALID_FEN" | "ILLEGAL_MOVE" | "INTERNAL_ERROR";

export interface EnvelopeError {
  code: ErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export interface ResultEnvelope {
  status: "ok" | "error";
  legal: boolean;
  per_ply: PlyRecord[];
  key_moments: KeyMoment[];
  error: EnvelopeError | null;
}
