import { parseUci } from "chessops";
import { type Chess, normalizeMove } from "chessops/chess";
import { makeSan } from "chessops/san";
import { ANALYSIS_LIMITS } from "@/config";
import { uciNormalize } from "@/utils/chess";
import type { EngineAdapter, EngineLine, SearchLimits } from "./engine";
import { EngineError } from "./errors";
import type { ReplayedMove } from "./replayer";
import type { CandidateLine, PlyRecord } from "./types";

export function clampLineCount(lineCount: number): number {
  return Math.max(1, Math.min(Math.trunc(lineCount) || 1, ANALYSIS_LIMITS.maxLineCount));
}

function toCandidate(position: Chess, line: EngineLine): CandidateLine | null {
  const [best] = line.uciMoves;
  if (!best) return null;

  const parsed = parseUci(best);
  const move = parsed && normalizeMove(position, parsed);
  if (!move || !position.isLegal(move)) {
    throw new EngineError(`Engine suggested ${best}, which is not legal in the analysed position.`);
  }

  return {
    rank: line.multipv,
    uci: uciNormalize(position, move),
    san: makeSan(position, move),
    eval_cp: line.score,
  };
}

/** Turns whatever the engine returned into rank-ordered candidates with at most one entry per rank. */
export function normalizeLines(position: Chess, lines: EngineLine[]): CandidateLine[] {
  const byRank = new Map<number, CandidateLine>();
  for (const line of lines) {
    const candidate = toCandidate(position, line);
    if (candidate && !byRank.has(candidate.rank)) {
      byRank.set(candidate.rank, candidate);
    }
  }
  return [...byRank.values()].sort((a, b) => a.rank - b.rank);
}

export interface PlyAnalysisOptions {
  limits: SearchLimits;
  lineCount: number;
}

export async function analyzePly(
  engine: EngineAdapter,
  position: Chess,
  played: ReplayedMove,
  previousEval: number | null,
  { limits, lineCount }: PlyAnalysisOptions,
): Promise<PlyRecord> {
  const lines = await engine.analyze(position, limits, clampLineCount(lineCount));
  const pvs = normalizeLines(position, lines);

  // no rank 1 means the engine degraded; do not borrow another line's score
  const evalCp = pvs.find((pv) => pv.rank === 1)?.eval_cp ?? null;

  return {
    ply: played.ply,
    played_uci: played.uci,
    played_san: played.san,
    fen_after: played.fenAfter,
    eval_cp: evalCp,
    delta_cp: evalCp !== null && previousEval !== null ? evalCp - previousEval : null,
    pvs,
  };
}
