import type { Color } from "chessops";
import { match } from "ts-pattern";
import { ANALYSIS_LIMITS } from "@/config";

/** A score as an engine reports it: relative to the side to move. */
export interface ScoreValue {
  type: "cp" | "mate";
  value: number;
}

export const MATE_SCORE_CP = ANALYSIS_LIMITS.mateSentinelCp;

export function formatScore(score: ScoreValue, precision = 2): string {
  let scoreText = match(score.type)
    .with("cp", () => Math.abs(score.value / 100).toFixed(precision))
    .with("mate", () => `M${Math.abs(score.value)}`)
    .exhaustive();

  if (score.value > 0) scoreText = `+${scoreText}`;
  if (score.value < 0) scoreText = `-${scoreText}`;
  return scoreText;
}

/**
 * Converts an engine score into centipawns from white's point of view.
 *
 * Mate scores collapse to `±MATE_SCORE_CP`: the distance to mate is dropped and only
 * the winning side survives. `mate 0` means the side to move is already mated.
 */
export function normalizeScore(score: ScoreValue, turn: Color): number {
  let cp = match(score.type)
    .with("cp", () => score.value)
    .with("mate", () => (score.value > 0 ? MATE_SCORE_CP : -MATE_SCORE_CP))
    .exhaustive();

  if (turn === "black") cp *= -1;

  // avoid -0 for a level position with black to move
  return cp === 0 ? 0 : cp;
}

export function isMateScore(cp: number): boolean {
  return Math.abs(cp) >= MATE_SCORE_CP;
}

/** Formats a white-perspective centipawn value, showing mate sentinels as `+M`/`-M`. */
export function formatCentipawns(cp: number): string {
  if (isMateScore(cp)) return cp > 0 ? "+M" : "-M";
  return formatScore({ type: "cp", value: cp });
}
