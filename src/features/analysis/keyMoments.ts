import { ANALYSIS_LIMITS } from "@/config";
import type { KeyMoment, PlyRecord } from "./types";

/**
 * Plies with the largest evaluation swing against the ply right before them.
 * A ply is skipped when either evaluation is missing.
 */
export function selectKeyMoments(plies: PlyRecord[], limit: number = ANALYSIS_LIMITS.keyMomentCount): KeyMoment[] {
  const moments: KeyMoment[] = [];

  for (let i = 1; i < plies.length; i++) {
    const prev = plies[i - 1];
    const cur = plies[i];
    if (prev.eval_cp === null || cur.eval_cp === null || prev.ply !== cur.ply - 1) continue;

    moments.push({
      ply: cur.ply,
      played_san: cur.played_san,
      eval_cp: cur.eval_cp,
      swing: Math.abs(cur.eval_cp - prev.eval_cp),
    });
  }

  return moments.sort((a, b) => b.swing - a.swing || a.ply - b.ply).slice(0, limit);
}
