import { expect, test } from "vitest";
import { selectKeyMoments } from "@/features/analysis/keyMoments";
import type { PlyRecord } from "@/features/analysis/types";

function plies(evals: (number | null)[]): PlyRecord[] {
  return evals.map((eval_cp, i) => ({
    ply: i + 1,
    played_uci: "a2a3",
    played_san: `m${i + 1}`,
    fen_after: "",
    eval_cp,
    delta_cp: null,
    pvs: [],
  }));
}

test("picks the five largest swings, earlier plies first on ties", () => {
  const moments = selectKeyMoments(plies([10, 30, -200, null, 50, 60, 500, 480, -100000]));
  expect(moments.map((m) => m.ply)).toEqual([9, 7, 3, 2, 8]);
  expect(moments[0]).toEqual({ ply: 9, played_san: "m9", eval_cp: -100000, swing: 100480 });
  expect(moments[1]).toEqual({ ply: 7, played_san: "m7", eval_cp: 500, swing: 440 });
});

test("skips plies next to a missing evaluation", () => {
  const moments = selectKeyMoments(plies([0, null, 900, 0]));
  expect(moments).toEqual([{ ply: 4, played_san: "m4", eval_cp: 0, swing: 900 }]);
});

test("never reports the first ply", () => {
  expect(selectKeyMoments(plies([500]))).toEqual([]);
  expect(selectKeyMoments([])).toEqual([]);
});

test("respects a custom limit", () => {
  expect(selectKeyMoments(plies([0, 10, 30, 60]), 2).map((m) => m.ply)).toEqual([4, 3]);
});
