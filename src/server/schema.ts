import { z } from "zod";
import { ANALYSIS_DEFAULTS } from "@/config";
import type { AnalyzeRequest } from "@/features/analysis/types";

export const analyzeRequestSchema = z.object({
  record: z.string(),
  initial_position: z.string().optional(),
  depth: z.number().int().positive().default(ANALYSIS_DEFAULTS.depth),
  // clamped to [1, 3] by the analyzer, not rejected
  line_count: z.number().int().default(ANALYSIS_DEFAULTS.lineCount),
  time_budget_seconds: z.number().positive().default(ANALYSIS_DEFAULTS.timeBudgetSeconds),
});

export type AnalyzeRequestBody = z.infer<typeof analyzeRequestSchema>;

export function toAnalyzeRequest(body: AnalyzeRequestBody): AnalyzeRequest {
  return {
    record: body.record,
    initialPosition: body.initial_position,
    depth: body.depth,
    lineCount: body.line_count,
    timeBudgetSeconds: body.time_budget_seconds,
  };
}
