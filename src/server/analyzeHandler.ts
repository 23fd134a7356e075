import { NextResponse } from "next/server";
import type { EngineFactory } from "@/features/analysis/engine";
import { analyzeGame } from "@/features/analysis/pipeline";
import { logger } from "@/utils/log";
import { analyzeRequestSchema, toAnalyzeRequest } from "./schema";

function requestId() {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Builds the POST handler. The envelope always comes back with HTTP 200; only a body that
 * does not match the request schema is refused.
 */
export function createAnalyzeHandler(openEngine: EngineFactory) {
  return async function POST(req: Request) {
    const reqId = requestId();
    const log = logger.child({ reqId });

    let body: unknown;
    try {
      body = await req.json();
    } catch {
      log.info("analysis:bad_json");
      return NextResponse.json(
        { error: "Invalid request", issues: [{ message: "Body is not valid JSON" }] },
        { status: 422 },
      );
    }

    const parsed = analyzeRequestSchema.safeParse(body);
    if (!parsed.success) {
      log.info({ issues: parsed.error.issues }, "analysis:bad_request");
      return NextResponse.json({ error: "Invalid request", issues: parsed.error.issues }, { status: 422 });
    }

    const request = toAnalyzeRequest(parsed.data);
    log.info(
      { depth: request.depth, lineCount: request.lineCount, timeBudgetSeconds: request.timeBudgetSeconds },
      "analysis:start",
    );
    const envelope = await analyzeGame(request, { openEngine, logger: log });
    return NextResponse.json(envelope);
  };
}
