import { logger as rootLogger, type Logger } from "@/utils/log";
import { decodeGame } from "./decoder";
import type { EngineFactory, EngineSession } from "./engine";
import { failWith, ok } from "./envelope";
import { selectKeyMoments } from "./keyMoments";
import { analyzePly } from "./plyAnalyzer";
import { PositionReplayer } from "./replayer";
import type { AnalyzeRequest, PlyRecord, ResultEnvelope } from "./types";

export interface PipelineDeps {
  openEngine: EngineFactory;
  logger?: Logger;
}

/**
 * Decodes the record, replays it move by move with one engine call per ply and returns
 * the envelope. Never throws: every failure ends up in `error`, with the plies analysed
 * so far kept in `per_ply`.
 */
export async function analyzeGame(
  request: AnalyzeRequest,
  { openEngine, logger = rootLogger }: PipelineDeps,
): Promise<ResultEnvelope> {
  const perPly: PlyRecord[] = [];
  const partial = () => ({ per_ply: perPly, key_moments: selectKeyMoments(perPly) });
  let engine: EngineSession | null = null;
  let currentPly: number | undefined;

  try {
    const game = decodeGame(request.record, request.initialPosition);
    logger.info(
      { moves: game.moves.length, startFen: game.startFen, white: game.headers.white, black: game.headers.black },
      "analysis:decoded",
    );

    const replayer = new PositionReplayer(game.startFen);
    engine = await openEngine();

    const limits = {
      depth: request.depth,
      timeMs: Math.round(request.timeBudgetSeconds * 1000),
    };
    // last known evaluation: a ply the engine could not score does not reset it
    let previousEval: number | null = null;

    for (const text of game.moves) {
      currentPly = perPly.length + 1;
      const played = replayer.play(text);
      const record = await analyzePly(engine, replayer.position, played, previousEval, {
        limits,
        lineCount: request.lineCount,
      });
      logger.debug({ ply: record.ply, san: record.played_san, eval: record.eval_cp }, "analysis:ply");
      perPly.push(record);
      if (record.eval_cp !== null) previousEval = record.eval_cp;
    }

    logger.info({ plies: perPly.length }, "analysis:done");
    return ok(partial());
  } catch (err) {
    const envelope = failWith(err, partial(), { ply: currentPly });
    if (envelope.error?.code === "INTERNAL_ERROR") {
      logger.error({ err, ply: currentPly }, "analysis:failed");
    } else {
      logger.info({ code: envelope.error?.code, message: envelope.error?.message }, "analysis:rejected");
    }
    return envelope;
  } finally {
    if (engine) {
      await engine.quit().catch((err: unknown) => logger.warn({ err }, "analysis:engine_quit_failed"));
    }
  }
}
