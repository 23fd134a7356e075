import { readFileSync } from "node:fs";
import { analyzeGame } from "@/features/analysis/pipeline";
import { analyzeRequestSchema, toAnalyzeRequest } from "@/server/schema";
import { spawnUciEngine } from "@/services/uci-engine";
import { formatCentipawns } from "@/utils/score";

function flag(name: string): string | undefined {
  return process.argv.find((arg) => arg.startsWith(`--${name}=`))?.slice(name.length + 3);
}

function numberFlag(name: string): number | undefined {
  const value = flag(name);
  return value === undefined ? undefined : Number(value);
}

/**
 * Usage: tsx scripts/analyze-pgn.ts game.pgn [--fen=FEN] [--depth=12] [--lines=2] [--time=0.05]
 */
async function main() {
  const file = process.argv.slice(2).find((arg) => !arg.startsWith("--"));
  if (!file) {
    console.error("Usage: analyze-pgn <file.pgn> [--fen=FEN] [--depth=N] [--lines=N] [--time=SECONDS]");
    process.exit(2);
  }

  const parsed = analyzeRequestSchema.safeParse({
    record: readFileSync(file, "utf-8"),
    initial_position: flag("fen"),
    depth: numberFlag("depth"),
    line_count: numberFlag("lines"),
    time_budget_seconds: numberFlag("time"),
  });
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n"));
    process.exit(2);
  }

  const envelope = await analyzeGame(toAnalyzeRequest(parsed.data), { openEngine: () => spawnUciEngine() });
  console.log(JSON.stringify(envelope, null, 2));

  for (const moment of envelope.key_moments) {
    console.error(
      `ply ${moment.ply} ${moment.played_san}: ${formatCentipawns(moment.eval_cp)} (swing ${formatCentipawns(moment.swing)})`,
    );
  }
  if (envelope.error) {
    console.error(`${envelope.error.code}: ${envelope.error.message}`);
  }
  process.exit(envelope.status === "ok" ? 0 : 1);
}

main().catch((error) => {
  console.error("Error analyzing game:", error);
  process.exit(1);
});
