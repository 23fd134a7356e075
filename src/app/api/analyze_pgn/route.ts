import { createAnalyzeHandler } from "@/server/analyzeHandler";
import { spawnUciEngine } from "@/services/uci-engine";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = createAnalyzeHandler(() => spawnUciEngine());
