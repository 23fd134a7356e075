import { describe, expect, test, vi } from "vitest";
import { FakeEngine, scriptedEvals } from "@/__tests__/fakeEngine";
import { createAnalyzeHandler } from "@/server/analyzeHandler";

function post(body: string) {
  return new Request("http://localhost/api/analyze_pgn", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("POST /api/analyze_pgn", () => {
  test("applies defaults and returns the envelope", async () => {
    const engine = new FakeEngine(scriptedEvals([30]));
    const POST = createAnalyzeHandler(async () => engine);

    const res = await POST(post(JSON.stringify({ record: "1. e4 *" })));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.legal).toBe(true);
    expect(body.per_ply).toHaveLength(1);
    expect(body.per_ply[0].eval_cp).toBe(30);
    expect(engine.calls[0].limits).toEqual({ depth: 12, timeMs: 50 });
    expect(engine.calls[0].lineCount).toBe(2);
  });

  test("passes the request options through", async () => {
    const engine = new FakeEngine(scriptedEvals([0, 0]));
    const POST = createAnalyzeHandler(async () => engine);

    await POST(
      post(
        JSON.stringify({
          record: "1. Kd1 Kd8 *",
          initial_position: "4k3/8/8/8/8/8/4P3/4K3 w - - 0 1",
          depth: 6,
          line_count: 3,
          time_budget_seconds: 0.2,
        }),
      ),
    );

    expect(engine.calls).toHaveLength(2);
    expect(engine.calls[0]).toMatchObject({ limits: { depth: 6, timeMs: 200 }, lineCount: 3 });
  });

  test("answers analysis failures with a 200 error envelope", async () => {
    const POST = createAnalyzeHandler(async () => new FakeEngine());
    const res = await POST(post(JSON.stringify({ record: "1. e4 {oops" })));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe("error");
    expect(body.legal).toBe(false);
    expect(body.error.code).toBe("INVALID_PGN");
  });

  test.each([
    ["a missing record", JSON.stringify({ depth: 4 })],
    ["a non-integer depth", JSON.stringify({ record: "1. e4 *", depth: 2.5 })],
    ["a negative time budget", JSON.stringify({ record: "1. e4 *", time_budget_seconds: -1 })],
    ["a body that is not JSON", "record=1.e4"],
  ])("refuses %s with 422", async (_, body) => {
    const openEngine = vi.fn(async () => new FakeEngine());
    const POST = createAnalyzeHandler(openEngine);

    const res = await POST(post(body));
    const json = await res.json();

    expect(res.status).toBe(422);
    expect(json.error).toBe("Invalid request");
    expect(json.issues.length).toBeGreaterThan(0);
    expect(openEngine).not.toHaveBeenCalled();
  });
});
