import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Color } from "chessops";
import type { Chess } from "chessops/chess";
import { makeFen } from "chessops/fen";
import { ANALYSIS_DEFAULTS, ENGINE_CONFIG, type EngineConfig } from "@/config";
import type { EngineLine, EngineSession, SearchLimits } from "@/features/analysis/engine";
import { EngineError } from "@/features/analysis/errors";
import { devLog, devWarn } from "@/utils/devLog";
import { info, error as logError } from "@/utils/log";
import { normalizeScore, type ScoreValue } from "@/utils/score";

/** Line-oriented pipe to a UCI engine. */
export interface UciTransport {
  write(command: string): void;
  onLine(listener: (line: string) => void): void;
  /** Called once, when the engine goes away. `error` is set when it never ran or broke. */
  onExit(listener: (error?: Error) => void): void;
  kill(): void;
}

interface UciOption {
  type: string;
  min?: number;
  max?: number;
}

const OPTION_RE = /^option name (.+?) type (\S+)(?: default (?:\S*))?(?: min (-?\d+))?(?: max (-?\d+))?/;

export function parseOption(line: string): [string, UciOption] | null {
  const m = OPTION_RE.exec(line);
  if (!m) return null;
  return [
    m[1],
    {
      type: m[2],
      min: m[3] === undefined ? undefined : Number(m[3]),
      max: m[4] === undefined ? undefined : Number(m[4]),
    },
  ];
}

/** Parses an `info` line into a line in white's perspective, or null when it carries no score. */
export function parseInfo(line: string, turn: Color): EngineLine | null {
  const parts = line.trim().split(/\s+/);
  if (parts[0] !== "info") return null;

  let multipv = 1;
  let depth = 0;
  let score: ScoreValue | null = null;
  let uciMoves: string[] = [];

  for (let i = 1; i < parts.length; i++) {
    const key = parts[i];
    if (key === "depth") {
      depth = Number(parts[++i]);
    } else if (key === "multipv") {
      multipv = Number(parts[++i]);
    } else if (key === "score") {
      const type = parts[++i];
      const value = Number(parts[++i]);
      if ((type === "cp" || type === "mate") && Number.isFinite(value)) {
        score = { type, value };
      }
    } else if (key === "pv") {
      uciMoves = parts.slice(i + 1);
      break;
    } else if (key === "string") {
      return null;
    }
  }

  if (!score || !Number.isInteger(multipv) || multipv < 1) return null;
  return { multipv, depth, score: normalizeScore(score, turn), uciMoves };
}

function goCommand({ depth, timeMs }: SearchLimits): string {
  const args: string[] = [];
  if (depth !== undefined && depth > 0) args.push(`depth ${depth}`);
  if (timeMs !== undefined && timeMs > 0) args.push(`movetime ${timeMs}`);
  // a bare "go" searches forever
  if (args.length === 0) args.push(`depth ${ANALYSIS_DEFAULTS.depth}`);
  return `go ${args.join(" ")}`;
}

/**
 * Drives one UCI engine process. Calls are serialized by the caller: one command/response
 * exchange is in flight at a time.
 */
export class UciEngine implements EngineSession {
  private readonly options = new Map<string, UciOption>();
  private readonly exited: Promise<void>;
  private listener: ((line: string) => void) | null = null;
  private abort: ((err: Error) => void) | null = null;
  private failure: Error | null = null;
  private multiPv = 1;
  private quitting = false;

  constructor(
    private readonly transport: UciTransport,
    private readonly config: EngineConfig = ENGINE_CONFIG,
  ) {
    transport.onLine((line) => {
      devLog(`[uci] < ${line}`);
      this.listener?.(line);
    });
    this.exited = new Promise((resolve) => {
      transport.onExit((err) => {
        const failure = err ?? new EngineError("Engine process exited.");
        this.failure = failure;
        this.abort?.(failure);
        resolve();
      });
    });
  }

  private send(command: string) {
    if (this.failure) return;
    devLog(`[uci] > ${command}`);
    this.transport.write(command);
  }

  private waitFor(predicate: (line: string) => boolean, timeoutMs?: number): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      let timer: NodeJS.Timeout | undefined;
      const settle = (err?: Error) => {
        clearTimeout(timer);
        this.listener = null;
        this.abort = null;
        if (err) reject(err);
        else resolve();
      };
      this.listener = (line) => {
        if (predicate(line)) settle();
      };
      this.abort = settle;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => settle(new EngineError(`Engine did not answer within ${timeoutMs}ms.`)), timeoutMs);
      }
    });
  }

  private async isReady(timeoutMs?: number) {
    const ready = this.waitFor((line) => line === "readyok", timeoutMs);
    this.send("isready");
    await ready;
  }

  async init(): Promise<void> {
    const uciok = this.waitFor((line) => {
      const option = parseOption(line);
      if (option) this.options.set(option[0].toLowerCase(), option[1]);
      return line === "uciok";
    }, this.config.initTimeoutMs);
    this.send("uci");
    await uciok;

    this.send("ucinewgame");
    await this.isReady(this.config.initTimeoutMs);
  }

  /** Highest line count the engine advertised; 1 when it has no MultiPV option. */
  get maxLineCount(): number {
    const option = this.options.get("multipv");
    if (!option || option.type !== "spin") return 1;
    return Math.max(1, option.max ?? 1);
  }

  async analyze(position: Chess, limits: SearchLimits, lineCount: number): Promise<EngineLine[]> {
    const lines = Math.max(1, Math.min(lineCount, this.maxLineCount));
    if (lines !== this.multiPv) {
      this.send(`setoption name MultiPV value ${lines}`);
      this.multiPv = lines;
    }
    await this.isReady();

    const turn = position.turn;
    const byRank = new Map<number, EngineLine>();
    const bestmove = this.waitFor((line) => {
      if (line.startsWith("bestmove")) return true;
      const parsed = parseInfo(line, turn);
      if (parsed && parsed.multipv <= lines) byRank.set(parsed.multipv, parsed);
      else if (line.startsWith("info") && line.includes(" score ") && !parsed) devWarn(`[uci] unparsed: ${line}`);
      return false;
    });
    this.send(`position fen ${makeFen(position.toSetup())}`);
    this.send(goCommand(limits));
    await bestmove;

    return [...byRank.values()].sort((a, b) => a.multipv - b.multipv);
  }

  async quit(): Promise<void> {
    if (!this.quitting) {
      this.quitting = true;
      this.send("quit");
    }
    let timer: NodeJS.Timeout | undefined;
    const killed = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.transport.kill();
        resolve();
      }, this.config.quitTimeoutMs);
    });
    await Promise.race([this.exited, killed]);
    clearTimeout(timer);
  }
}

export function processTransport(path: string): UciTransport {
  const child = spawn(path, [], { stdio: ["pipe", "pipe", "ignore"] });
  const lines = createInterface({ input: child.stdout });
  const exitListeners: ((error?: Error) => void)[] = [];
  let exited = false;
  let exitError: Error | undefined;

  const exit = (error?: Error) => {
    if (exited) return;
    exited = true;
    exitError = error;
    lines.close();
    for (const listener of exitListeners) listener(error);
  };

  child.once("error", (err) => exit(new EngineError(`Failed to run engine at ${path}: ${err.message}`, { cause: err })));
  child.once("exit", (code, signal) => {
    if (code !== 0 && code !== null) exit(new EngineError(`Engine exited with code ${code}.`));
    else exit(signal && signal !== "SIGTERM" ? new EngineError(`Engine killed by ${signal}.`) : undefined);
  });
  child.stdin.on("error", (err) => exit(new EngineError(`Engine input closed: ${err.message}`, { cause: err })));

  return {
    write: (command) => {
      if (!exited) child.stdin.write(`${command}\n`);
    },
    onLine: (listener) => {
      lines.on("line", listener);
    },
    onExit: (listener) => {
      if (exited) listener(exitError);
      else exitListeners.push(listener);
    },
    kill: () => {
      child.kill();
    },
  };
}

/** Starts an engine session; the caller owns it and must `quit` it. */
export async function spawnUciEngine(config: EngineConfig = ENGINE_CONFIG): Promise<UciEngine> {
  info(`[uci-engine] Starting engine: ${config.path}`);
  const engine = new UciEngine(processTransport(config.path), config);
  try {
    await engine.init();
  } catch (err) {
    logError(`[uci-engine] Engine failed to start: ${err instanceof Error ? err.message : String(err)}`);
    await engine.quit();
    throw err;
  }
  return engine;
}
