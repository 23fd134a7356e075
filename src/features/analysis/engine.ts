import type { Chess } from "chessops/chess";

export interface SearchLimits {
  depth?: number;
  timeMs?: number;
}

export interface EngineLine {
  /** 1 for the principal variation. */
  multipv: number;
  depth: number;
  /** Centipawns from white's side; forced mate is ±100000. */
  score: number;
  uciMoves: string[];
}

/**
 * Analysis capability used by the ply analyzer. Implementations return up to `lineCount`
 * lines for `position` (fewer when the engine cannot deliver more) and at least one when
 * a legal move exists.
 */
export interface EngineAdapter {
  analyze(position: Chess, limits: SearchLimits, lineCount: number): Promise<EngineLine[]>;
}

/** An adapter bound to a running engine. `quit` is safe to call more than once. */
export interface EngineSession extends EngineAdapter {
  quit(): Promise<void>;
}

export type EngineFactory = () => Promise<EngineSession>;
