export class AnalysisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The record could not be parsed into a game. */
export class InvalidRecordError extends AnalysisError {
  constructor(
    message: string,
    readonly offset?: number,
  ) {
    super(message);
  }
}

/** A starting position (override or FEN header) is not a usable FEN. */
export class InvalidStartPositionError extends AnalysisError {
  constructor(
    message: string,
    readonly fen: string,
  ) {
    super(message);
  }
}

export interface IllegalMoveInfo {
  ply: number;
  uci: string;
  fenBefore: string;
}

/** Replay reached a move that is not legal in the reconstructed position. */
export class IllegalMoveError extends AnalysisError {
  constructor(readonly move: IllegalMoveInfo) {
    super("Move is not legal from reconstructed position.");
  }
}

/** The engine failed, exited or produced output that does not fit the position. */
export class EngineError extends AnalysisError {}
