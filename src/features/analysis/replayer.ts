import { makeUci, parseUci } from "chessops";
import { type Chess, normalizeMove } from "chessops/chess";
import { makeFen } from "chessops/fen";
import { makeSan } from "chessops/san";
import { uciNormalize } from "@/utils/chess";
import { parseSanOrUci, positionFromFen } from "@/utils/chessops";
import { IllegalMoveError, InvalidStartPositionError } from "./errors";

export interface ReplayedMove {
  ply: number;
  uci: string;
  san: string;
  fenAfter: string;
}

/**
 * Owns the board for one game. Every move is checked against the current position
 * before it is played; the first illegal one raises {@link IllegalMoveError} and the
 * position stays where it was.
 */
export class PositionReplayer {
  private readonly pos: Chess;
  private ply = 0;

  constructor(startFen: string) {
    const [pos, error] = positionFromFen(startFen);
    if (error) {
      throw new InvalidStartPositionError(`Invalid initial position: ${error.message}`, startFen);
    }
    this.pos = pos;
  }

  get position(): Chess {
    return this.pos;
  }

  get fen(): string {
    return makeFen(this.pos.toSetup());
  }

  play(text: string): ReplayedMove {
    const ply = this.ply + 1;
    const parsed = parseSanOrUci(this.pos, text);
    const move = parsed && normalizeMove(this.pos, parsed);

    if (!move || !this.pos.isLegal(move)) {
      const uci = parseUci(text);
      throw new IllegalMoveError({
        ply,
        uci: uci ? makeUci(uci) : text,
        fenBefore: this.fen,
      });
    }

    // SAN depends on the position before the move
    const san = makeSan(this.pos, move);
    const uci = uciNormalize(this.pos, move);
    this.pos.play(move);
    this.ply = ply;

    return { ply, uci, san, fenAfter: this.fen };
  }
}
