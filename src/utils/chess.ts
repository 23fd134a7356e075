import { type Move, makeUci } from "chessops";
import { type Chess, castlingSide, normalizeMove } from "chessops/chess";
import { INITIAL_FEN } from "chessops/fen";
import { match } from "ts-pattern";

export interface GameHeaders {
  white: string;
  black: string;
  fen: string;
}

// outputs the standard king-to-destination uci for castling moves
export function uciNormalize(chess: Chess, move: Move) {
  const frcMove = normalizeMove(chess, move);
  if (castlingSide(chess, move)) {
    return match(makeUci(frcMove))
      .with("e1h1", () => "e1g1")
      .with("e1a1", () => "e1c1")
      .with("e8h8", () => "e8g8")
      .with("e8a8", () => "e8c8")
      .otherwise((v) => v);
  }
  return makeUci(frcMove);
}

export function getPgnHeaders(headers: Map<string, string>): GameHeaders {
  return {
    white: headers.get("White") ?? "?",
    black: headers.get("Black") ?? "?",
    fen: headers.get("FEN")?.trim() || INITIAL_FEN,
  };
}
