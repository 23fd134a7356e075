import { type Move, parseUci } from "chessops";
import { Chess, type PositionError } from "chessops/chess";
import { type FenError, parseFen } from "chessops/fen";
import { parseSan } from "chessops/san";

export function positionFromFen(fen: string): [Chess, null] | [null, FenError | PositionError] {
  const setup = parseFen(fen);
  if (setup.isErr) {
    return [null, setup.error];
  }
  const pos = Chess.fromSetup(setup.value);
  if (pos.isErr) {
    return [null, pos.error];
  }
  return [pos.value, null];
}

// SAN first, UCI as a fallback for records written in machine notation
export function parseSanOrUci(pos: Chess, text: string): Move | undefined {
  const san = parseSan(pos, text);
  if (san) {
    return san;
  }
  return parseUci(text);
}
