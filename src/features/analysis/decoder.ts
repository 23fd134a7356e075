import { parsePgn } from "chessops/pgn";
import { type GameHeaders, getPgnHeaders } from "@/utils/chess";
import { positionFromFen } from "@/utils/chessops";
import { InvalidRecordError, InvalidStartPositionError } from "./errors";

export interface DecodedGame {
  headers: GameHeaders;
  startFen: string;
  /** Mainline move text in record order, not yet checked against any position. */
  moves: string[];
}

// Same header and movetext token shapes as the chessops PGN parser.
const HEADER_RE = /^\s*\[([A-Za-z0-9][A-Za-z0-9_+#=:-]*)\s+"((?:[^"\\]|\\"|\\\\)*)"\]/;
const TOKEN_RE =
  /(?:[NBKRQ]?[a-h]?[1-8]?[-x]?[a-h][1-8](?:=?[nbrqkNBRQK])?|[pnbrqkPNBRQK]?@[a-h][1-8]|O-O-O|0-0-0|O-O|0-0)[+#]?|--|Z0|0000|@@@@|\$\d{1,4}|[?!]{1,2}|\*|1-0|0-1|1\/2-1\/2/g;
const NOT_A_MOVE_RE = /^(?:\$\d+|[?!]{1,2}|\*|1-0|0-1|1\/2-1\/2)$/;
const MOVE_NUMBER_RE = /^\d+\.+/;
const WORD_END_RE = /[\s{}();]/;

/** A move word the parser only partly understood, e.g. `g1g9`. */
interface MalformedMove {
  index: number;
  text: string;
  /** Mainline nodes the parser made out of it. */
  nodes: number;
}

interface MovetextScan {
  hasMovetext: boolean;
  malformed: MalformedMove[];
}

/**
 * Walks the first game the way `parsePgn` splits it (headers, then movetext up to the first
 * blank line) and rejects text the parser would skip over silently.
 */
function scanFirstGame(record: string): MovetextScan {
  let state: "headers" | "moves" | "comment" = "headers";
  let commentStart = 0;
  let depth = 0;
  let mainlineIndex = 0;
  let hasMovetext = false;
  const malformed: MalformedMove[] = [];

  const checkWord = (word: string, offset: number) => {
    if (/^\d+\.*$/.test(word) || /^\.+$/.test(word)) return;
    const text = word.replace(MOVE_NUMBER_RE, "");

    let covered = 0;
    let gap = false;
    let nodes = 0;
    let leadingMove = false;
    for (const m of text.matchAll(TOKEN_RE)) {
      const at = m.index ?? 0;
      if (at !== covered) gap = true;
      if (!NOT_A_MOVE_RE.test(m[0])) {
        if (at === 0) leadingMove = true;
        nodes++;
      }
      covered = at + m[0].length;
      hasMovetext = true;
    }

    if (gap || covered !== text.length) {
      if (!leadingMove || depth > 0) {
        throw new InvalidRecordError(`Unexpected token "${word}" at offset ${offset}.`, offset);
      }
      malformed.push({ index: mainlineIndex, text, nodes });
    }
    if (depth === 0) mainlineIndex += nodes;
  };

  let offset = 0;
  for (const line of record.split("\n")) {
    const lineStart = offset;
    offset += line.length + 1;
    let pos = 0;

    if (state === "headers") {
      if (line.startsWith("%") || line.trim() === "") continue;
      for (let m = HEADER_RE.exec(line); m; m = HEADER_RE.exec(line.slice(pos))) {
        pos += m[0].length;
      }
      if (line.slice(pos).trim() === "") continue;
      state = "moves";
    } else if (state === "moves") {
      if (line.startsWith("%")) continue;
      // a blank line ends the game
      if (line.trim() === "") break;
    }

    while (pos < line.length) {
      if (state === "comment") {
        const end = line.indexOf("}", pos);
        if (end === -1) break;
        state = "moves";
        pos = end + 1;
        continue;
      }

      const ch = line[pos];
      if (/\s/.test(ch)) {
        pos++;
      } else if (ch === "{") {
        state = "comment";
        commentStart = lineStart + pos;
        pos++;
      } else if (ch === ";") {
        break;
      } else if (ch === "(") {
        depth++;
        pos++;
      } else if (ch === ")") {
        if (depth === 0) {
          throw new InvalidRecordError(`Unbalanced ")" at offset ${lineStart + pos}.`, lineStart + pos);
        }
        depth--;
        pos++;
      } else {
        const rest = line.slice(pos + 1).search(WORD_END_RE);
        const end = rest === -1 ? line.length : pos + 1 + rest;
        checkWord(line.slice(pos, end), lineStart + pos);
        pos = end;
      }
    }
  }

  if (state === "comment") {
    throw new InvalidRecordError(`Unterminated comment at offset ${commentStart}.`, commentStart);
  }
  if (depth > 0) {
    throw new InvalidRecordError("Unterminated variation.", record.length);
  }
  return { hasMovetext, malformed };
}

export function decodeGame(record: string, initialFen?: string): DecodedGame {
  if (record.trim() === "") {
    throw new InvalidRecordError("Could not parse PGN: record is empty.");
  }

  const { hasMovetext, malformed } = scanFirstGame(record);
  const [game] = parsePgn(record);
  if (!game || !hasMovetext) {
    throw new InvalidRecordError("Could not parse PGN: no movetext found.");
  }

  const moves = [...game.moves.mainline()].map((node) => node.san);
  // hand the whole word to the replayer so it is reported as written
  for (const { index, text, nodes } of malformed.reverse()) {
    moves.splice(index, nodes, text);
  }

  const headers = getPgnHeaders(game.headers);
  const override = initialFen?.trim();
  const startFen = override || headers.fen;

  const [, error] = positionFromFen(startFen);
  if (error) {
    const source = override ? "initial position" : "FEN header";
    throw new InvalidStartPositionError(`Invalid ${source}: ${error.message}`, startFen);
  }

  return { headers, startFen, moves };
}
