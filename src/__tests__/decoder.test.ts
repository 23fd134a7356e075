import { INITIAL_FEN } from "chessops/fen";
import { describe, expect, test } from "vitest";
import { decodeGame } from "@/features/analysis/decoder";
import { InvalidRecordError, InvalidStartPositionError } from "@/features/analysis/errors";

const KINGS_AND_PAWN = "4k3/8/8/8/8/8/4P3/4K3 w - - 0 1";

function recordError(record: string) {
  try {
    decodeGame(record);
  } catch (err) {
    if (err instanceof InvalidRecordError) return err;
    throw err;
  }
  throw new Error("record was accepted");
}

describe("decodeGame", () => {
  test("reads the mainline from the standard start", () => {
    const game = decodeGame('[White "Alice"]\n[Black "Bob"]\n\n1. e4 e5 2. Nf3 *');
    expect(game.startFen).toBe(INITIAL_FEN);
    expect(game.moves).toEqual(["e4", "e5", "Nf3"]);
    expect(game.headers).toMatchObject({ white: "Alice", black: "Bob" });
  });

  test("skips variations, comments and annotations", () => {
    const game = decodeGame("1. e4 (1. d4 d5 (1... Nf6)) 1... e5 {main} 2. Nf3! $14 Nc6 ; line comment\n3. Bb5 1-0");
    expect(game.moves).toEqual(["e4", "e5", "Nf3", "Nc6", "Bb5"]);
  });

  test("reads move numbers glued to moves and skips escape lines", () => {
    expect(decodeGame("% exported by a tool\n1.e4 1...c5 2.Nf3 *").moves).toEqual(["e4", "c5", "Nf3"]);
  });

  test("only decodes the first game", () => {
    const game = decodeGame('[White "A"]\n\n1. e4 *\n\n[White "B"]\n\n1. d4 *');
    expect(game.moves).toEqual(["e4"]);
    expect(game.headers.white).toBe("A");
  });

  test("accepts a game with no moves", () => {
    expect(decodeGame('[Event "Empty"]\n\n*').moves).toEqual([]);
  });

  test("keeps a malformed coordinate move whole for the replayer", () => {
    expect(decodeGame("1. e4 e5 2. g1g9 Nc6 *").moves).toEqual(["e4", "e5", "g1g9", "Nc6"]);
  });

  test("starts from the FEN header", () => {
    const game = decodeGame(`[SetUp "1"]\n[FEN "${KINGS_AND_PAWN}"]\n\n1. e4 *`);
    expect(game.startFen).toBe(KINGS_AND_PAWN);
  });

  test("prefers the initial position override", () => {
    const game = decodeGame('[FEN "8/8/8/8/8/8/8/K6k w - - 0 1"]\n\n1. e4 *', `  ${KINGS_AND_PAWN}  `);
    expect(game.startFen).toBe(KINGS_AND_PAWN);
  });

  test.each(["", "   \n", '[Event "A"]\n[Site "B"]', "{just a comment}"])("rejects %j as a record", (record) => {
    expect(() => decodeGame(record)).toThrow(InvalidRecordError);
  });

  test.each([
    ["1. e4 toString e5 *", 'Unexpected token "toString" at offset 6.', 6],
    ["1. e4 constructor *", 'Unexpected token "constructor" at offset 6.', 6],
    ["1. e4 <> e5", 'Unexpected token "<>" at offset 6.', 6],
    ['[Event "open\n1. e4 *', 'Unexpected token "[Event" at offset 0.', 0],
    ["1. e4 (1. g1g9) e5 *", 'Unexpected token "g1g9" at offset 10.', 10],
    ["1. e4 {unterminated", "Unterminated comment at offset 6.", 6],
    ["1. e4 e5)", 'Unbalanced ")" at offset 8.', 8],
    ["1. e4 (1. d4", "Unterminated variation.", 12],
  ])("rejects text the parser would skip in %j", (record, message, offset) => {
    const err = recordError(record);
    expect(err.message).toBe(message);
    expect(err.offset).toBe(offset);
  });

  test("rejects an unusable override", () => {
    expect(() => decodeGame("1. e4 *", "not a fen")).toThrow(InvalidStartPositionError);
    expect(() => decodeGame("1. e4 *", "8/8/8/8/8/8/8/8 w - - 0 1")).toThrow(InvalidStartPositionError);
  });

  test("rejects an unusable FEN header", () => {
    let caught: unknown;
    try {
      decodeGame('[FEN "rnbqkbnr/pppppppp w"]\n\n1. e4 *');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidStartPositionError);
    expect(caught).toMatchObject({ fen: "rnbqkbnr/pppppppp w" });
  });
});
