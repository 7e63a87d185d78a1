import { describe, expect, it } from "vitest";
import {
  InvalidNotationError,
  allCoords,
  deltaTo,
  fromNotation,
  isInsideBoard,
  parseNotation,
  toNotation
} from "@animal-game/engine";

describe("algebraic notation", () => {
  it("maps files to columns and ranks to rows from the bottom", () => {
    expect(fromNotation("a1")).toStrictEqual({ row: 0, col: 0 });
    expect(fromNotation("g7")).toStrictEqual({ row: 6, col: 6 });
    expect(fromNotation("c5")).toStrictEqual({ row: 4, col: 2 });
  });

  it("round-trips every square on the board", () => {
    const squares = allCoords();
    expect(squares).toHaveLength(49);
    for (const coord of squares) {
      expect(fromNotation(toNotation(coord))).toStrictEqual(coord);
    }
  });

  it.each(["", "a", "a0", "a8", "h1", "A1", "a1 ", "a10", "11", "aa"])("rejects %j", (text) => {
    expect(() => fromNotation(text)).toThrow(InvalidNotationError);
    const result = parseNotation(text);
    expect(result.ok).toBe(false);
  });

  it("keeps the offending text on the error", () => {
    try {
      fromNotation("z9");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidNotationError);
      if (error instanceof InvalidNotationError) {
        expect(error.notation).toBe("z9");
        expect(error.message).toBe('Invalid square notation: "z9"');
      }
    }
  });

  it("refuses to print squares off the board", () => {
    expect(isInsideBoard({ row: 7, col: 0 })).toBe(false);
    expect(() => toNotation({ row: 7, col: 0 })).toThrow(RangeError);
  });
});

describe("deltaTo", () => {
  it("returns signed row and column offsets", () => {
    expect(deltaTo(fromNotation("c1"), fromNotation("c5"))).toStrictEqual({ rowDelta: 4, colDelta: 0 });
    expect(deltaTo(fromNotation("d4"), fromNotation("b2"))).toStrictEqual({ rowDelta: -2, colDelta: -2 });
  });
});
