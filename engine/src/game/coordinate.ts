import { z } from "zod";
import { BOARD_SIZE, COLUMN_LABELS } from "./constants";
import type { ValidationResult } from "../types";

export interface Coord {
  readonly row: number;
  readonly col: number;
}

export interface Delta {
  rowDelta: number;
  colDelta: number;
}

export type CoordKey = `${number},${number}`;

export const notationSchema = z.string().regex(/^[a-g][1-7]$/, "Expected a file a-g followed by a rank 1-7");

export class InvalidNotationError extends Error {
  constructor(readonly notation: string) {
    super(`Invalid square notation: "${notation}"`);
    this.name = "InvalidNotationError";
  }
}

export const coordKey = (coord: Coord): CoordKey => `${coord.row},${coord.col}`;

export const isInsideBoard = (coord: Coord): boolean =>
  Number.isInteger(coord.row) &&
  Number.isInteger(coord.col) &&
  coord.row >= 0 &&
  coord.row < BOARD_SIZE &&
  coord.col >= 0 &&
  coord.col < BOARD_SIZE;

export const equalCoord = (a: Coord, b: Coord): boolean => a.row === b.row && a.col === b.col;

export const parseNotation = (text: string): ValidationResult<Coord> => {
  const parsed = notationSchema.safeParse(text);
  if (!parsed.success) {
    return { ok: false, error: `Invalid square notation: "${text}"` };
  }
  // Rank 1 is row 0, Tangerine's home side.
  const col = COLUMN_LABELS.findIndex((label) => label === parsed.data[0]);
  const row = Number(parsed.data[1]) - 1;
  return { ok: true, value: { row, col } };
};

export const fromNotation = (text: string): Coord => {
  const result = parseNotation(text);
  if (!result.ok) {
    throw new InvalidNotationError(text);
  }
  return result.value;
};

export const toNotation = (coord: Coord): string => {
  if (!isInsideBoard(coord)) {
    throw new RangeError(`Square (${coord.row}, ${coord.col}) is off the board`);
  }
  return `${COLUMN_LABELS[coord.col]}${coord.row + 1}`;
};

export const deltaTo = (from: Coord, to: Coord): Delta => ({
  rowDelta: to.row - from.row,
  colDelta: to.col - from.col
});

export const allCoords = (): Coord[] => {
  const result: Coord[] = [];
  for (let row = 0; row < BOARD_SIZE; row += 1) {
    for (let col = 0; col < BOARD_SIZE; col += 1) {
      result.push({ row, col });
    }
  }
  return result;
};
