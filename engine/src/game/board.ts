import { coordKey, fromNotation } from "./coordinate";
import { createPiece } from "./piece";
import type { Coord, CoordKey } from "./coordinate";
import type { Piece, PieceKind } from "./piece";
import type { Player } from "../types";

export interface BoardEntry {
  coord: Coord;
  piece: Piece;
}

export type ReadonlyBoard = Pick<Board, "pieceAt" | "isOccupiedBy" | "entries" | "countPieces">;

/**
 * Home squares on rank 1 for Tangerine. Amethyst mirrors them on rank 7, so
 * each file holds the same kind for both players.
 */
export const HOME_SQUARES: ReadonlyArray<{ file: string; kind: PieceKind }> = [
  { file: "b", kind: "chinchilla" },
  { file: "c", kind: "wombat" },
  { file: "d", kind: "cuttlefish" },
  { file: "e", kind: "emu" }
];

export class Board {
  private cells: Map<CoordKey, { coord: Coord; piece: Piece }> = new Map();

  pieceAt(coord: Coord): Piece | undefined {
    return this.cells.get(coordKey(coord))?.piece;
  }

  isOccupiedBy(coord: Coord, player: Player): boolean {
    return this.pieceAt(coord)?.owner === player;
  }

  /** Puts a piece on a square, returning whatever it replaced. */
  place(coord: Coord, piece: Piece): Piece | undefined {
    const replaced = this.pieceAt(coord);
    this.cells.set(coordKey(coord), { coord: { row: coord.row, col: coord.col }, piece });
    return replaced;
  }

  remove(coord: Coord): Piece | undefined {
    const removed = this.pieceAt(coord);
    this.cells.delete(coordKey(coord));
    return removed;
  }

  /** Moves the occupant of `from` onto `to`; the returned piece is the one captured there. */
  move(from: Coord, to: Coord): Piece | undefined {
    const piece = this.remove(from);
    if (!piece) return undefined;
    return this.place(to, piece);
  }

  entries(): BoardEntry[] {
    return [...this.cells.values()].map(({ coord, piece }) => ({ coord: { ...coord }, piece }));
  }

  countPieces(player: Player): number {
    return this.entries().filter((entry) => entry.piece.owner === player).length;
  }

  clone(): Board {
    const copy = new Board();
    for (const { coord, piece } of this.cells.values()) {
      copy.place(coord, piece);
    }
    return copy;
  }
}

export const createStartingBoard = (): Board => {
  const board = new Board();
  for (const { file, kind } of HOME_SQUARES) {
    board.place(fromNotation(`${file}1`), createPiece(kind, "TANGERINE"));
    board.place(fromNotation(`${file}7`), createPiece(kind, "AMETHYST"));
  }
  return board;
};
