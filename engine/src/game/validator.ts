import { allCoords, deltaTo, equalCoord, isInsideBoard } from "./coordinate";
import { canReach, lineOf, movementProfile } from "./piece";
import type { ReadonlyBoard } from "./board";
import type { Coord } from "./coordinate";
import type { MoveKind } from "./piece";
import type { Player, ValidationResult } from "../types";

export type IllegalReason =
  | "same-or-out-of-bounds"
  | "no-owned-piece"
  | "bad-geometry"
  | "blocked"
  | "friendly-occupied";

export interface LegalMove {
  kind: MoveKind;
  capture: boolean;
}

/** Squares strictly between two points on a straight line, walked from `from`. */
export const squaresBetween = (from: Coord, to: Coord): Coord[] => {
  const delta = deltaTo(from, to);
  const line = lineOf(delta);
  if (!line) return [];
  const stepRow = Math.sign(delta.rowDelta);
  const stepCol = Math.sign(delta.colDelta);
  const result: Coord[] = [];
  for (let step = 1; step < line.magnitude; step += 1) {
    result.push({ row: from.row + stepRow * step, col: from.col + stepCol * step });
  }
  return result;
};

export const isLegal = (
  board: ReadonlyBoard,
  mover: Player,
  from: Coord,
  to: Coord
): ValidationResult<LegalMove, IllegalReason> => {
  if (!isInsideBoard(from) || !isInsideBoard(to) || equalCoord(from, to)) {
    return { ok: false, error: "same-or-out-of-bounds" };
  }

  const piece = board.pieceAt(from);
  if (!piece || piece.owner !== mover) {
    return { ok: false, error: "no-owned-piece" };
  }

  const profile = movementProfile(piece.kind);
  const kind = canReach(profile, deltaTo(from, to));
  if (!kind) {
    return { ok: false, error: "bad-geometry" };
  }

  // Secondary steps are one square long, so only sliding primaries have a path.
  if (kind === "primary" && profile.primaryMode === "sliding") {
    const blocked = squaresBetween(from, to).some((square) => board.pieceAt(square) !== undefined);
    if (blocked) {
      return { ok: false, error: "blocked" };
    }
  }

  if (board.isOccupiedBy(to, mover)) {
    return { ok: false, error: "friendly-occupied" };
  }

  return { ok: true, value: { kind, capture: board.pieceAt(to) !== undefined } };
};

export const legalMovesFrom = (board: ReadonlyBoard, mover: Player, from: Coord): Coord[] =>
  allCoords().filter((to) => isLegal(board, mover, from, to).ok);
