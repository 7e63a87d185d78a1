import type { Player } from "../types";
import type { Delta } from "./coordinate";

export type PieceKind = "chinchilla" | "wombat" | "emu" | "cuttlefish";

export type Axis = "diagonal" | "orthogonal";

export type MoveMode = "sliding" | "jumping";

export type MoveKind = "primary" | "secondary";

export interface Piece {
  readonly kind: PieceKind;
  readonly owner: Player;
}

export interface MovementProfile {
  readonly primaryAxis: Axis;
  readonly primaryDistance: number;
  readonly primaryMode: MoveMode;
}

const MOVEMENT_PROFILES: Record<PieceKind, MovementProfile> = {
  chinchilla: { primaryAxis: "diagonal", primaryDistance: 1, primaryMode: "sliding" },
  wombat: { primaryAxis: "orthogonal", primaryDistance: 4, primaryMode: "jumping" },
  emu: { primaryAxis: "orthogonal", primaryDistance: 3, primaryMode: "sliding" },
  cuttlefish: { primaryAxis: "diagonal", primaryDistance: 2, primaryMode: "jumping" }
};

export const createPiece = (kind: PieceKind, owner: Player): Piece => Object.freeze({ kind, owner });

export const movementProfile = (kind: PieceKind): MovementProfile => MOVEMENT_PROFILES[kind];

/**
 * Axis a delta lies on and how many squares it covers along it, or null when
 * the delta is neither a straight orthogonal nor a straight diagonal line.
 */
export const lineOf = (delta: Delta): { axis: Axis; magnitude: number } | null => {
  const rows = Math.abs(delta.rowDelta);
  const cols = Math.abs(delta.colDelta);
  if (rows === 0 && cols === 0) return null;
  if (rows === cols) return { axis: "diagonal", magnitude: rows };
  if (rows === 0 || cols === 0) return { axis: "orthogonal", magnitude: rows + cols };
  return null;
};

/**
 * Classifies a delta against a movement profile. Sliding pieces reach any
 * distance up to their primary distance; jumping pieces only the exact one.
 * Blocking is not considered here.
 */
export const canReach = (profile: MovementProfile, delta: Delta): MoveKind | null => {
  const line = lineOf(delta);
  if (!line) return null;

  if (line.axis === profile.primaryAxis) {
    switch (profile.primaryMode) {
      case "sliding":
        return line.magnitude <= profile.primaryDistance ? "primary" : null;
      case "jumping":
        return line.magnitude === profile.primaryDistance ? "primary" : null;
    }
  }

  return line.magnitude === 1 ? "secondary" : null;
};

const SYMBOLS: Record<PieceKind, string> = {
  chinchilla: "C",
  wombat: "W",
  emu: "E",
  cuttlefish: "U"
};

export const pieceSymbol = (piece: Piece): string =>
  piece.owner === "TANGERINE" ? SYMBOLS[piece.kind] : SYMBOLS[piece.kind].toLowerCase();
