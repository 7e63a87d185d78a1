import { describe, expect, it } from "vitest";
import { canReach, createPiece, movementProfile, pieceSymbol } from "@animal-game/engine";
import type { PieceKind } from "@animal-game/engine";

const reach = (kind: PieceKind, rowDelta: number, colDelta: number) =>
  canReach(movementProfile(kind), { rowDelta, colDelta });

describe("movement profiles", () => {
  it("derives the primary move from the kind", () => {
    expect(movementProfile("chinchilla")).toStrictEqual({
      primaryAxis: "diagonal",
      primaryDistance: 1,
      primaryMode: "sliding"
    });
    expect(movementProfile("wombat")).toStrictEqual({
      primaryAxis: "orthogonal",
      primaryDistance: 4,
      primaryMode: "jumping"
    });
    expect(movementProfile("emu")).toStrictEqual({
      primaryAxis: "orthogonal",
      primaryDistance: 3,
      primaryMode: "sliding"
    });
    expect(movementProfile("cuttlefish")).toStrictEqual({
      primaryAxis: "diagonal",
      primaryDistance: 2,
      primaryMode: "jumping"
    });
  });

  it("creates frozen pieces", () => {
    expect(Object.isFrozen(createPiece("emu", "AMETHYST"))).toBe(true);
  });
});

describe("canReach", () => {
  it("lets sliding pieces stop anywhere up to their distance", () => {
    expect(reach("emu", 1, 0)).toBe("primary");
    expect(reach("emu", 0, -2)).toBe("primary");
    expect(reach("emu", -3, 0)).toBe("primary");
    expect(reach("emu", 4, 0)).toBeNull();
  });

  it("only lets jumping pieces land at their exact distance", () => {
    expect(reach("wombat", 4, 0)).toBe("primary");
    expect(reach("wombat", 0, -4)).toBe("primary");
    expect(reach("wombat", 2, 0)).toBeNull();
    expect(reach("cuttlefish", 2, -2)).toBe("primary");
    expect(reach("cuttlefish", 1, 1)).toBeNull();
  });

  it("allows a single perpendicular step as the secondary move", () => {
    expect(reach("chinchilla", 0, 1)).toBe("secondary");
    expect(reach("chinchilla", 1, 1)).toBe("primary");
    expect(reach("wombat", -1, 1)).toBe("secondary");
    expect(reach("emu", 1, -1)).toBe("secondary");
    expect(reach("cuttlefish", -1, 0)).toBe("secondary");
    expect(reach("cuttlefish", 0, 2)).toBeNull();
    expect(reach("wombat", 2, 2)).toBeNull();
  });

  it("rejects bent lines and standing still", () => {
    expect(reach("emu", 1, 2)).toBeNull();
    expect(reach("chinchilla", 0, 0)).toBeNull();
  });
});

describe("pieceSymbol", () => {
  it("uses upper case for Tangerine and lower case for Amethyst", () => {
    expect(pieceSymbol(createPiece("cuttlefish", "TANGERINE"))).toBe("U");
    expect(pieceSymbol(createPiece("wombat", "AMETHYST"))).toBe("w");
  });
});
