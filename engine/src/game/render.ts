import { BOARD_SIZE, COLUMN_LABELS } from "./constants";
import { pieceSymbol } from "./piece";
import type { ReadonlyBoard } from "./board";

// Rank 7 first, Tangerine in upper case, empty squares as dots.
export const renderBoard = (board: ReadonlyBoard): string => {
  const lines: string[] = [];
  for (let row = BOARD_SIZE - 1; row >= 0; row -= 1) {
    const cells: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col += 1) {
      const piece = board.pieceAt({ row, col });
      cells.push(piece ? pieceSymbol(piece) : ".");
    }
    lines.push(`${row + 1} ${cells.join(" ")}`);
  }
  lines.push(`  ${COLUMN_LABELS.join(" ")}`);
  return lines.join("\n");
};
