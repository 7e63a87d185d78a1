export const BOARD_SIZE = 7;

export const COLUMN_LABELS = ["a", "b", "c", "d", "e", "f", "g"] as const;

export type ColumnLabel = (typeof COLUMN_LABELS)[number];
