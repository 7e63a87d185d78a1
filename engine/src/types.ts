import type { Coord } from "./game/coordinate";
import type { IllegalReason } from "./game/validator";
import type { MoveKind, Piece } from "./game/piece";

export type Player = "TANGERINE" | "AMETHYST";

export type GameState = "UNFINISHED" | "TANGERINE_WON" | "AMETHYST_WON";

export interface ValidationError<E = string> {
  ok: false;
  error: E;
}

export interface ValidationSuccess<T> {
  ok: true;
  value: T;
}

export type ValidationResult<T, E = string> = ValidationError<E> | ValidationSuccess<T>;

export type MoveRejection = "invalid-notation" | "game-over" | IllegalReason;

export interface MoveOutcome {
  player: Player;
  piece: Piece;
  kind: MoveKind;
  from: Coord;
  to: Coord;
  captured?: Piece;
  state: GameState;
}

export type GameLogger = Pick<Console, "debug" | "info">;

export const opponentOf = (player: Player): Player => (player === "TANGERINE" ? "AMETHYST" : "TANGERINE");

export const winStateFor = (player: Player): GameState =>
  player === "TANGERINE" ? "TANGERINE_WON" : "AMETHYST_WON";
