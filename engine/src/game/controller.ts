import { createStartingBoard } from "./board";
import { parseNotation, toNotation } from "./coordinate";
import { renderBoard } from "./render";
import { isLegal, legalMovesFrom } from "./validator";
import { opponentOf, winStateFor } from "../types";
import type { Board, ReadonlyBoard } from "./board";
import type { Coord } from "./coordinate";
import type { Piece } from "./piece";
import type { GameLogger, GameState, MoveOutcome, MoveRejection, Player, ValidationResult } from "../types";

export interface GameOptions {
  board?: Board;
  turn?: Player;
  logger?: GameLogger;
}

const silentLogger: GameLogger = {
  debug: () => undefined,
  info: () => undefined
};

export class GameController {
  private readonly board: Board;
  private currentPlayer: Player;
  private state: GameState = "UNFINISHED";
  private readonly logger: GameLogger;

  constructor(options: GameOptions = {}) {
    this.board = options.board?.clone() ?? createStartingBoard();
    this.currentPlayer = options.turn ?? "TANGERINE";
    this.logger = options.logger ?? silentLogger;
  }

  getGameState(): GameState {
    return this.state;
  }

  getCurrentPlayer(): Player {
    return this.currentPlayer;
  }

  /** Read-only view of the live board; callers never get the `Board` itself. */
  getBoard(): ReadonlyBoard {
    const board = this.board;
    return {
      pieceAt: (coord) => board.pieceAt(coord),
      isOccupiedBy: (coord, player) => board.isOccupiedBy(coord, player),
      entries: () => board.entries(),
      countPieces: (player) => board.countPieces(player)
    };
  }

  pieceAt(square: string): Piece | undefined {
    const coord = parseNotation(square);
    return coord.ok ? this.board.pieceAt(coord.value) : undefined;
  }

  legalMovesFrom(square: string): string[] {
    const coord = parseNotation(square);
    if (!coord.ok || this.state !== "UNFINISHED") return [];
    return legalMovesFrom(this.board, this.currentPlayer, coord.value).map(toNotation);
  }

  render(): string {
    return renderBoard(this.board);
  }

  makeMove(from: string, to: string): boolean {
    return this.tryMove(from, to).ok;
  }

  tryMove(from: string, to: string): ValidationResult<MoveOutcome, MoveRejection> {
    const source = parseNotation(from);
    const target = parseNotation(to);
    if (!source.ok || !target.ok) {
      return this.reject(from, to, "invalid-notation");
    }
    if (this.state !== "UNFINISHED") {
      return this.reject(from, to, "game-over");
    }

    const legality = isLegal(this.board, this.currentPlayer, source.value, target.value);
    if (!legality.ok) {
      return this.reject(from, to, legality.error);
    }

    return { ok: true, value: this.execute(source.value, target.value, legality.value.kind) };
  }

  private execute(from: Coord, to: Coord, kind: MoveOutcome["kind"]): MoveOutcome {
    const player = this.currentPlayer;
    const piece = this.board.pieceAt(from);
    if (!piece) {
      throw new Error(`No piece on ${toNotation(from)} after validation`);
    }
    const captured = this.board.move(from, to);

    // Taking the opposing cuttlefish is the only way to win.
    if (captured?.kind === "cuttlefish" && captured.owner !== player) {
      this.state = winStateFor(player);
      this.logger.info(`${player} captured the cuttlefish on ${toNotation(to)}: ${this.state}`);
    } else {
      this.currentPlayer = opponentOf(player);
    }

    return { player, piece, kind, from, to, captured, state: this.state };
  }

  private reject(from: string, to: string, reason: MoveRejection): ValidationResult<MoveOutcome, MoveRejection> {
    this.logger.debug(`Rejected ${this.currentPlayer} move ${from} -> ${to}: ${reason}`);
    return { ok: false, error: reason };
  }
}

export const newGame = (options: GameOptions = {}): GameController => new GameController(options);
