import type { Board, Move } from '../engine/types.js';

/**
 * A player that picks moves from observations.
 * Bots never touch the environment; they only read the board they are given.
 */
export interface Bot {
  readonly id: string;
  readonly name: string;
  /** Chosen move, or null when the board has no legal move */
  selectMove(board: Board): Move | null;
  /** Clear per-episode state */
  reset?(): void;
}
