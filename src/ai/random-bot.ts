import { BoardEngine } from '../engine/board-engine.js';
import { SeededRandom, pickOne } from '../engine/random.js';
import type { Board, Move } from '../engine/types.js';
import type { Bot } from './types.js';

/**
 * Uniformly random legal move. Baseline for evaluations.
 */
export class RandomBot implements Bot {
  readonly name = 'Random';
  private rng: SeededRandom;

  constructor(readonly id: string = 'random', seed: number = Date.now()) {
    this.rng = new SeededRandom(seed);
  }

  selectMove(board: Board): Move | null {
    const moves = BoardEngine.legalMoves(board);
    if (moves.length === 0) return null;
    return pickOne(moves, this.rng);
  }
}
