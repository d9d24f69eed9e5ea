/**
 * Flat Monte Carlo player.
 *
 * No tree: every legal move is applied once (with one sampled spawn), then
 * scored by the total score reached over `searchesPerMove` random playouts
 * of at most `movesPerSearch` moves each. The best-scoring move wins; ties
 * go to the earlier move in action-index order.
 */

import { BoardEngine } from '../engine/board-engine.js';
import { SeededRandom, pickOne } from '../engine/random.js';
import { ALL_MOVES, Board, DEFAULT_WIN_TILE, Move } from '../engine/types.js';
import type { Bot } from './types.js';

export interface FlatMonteCarloConfig {
  searchesPerMove: number;  // Playouts per first move (default: 20)
  movesPerSearch: number;   // Moves per playout (default: 15)
  winTile: number;          // Playouts stop once this tile appears (default: 2048)
  seed: number;
}

export interface MoveScore {
  move: Move;
  legal: boolean;
  /** Summed final score over all playouts; 0 for an illegal move */
  score: number;
}

export class FlatMonteCarloBot implements Bot {
  readonly name = 'Flat Monte Carlo';
  private config: FlatMonteCarloConfig;
  private rng: SeededRandom;

  constructor(readonly id: string = 'flat-mc', config: Partial<FlatMonteCarloConfig> = {}) {
    this.config = {
      searchesPerMove: config.searchesPerMove ?? 20,
      movesPerSearch: config.movesPerSearch ?? 15,
      winTile: config.winTile ?? DEFAULT_WIN_TILE,
      seed: config.seed ?? Date.now(),
    };

    if (!Number.isInteger(this.config.searchesPerMove) || this.config.searchesPerMove < 1) {
      throw new Error('searchesPerMove must be an integer >= 1');
    }
    if (!Number.isInteger(this.config.movesPerSearch) || this.config.movesPerSearch < 0) {
      throw new Error('movesPerSearch must be an integer >= 0');
    }

    this.rng = new SeededRandom(this.config.seed);
  }

  selectMove(board: Board): Move | null {
    let best: MoveScore | null = null;
    for (const entry of this.scoreMoves(board)) {
      if (!entry.legal) continue;
      if (!best || entry.score > best.score) best = entry;
    }
    return best ? best.move : null;
  }

  /**
   * Playout totals for each of the four moves, in action-index order.
   */
  scoreMoves(board: Board): MoveScore[] {
    BoardEngine.validateBoard(board);
    return ALL_MOVES.map(move => {
      const first = BoardEngine.applyMove(board, move);
      if (!first.moved) return { move, legal: false, score: 0 };

      const start = BoardEngine.spawnTile(first.board, this.rng);
      let score = 0;
      for (let i = 0; i < this.config.searchesPerMove; i++) {
        score += first.scoreDelta + this.playout(start);
      }
      return { move, legal: true, score };
    });
  }

  private playout(start: Board): number {
    let board = start;
    let score = 0;
    for (let i = 0; i < this.config.movesPerSearch; i++) {
      if (BoardEngine.hasTile(board, this.config.winTile)) break;
      const moves = BoardEngine.legalMoves(board);
      if (moves.length === 0) break;

      const transition = BoardEngine.applyMove(board, pickOne(moves, this.rng));
      score += transition.scoreDelta;
      board = BoardEngine.spawnTile(transition.board, this.rng);
    }
    return score;
  }
}
