import type { Board, Move } from '../../engine/types.js';
import type { Bot } from '../types.js';
import { MCTS, type MCTSConfig, type SearchResult } from './mcts.js';

/**
 * Bot adapter around MCTS. Keeps the last search result for inspection.
 */
export class MctsBot implements Bot {
  readonly name: string;
  private mcts: MCTS;
  private last: SearchResult | null = null;

  constructor(readonly id: string = 'mcts', config: Partial<MCTSConfig> = {}) {
    this.mcts = new MCTS(config);
    this.name = `MCTS (${this.mcts.getTreeStats().config.simulations} sims)`;
  }

  selectMove(board: Board): Move | null {
    this.last = this.mcts.search(board);
    return this.last.move;
  }

  async selectMoveAsync(
    board: Board,
    onProgress?: (done: number, total: number) => void,
  ): Promise<Move | null> {
    this.last = await this.mcts.searchAsync(board, onProgress);
    return this.last.move;
  }

  get lastResult(): SearchResult | null {
    return this.last;
  }

  /** Forget any retained subtree, e.g. between episodes. */
  reset(): void {
    this.mcts.resetTree();
    this.last = null;
  }
}
