/**
 * Search tree for MCTS over 2048 boards.
 *
 * A node is one decision point: the board after a move and its spawn.
 * Each tried move owns exactly one child, holding the spawn outcome that
 * was sampled when the move was expanded.
 */

import { BoardEngine } from '../../engine/board-engine.js';
import { Move } from '../../engine/types.js';
import type { Board } from '../../engine/types.js';

export class SearchNode {
  readonly board: Board;
  /** Move that led here from the parent; null at the root */
  readonly move: Move | null;
  /** Score delta earned by `move` */
  readonly reward: number;
  /** Traversal only; the tree owns nodes through `children` */
  parent: SearchNode | null;
  readonly children = new Map<Move, SearchNode>();
  /** Legal moves not yet expanded, in expansion order */
  readonly untriedMoves: Move[];
  visitCount = 0;
  /** Sum of returns observed through this node */
  totalValue = 0;

  constructor(board: Board, parent: SearchNode | null = null, move: Move | null = null, reward = 0) {
    this.board = board;
    this.parent = parent;
    this.move = move;
    this.reward = reward;
    this.untriedMoves = BoardEngine.legalMoves(board);
  }

  get meanValue(): number {
    return this.visitCount > 0 ? this.totalValue / this.visitCount : 0;
  }

  isFullyExpanded(): boolean {
    return this.untriedMoves.length === 0;
  }

  /** No legal move from this board. */
  isTerminal(): boolean {
    return this.untriedMoves.length === 0 && this.children.size === 0;
  }

  /**
   * UCT score as seen from the parent. Unvisited nodes score +Infinity so
   * they are tried before any visited sibling.
   */
  uctValue(explorationConstant: number): number {
    if (this.visitCount === 0) return Infinity;
    if (!this.parent) return this.meanValue;

    const exploitation = this.meanValue;
    const exploration =
      explorationConstant * Math.sqrt(Math.log(this.parent.visitCount) / this.visitCount);
    return exploitation + exploration;
  }

  /**
   * Child with the highest UCT score. Ties keep the first child in
   * expansion order.
   */
  selectBestChild(explorationConstant: number): SearchNode | null {
    let best: SearchNode | null = null;
    let bestScore = -Infinity;
    for (const child of this.children.values()) {
      const score = child.uctValue(explorationConstant);
      if (score > bestScore) {
        bestScore = score;
        best = child;
      }
    }
    return best;
  }

  /**
   * Attach a child for the next untried move.
   * `board` is the post-spawn board reached by that move.
   */
  addChild(move: Move, board: Board, reward: number): SearchNode {
    const idx = this.untriedMoves.indexOf(move);
    if (idx < 0) {
      throw new Error(`Move ${Move[move]} is not untried at this node`);
    }
    this.untriedMoves.splice(idx, 1);
    const child = new SearchNode(board, this, move, reward);
    this.children.set(move, child);
    return child;
  }

  /**
   * Record one simulation result on this node.
   */
  update(value: number): void {
    this.visitCount++;
    this.totalValue += value;
  }

  /** Make this node a root, dropping the link to the old tree. */
  detach(): void {
    this.parent = null;
  }
}

/**
 * Count the nodes of a (sub)tree.
 */
export function countNodes(root: SearchNode): number {
  let count = 0;
  const stack: SearchNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    count++;
    for (const child of node.children.values()) stack.push(child);
  }
  return count;
}

/**
 * Find a child of `root` whose board equals `board`.
 */
export function findChildByBoard(root: SearchNode, board: Board): SearchNode | null {
  for (const child of root.children.values()) {
    if (BoardEngine.boardsEqual(child.board, board)) return child;
  }
  return null;
}
