/**
 * Monte Carlo Tree Search for 2048.
 *
 * Each iteration runs the four classic phases against a private copy of the
 * board, drawing spawns from the searcher's own RNG:
 * 1. Selection: descend through fully expanded nodes by UCT
 *    (mean + C * sqrt(ln N(parent) / N(child)); unvisited children first).
 * 2. Expansion: attach a child for the next untried move (Up, Down, Left, Right
 *    order), materialized with applyMove + spawnTile.
 * 3. Simulation: play uniformly random legal moves until the board is terminal
 *    or maxRolloutDepth moves were made, summing (discounted) score deltas.
 * 4. Backpropagation: walk parent links to the root. Every node on the path is
 *    credited with the return from its own incoming move onward.
 *
 * The move returned is the root child with the most visits; ties go to the
 * higher mean value, then to the earlier move in action-index order.
 */

import { BoardEngine } from '../../engine/board-engine.js';
import { SeededRandom, pickOne } from '../../engine/random.js';
import { ALL_MOVES, Board, Move } from '../../engine/types.js';
import { SearchNode, countNodes, findChildByBoard } from './search-tree.js';

export interface MCTSConfig {
  simulations: number;          // Iterations per decision (default: 200)
  timeLimitMs?: number;         // Optional wall-clock cap, checked between iterations
  explorationConstant: number;  // C in the UCT formula, in score units (default: 100)
  maxRolloutDepth: number;      // Moves per rollout before cutoff (default: 20)
  discount: number;             // Per-move discount on returns (default: 1, undiscounted)
  seed: number;                 // Seed for expansion spawns and rollouts (default: Date.now())
  reuseTree: boolean;           // Reuse a matching subtree at the next decision (default: false)
}

export interface ChildStat {
  move: Move;
  visitCount: number;
  meanValue: number;
  probability: number;
}

export interface SearchResult {
  /** Best move, or null when the board has no legal move */
  move: Move | null;
  childStats: ChildStat[];
  /** Visit-weighted mean value of the root's children */
  value: number;
  /** Iterations actually run for this decision */
  simulations: number;
  nodeCount: number;
  searchTimeMs: number;
}

const YIELD_INTERVAL = 50; // yield to event loop every N iterations on the async path

export class MCTS {
  private config: MCTSConfig;
  private rng: SeededRandom;
  private retained: SearchNode | null = null;
  private nodeCount = 0;

  constructor(config: Partial<MCTSConfig> = {}) {
    this.config = {
      simulations: config.simulations ?? 200,
      timeLimitMs: config.timeLimitMs,
      explorationConstant: config.explorationConstant ?? 100,
      maxRolloutDepth: config.maxRolloutDepth ?? 20,
      discount: config.discount ?? 1,
      seed: config.seed ?? Date.now(),
      reuseTree: config.reuseTree ?? false,
    };

    // Validate configuration
    if (!Number.isInteger(this.config.simulations) || this.config.simulations < 0) {
      throw new Error('simulations must be an integer >= 0');
    }
    if (this.config.timeLimitMs !== undefined && !(this.config.timeLimitMs > 0)) {
      throw new Error('timeLimitMs must be > 0');
    }
    if (this.config.explorationConstant < 0) {
      throw new Error('explorationConstant must be >= 0');
    }
    if (!Number.isInteger(this.config.maxRolloutDepth) || this.config.maxRolloutDepth < 0) {
      throw new Error('maxRolloutDepth must be an integer >= 0');
    }
    if (!(this.config.discount > 0 && this.config.discount <= 1)) {
      throw new Error('discount must be in (0, 1]');
    }

    this.rng = new SeededRandom(this.config.seed);
  }

  /**
   * Run a full search synchronously and return the chosen move.
   */
  search(board: Board): SearchResult {
    const startTime = performance.now();
    const prepared = this.prepare(board, startTime);
    if (!prepared.root) return prepared.result;

    const root = prepared.root;
    let done = 0;
    while (done < this.config.simulations && !this.outOfTime(startTime)) {
      this.runIteration(root);
      done++;
    }
    return this.finish(root, done, startTime);
  }

  /**
   * Same search, yielding to the event loop periodically so a caller can
   * stay responsive and receive progress.
   */
  async searchAsync(
    board: Board,
    onProgress?: (done: number, total: number) => void,
  ): Promise<SearchResult> {
    const startTime = performance.now();
    const prepared = this.prepare(board, startTime);
    if (!prepared.root) return prepared.result;

    const root = prepared.root;
    const total = this.config.simulations;
    let done = 0;
    while (done < total && !this.outOfTime(startTime)) {
      this.runIteration(root);
      done++;
      if (done % YIELD_INTERVAL === 0) {
        onProgress?.(done, total);
        await new Promise(resolve => setTimeout(resolve, 0));
      }
    }
    onProgress?.(done, total);
    return this.finish(root, done, startTime);
  }

  /**
   * Get statistics about the last search for debugging/analysis
   */
  getTreeStats(): { nodeCount: number; retained: boolean; config: MCTSConfig } {
    return {
      nodeCount: this.nodeCount,
      retained: this.retained !== null,
      config: { ...this.config },
    };
  }

  /**
   * Root of the last search, kept only with reuseTree. For inspection.
   */
  getRetainedRoot(): SearchNode | null {
    return this.retained;
  }

  /**
   * Drop any subtree kept for reuse.
   */
  resetTree(): void {
    this.retained = null;
    this.nodeCount = 0;
  }

  // ==========================================================================
  // SEARCH PHASES
  // ==========================================================================

  /**
   * One selection / expansion / simulation / backpropagation pass.
   */
  private runIteration(root: SearchNode): void {
    // Selection
    let node = root;
    while (node.isFullyExpanded() && node.children.size > 0) {
      const next = node.selectBestChild(this.config.explorationConstant);
      if (!next) {
        throw new Error('No child found on a fully expanded node');
      }
      node = next;
    }

    // Expansion
    if (!node.isFullyExpanded()) {
      const move = node.untriedMoves[0];
      const transition = BoardEngine.applyMove(node.board, move);
      const spawned = BoardEngine.spawnTile(transition.board, this.rng);
      node = node.addChild(move, spawned, transition.scoreDelta);
    }

    // Simulation
    const value = this.rollout(node.board);

    // Backpropagation
    this.backpropagate(node, value);
  }

  /**
   * Random playout. Returns the discounted sum of score deltas.
   */
  private rollout(start: Board): number {
    let board = start;
    let total = 0;
    let weight = 1;

    for (let depth = 0; depth < this.config.maxRolloutDepth; depth++) {
      const moves = BoardEngine.legalMoves(board);
      if (moves.length === 0) break;

      const transition = BoardEngine.applyMove(board, pickOne(moves, this.rng));
      total += weight * transition.scoreDelta;
      weight *= this.config.discount;
      board = BoardEngine.spawnTile(transition.board, this.rng);
    }

    return total;
  }

  private backpropagate(leaf: SearchNode, rolloutReturn: number): void {
    let value = rolloutReturn;
    for (let node: SearchNode | null = leaf; node; node = node.parent) {
      value = node.reward + this.config.discount * value;
      node.update(value);
    }
  }

  // ==========================================================================
  // ROOT HANDLING & ACTION SELECTION
  // ==========================================================================

  /**
   * Handle the no-search cases and build (or reuse) the root.
   */
  private prepare(
    board: Board,
    startTime: number,
  ): { root: SearchNode; result?: undefined } | { root: null; result: SearchResult } {
    const legal = BoardEngine.legalMoves(board);

    if (legal.length <= 1) {
      this.retained = null;
      this.nodeCount = 0;
      return {
        root: null,
        result: {
          move: legal.length === 1 ? legal[0] : null,
          childStats: legal.map(move => ({ move, visitCount: 0, meanValue: 0, probability: 1 })),
          value: 0,
          simulations: 0,
          nodeCount: 0,
          searchTimeMs: performance.now() - startTime,
        },
      };
    }

    return { root: this.obtainRoot(board) };
  }

  /**
   * With reuseTree, the previous root is kept after each decision. If the new
   * board is that root's board or one of its children's (the real spawn matched
   * the sampled one), that node becomes the new root with its statistics.
   */
  private obtainRoot(board: Board): SearchNode {
    const previous = this.retained;
    this.retained = null;

    if (this.config.reuseTree && previous) {
      const reused = BoardEngine.boardsEqual(previous.board, board)
        ? previous
        : findChildByBoard(previous, board);
      if (reused) {
        reused.detach();
        return reused;
      }
    }
    return new SearchNode(BoardEngine.cloneBoard(board));
  }

  private finish(root: SearchNode, simulations: number, startTime: number): SearchResult {
    const move = this.selectMove(root);
    const childStats: ChildStat[] = [];

    let value = 0;
    for (const candidate of ALL_MOVES) {
      const child = root.children.get(candidate);
      const isLegal = child !== undefined || root.untriedMoves.includes(candidate);
      if (!isLegal) continue;

      const visits = child?.visitCount ?? 0;
      const probability = root.visitCount > 0 ? visits / root.visitCount : 0;
      const meanValue = child?.meanValue ?? 0;
      value += probability * meanValue;
      childStats.push({ move: candidate, visitCount: visits, meanValue, probability });
    }
    childStats.sort((a, b) => b.visitCount - a.visitCount);

    this.nodeCount = countNodes(root);
    this.retained = this.config.reuseTree ? root : null;

    return {
      move,
      childStats,
      value,
      simulations,
      nodeCount: this.nodeCount,
      searchTimeMs: performance.now() - startTime,
    };
  }

  /**
   * Most visited child; ties by mean value, then action-index order.
   * With no expanded child (a zero budget) the first legal move is returned.
   */
  private selectMove(root: SearchNode): Move {
    let best: SearchNode | null = null;
    for (const candidate of ALL_MOVES) {
      const child = root.children.get(candidate);
      if (!child) continue;
      if (
        !best ||
        child.visitCount > best.visitCount ||
        (child.visitCount === best.visitCount && child.meanValue > best.meanValue)
      ) {
        best = child;
      }
    }

    if (best && best.move !== null) return best.move;
    const fallback = root.untriedMoves[0];
    if (fallback === undefined) {
      throw new Error('Root has neither children nor untried moves');
    }
    return fallback;
  }

  private outOfTime(startTime: number): boolean {
    return (
      this.config.timeLimitMs !== undefined &&
      performance.now() - startTime >= this.config.timeLimitMs
    );
  }
}

export default MCTS;
