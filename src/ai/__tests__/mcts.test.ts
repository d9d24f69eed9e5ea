/**
 * MCTS Tests
 *
 * Covers the no-search shortcuts, budget accounting, determinism under a seed,
 * time limits, progress reporting, subtree reuse and configuration checks.
 *
 * Run with: node --import tsx --test src/ai/__tests__/mcts.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MCTS } from '../mcts/mcts.js';
import { BoardEngine } from '../../engine/board-engine.js';
import { Game2048Env } from '../../engine/environment.js';
import { Move } from '../../engine/types.js';
import {
  BIG_MERGE_BOARD,
  DEAD_BOARD,
  DEFAULT_SEED,
  LEFT_ONLY_BOARD,
} from '../../engine/__tests__/test-helpers.js';

/** Root of a fresh `simulations`-iteration search with zero-depth rollouts. */
function shallowSearch(simulations: number, discount: number) {
  const mcts = new MCTS({ simulations, maxRolloutDepth: 0, discount, seed: DEFAULT_SEED, reuseTree: true });
  const result = mcts.search(BIG_MERGE_BOARD);
  const root = mcts.getRetainedRoot();
  assert.ok(root);
  return { result, root };
}

function totalChildVisits(result: { childStats: { visitCount: number }[] }): number {
  return result.childStats.reduce((sum, s) => sum + s.visitCount, 0);
}

describe('MCTS', () => {
  describe('shortcuts', () => {
    it('returns the only legal move without simulating, even with a zero budget', () => {
      const mcts = new MCTS({ simulations: 0, seed: DEFAULT_SEED });
      const result = mcts.search(LEFT_ONLY_BOARD);

      assert.equal(result.move, Move.Left);
      assert.equal(result.simulations, 0);
      assert.equal(result.nodeCount, 0);
    });

    it('reports no move on a terminal board', () => {
      const result = new MCTS({ simulations: 50, seed: DEFAULT_SEED }).search(DEAD_BOARD);
      assert.equal(result.move, null);
      assert.deepEqual(result.childStats, []);
      assert.equal(result.simulations, 0);
    });

    it('falls back to the first legal move when the budget is zero', () => {
      const result = new MCTS({ simulations: 0, seed: DEFAULT_SEED }).search(BIG_MERGE_BOARD);
      assert.equal(result.move, Move.Down);
      assert.equal(result.simulations, 0);
    });
  });

  describe('search', () => {
    it('runs exactly the configured number of iterations through the root', () => {
      const result = new MCTS({ simulations: 120, seed: DEFAULT_SEED }).search(BIG_MERGE_BOARD);

      assert.equal(result.simulations, 120);
      assert.equal(totalChildVisits(result), 120);
      assert.deepEqual(
        result.childStats.map(s => s.move).sort(),
        [Move.Down, Move.Left, Move.Right],
      );
      assert.ok(result.nodeCount > 3);
    });

    it('picks a merging move over a plain slide', () => {
      const mcts = new MCTS({
        simulations: 200,
        explorationConstant: 50,
        maxRolloutDepth: 0,
        discount: 0.5,
        seed: DEFAULT_SEED,
      });
      const result = mcts.search(BIG_MERGE_BOARD);

      assert.ok(result.move === Move.Left || result.move === Move.Right, `picked ${result.move}`);
    });

    it('returns the most visited child', () => {
      const result = new MCTS({ simulations: 150, seed: DEFAULT_SEED }).search(BIG_MERGE_BOARD);
      const maxVisits = Math.max(...result.childStats.map(s => s.visitCount));
      const chosen = result.childStats.find(s => s.move === result.move);
      assert.equal(chosen?.visitCount, maxVisits);
    });

    it('is reproducible for a fixed seed', () => {
      const a = new MCTS({ simulations: 80, seed: 7 }).search(BIG_MERGE_BOARD);
      const b = new MCTS({ simulations: 80, seed: 7 }).search(BIG_MERGE_BOARD);
      assert.equal(a.move, b.move);
      assert.deepEqual(a.childStats, b.childStats);
      assert.equal(a.nodeCount, b.nodeCount);
    });

    it('never mutates the board it is given', () => {
      const env = new Game2048Env({ seed: DEFAULT_SEED });
      const board = env.reset();
      const snapshot = JSON.stringify(board);

      new MCTS({ simulations: 60, seed: DEFAULT_SEED }).search(board);

      assert.equal(JSON.stringify(board), snapshot);
      assert.deepEqual(env.getState().board, board);
    });

    it('always returns a legal move on live boards', () => {
      const env = new Game2048Env({ seed: DEFAULT_SEED });
      const mcts = new MCTS({ simulations: 20, maxRolloutDepth: 5, seed: DEFAULT_SEED });
      let observation = env.reset();

      for (let i = 0; i < 30; i++) {
        const { move } = mcts.search(observation);
        assert.notEqual(move, null);
        if (move === null) break;
        assert.ok(BoardEngine.legalMoves(observation).includes(move));

        const step = env.step(move);
        assert.equal(step.info.isValid, true);
        observation = step.observation;
        if (step.done) break;
      }
    });

    it('stops at the time limit between iterations', () => {
      const mcts = new MCTS({ simulations: 1_000_000, timeLimitMs: 20, seed: DEFAULT_SEED });
      const result = mcts.search(BIG_MERGE_BOARD);

      assert.ok(result.simulations >= 1);
      assert.ok(result.simulations < 1_000_000);
      assert.equal(totalChildVisits(result), result.simulations);
    });
  });

  describe('searchAsync', () => {
    it('reports progress and matches the synchronous search', async () => {
      const calls: Array<[number, number]> = [];
      const asyncResult = await new MCTS({ simulations: 120, seed: 11 }).searchAsync(
        BIG_MERGE_BOARD,
        (done, total) => calls.push([done, total]),
      );
      const syncResult = new MCTS({ simulations: 120, seed: 11 }).search(BIG_MERGE_BOARD);

      assert.deepEqual(calls, [
        [50, 120],
        [100, 120],
        [120, 120],
      ]);
      assert.equal(asyncResult.move, syncResult.move);
      assert.deepEqual(asyncResult.childStats, syncResult.childStats);
    });
  });

  describe('backpropagation', () => {
    it('credits every ancestor with its reward plus the discounted value below', () => {
      // Down, Left, Right are expanded once each, then Left is revisited and
      // its first grandchild (a 1024 and one small tile, no merge) is expanded.
      const { result, root } = shallowSearch(4, 0.5);
      const left = root.children.get(Move.Left);
      assert.ok(left);

      assert.equal(root.visitCount, 4);
      assert.equal(root.totalValue, 0 + 512 + 512 + 512);
      assert.equal(left.visitCount, 2);
      assert.equal(left.totalValue, 1024 + 1024);
      assert.equal(root.children.get(Move.Down)?.totalValue, 0);
      assert.equal(root.children.get(Move.Right)?.totalValue, 1024);

      const [grandchild] = left.children.values();
      assert.equal(grandchild.visitCount, 1);
      assert.equal(grandchild.totalValue, 0);

      assert.equal(result.move, Move.Left);
      assert.equal(result.value, (2 / 4) * 1024 + (1 / 4) * 1024);
    });

    it('sums child returns at the root when undiscounted', () => {
      const { root } = shallowSearch(3, 1);
      assert.equal(root.visitCount, 3);
      assert.equal(root.totalValue, 2048);
    });
  });

  describe('action selection', () => {
    it('breaks equal visits by mean value, then by move order', () => {
      // One visit each: Down has mean 0, Left and Right both 1024.
      const { result } = shallowSearch(3, 1);

      assert.deepEqual(
        result.childStats.map(s => [s.move, s.visitCount, s.meanValue]),
        [
          [Move.Down, 1, 0],
          [Move.Left, 1, 1024],
          [Move.Right, 1, 1024],
        ],
      );
      assert.equal(result.move, Move.Left);
    });
  });

  describe('subtree reuse', () => {
    it('continues from the matching child after a move', () => {
      const mcts = new MCTS({ simulations: 60, seed: DEFAULT_SEED, reuseTree: true });
      const first = mcts.search(BIG_MERGE_BOARD);
      const root = mcts.getRetainedRoot();
      const move = first.move;
      assert.ok(root);
      assert.ok(move !== null);
      const child = root.children.get(move);
      assert.ok(child);

      // Every visit after the expanding one went to exactly one grandchild
      const carried = child.visitCount - 1;
      const second = mcts.search(child.board);

      assert.equal(second.simulations, 60);
      assert.equal(totalChildVisits(second), carried + 60);
      assert.equal(mcts.getRetainedRoot(), child);
      assert.equal(child.parent, null);
    });

    it('keeps root statistics when the same board is searched again', () => {
      const mcts = new MCTS({ simulations: 50, seed: DEFAULT_SEED, reuseTree: true });
      mcts.search(BIG_MERGE_BOARD);
      assert.equal(mcts.getTreeStats().retained, true);

      const second = mcts.search(BIG_MERGE_BOARD);
      assert.equal(second.simulations, 50);
      assert.equal(totalChildVisits(second), 100);
    });

    it('starts fresh without reuse', () => {
      const mcts = new MCTS({ simulations: 50, seed: DEFAULT_SEED });
      mcts.search(BIG_MERGE_BOARD);
      assert.equal(mcts.getTreeStats().retained, false);
      assert.equal(totalChildVisits(mcts.search(BIG_MERGE_BOARD)), 50);
    });

    it('drops the retained tree on resetTree', () => {
      const mcts = new MCTS({ simulations: 50, seed: DEFAULT_SEED, reuseTree: true });
      mcts.search(BIG_MERGE_BOARD);
      mcts.resetTree();
      assert.equal(mcts.getTreeStats().retained, false);
      assert.equal(totalChildVisits(mcts.search(BIG_MERGE_BOARD)), 50);
    });
  });

  describe('configuration', () => {
    it('fills defaults', () => {
      const { config } = new MCTS({ seed: 5 }).getTreeStats();
      assert.deepEqual(config, {
        simulations: 200,
        timeLimitMs: undefined,
        explorationConstant: 100,
        maxRolloutDepth: 20,
        discount: 1,
        seed: 5,
        reuseTree: false,
      });
    });

    it('rejects invalid values', () => {
      assert.throws(() => new MCTS({ simulations: -1 }), /simulations must be an integer >= 0/);
      assert.throws(() => new MCTS({ simulations: 2.5 }), /simulations must be an integer >= 0/);
      assert.throws(() => new MCTS({ timeLimitMs: 0 }), /timeLimitMs must be > 0/);
      assert.throws(() => new MCTS({ explorationConstant: -1 }), /explorationConstant must be >= 0/);
      assert.throws(() => new MCTS({ maxRolloutDepth: -3 }), /maxRolloutDepth must be an integer >= 0/);
      assert.throws(() => new MCTS({ discount: 0 }), /discount must be in \(0, 1\]/);
      assert.throws(() => new MCTS({ discount: 1.5 }), /discount must be in \(0, 1\]/);
    });
  });
});
