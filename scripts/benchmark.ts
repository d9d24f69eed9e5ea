#!/usr/bin/env node
/**
 * Benchmark script for engine and search speed.
 * Measures: random games/second, moves/second, MCTS iterations/second
 */

import { MCTS } from '../src/ai/mcts/mcts.js';
import { BoardEngine } from '../src/engine/board-engine.js';
import { SeededRandom, pickOne } from '../src/engine/random.js';
import { Board } from '../src/engine/types.js';

/**
 * Utility to measure execution time
 */
function measureTime(fn: () => void): number {
  const start = performance.now();
  fn();
  return performance.now() - start;
}

/**
 * Play a random game and return the positions it passed through.
 */
function randomGame(rng: SeededRandom): Board[] {
  let board = BoardEngine.initialBoard(rng);
  const positions: Board[] = [board];
  while (!BoardEngine.isTerminal(board)) {
    const { board: next } = BoardEngine.applyMove(board, pickOne(BoardEngine.legalMoves(board), rng));
    board = BoardEngine.spawnTile(next, rng);
    positions.push(board);
  }
  return positions;
}

function main(): void {
  console.log('2048 - Performance Benchmark');
  console.log('============================\n');

  const NUM_GAMES = 1000;
  const SEARCH_BUDGETS = [100, 500, 1000];
  const SEARCH_POSITIONS = 10;

  try {
    const rng = new SeededRandom(12345);

    console.log(`Benchmarking ${NUM_GAMES} random games...`);
    let totalMoves = 0;
    const gameTime = measureTime(() => {
      for (let i = 0; i < NUM_GAMES; i++) {
        totalMoves += randomGame(rng).length - 1;
      }
    });

    const gamesPerSecond = (NUM_GAMES / gameTime) * 1000;
    const movesPerSecond = (totalMoves / gameTime) * 1000;

    console.log(`  Games simulated: ${NUM_GAMES}`);
    console.log(`  Total time: ${gameTime.toFixed(2)}ms`);
    console.log(`  Games/second: ${gamesPerSecond.toFixed(2)}`);
    console.log(`  Moves/second: ${movesPerSecond.toFixed(0)}`);
    console.log(`  Average game length: ${(totalMoves / NUM_GAMES).toFixed(2)} moves\n`);

    // Mid-game positions make the search numbers representative
    const game = randomGame(rng);
    const positions = Array.from({ length: SEARCH_POSITIONS }, (_, i) =>
      game[Math.floor((i * game.length) / (SEARCH_POSITIONS + 1))],
    );

    console.log('MCTS Decision Time');
    console.log('------------------');
    for (const simulations of SEARCH_BUDGETS) {
      const mcts = new MCTS({ simulations, seed: 1 });
      let iterations = 0;
      let nodes = 0;
      const searchTime = measureTime(() => {
        for (const board of positions) {
          const result = mcts.search(board);
          iterations += result.simulations;
          nodes += result.nodeCount;
        }
      });

      console.log(
        `  ${String(simulations).padStart(5)} sims: ${(searchTime / positions.length).toFixed(1)}ms/move, ` +
          `${((iterations / searchTime) * 1000).toFixed(0)} iterations/s, ` +
          `${(nodes / positions.length).toFixed(0)} nodes/tree`,
      );
    }

    console.log('\nSystem Information');
    console.log('------------------');
    console.log(`  Node.js: ${process.version}`);
    console.log(`  Platform: ${process.platform}`);
    console.log(`  Architecture: ${process.arch}`);
  } catch (error) {
    console.error('Benchmark failed:', error);
    process.exit(1);
  }
}

main();
