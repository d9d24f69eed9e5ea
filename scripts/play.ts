#!/usr/bin/env node
/**
 * 2048 - Play Script
 *
 * Plays one game with a registered bot and prints the board as it goes.
 *
 * Usage:
 *   node --import tsx scripts/play.ts                     # mcts-lite, random seed
 *   node --import tsx scripts/play.ts --bot mcts-full     # any id from the bot registry
 *   node --import tsx scripts/play.ts --seed 42           # deterministic seed
 *   node --import tsx scripts/play.ts --moves 500         # move cap
 *   node --import tsx scripts/play.ts --verbose           # show every board
 */

import { createBot, getBotIds } from '../src/ai/bot-registry.js';
import { runEpisode } from '../src/ai/episode.js';
import { MctsBot } from '../src/ai/mcts/mcts-bot.js';
import { BoardEngine } from '../src/engine/board-engine.js';
import { Game2048Env } from '../src/engine/environment.js';
import { Board, Move } from '../src/engine/types.js';

// ============================================================================
// CONFIG
// ============================================================================

interface PlayConfig {
  bot: string;
  seed: number;
  maxMoves: number;
  verbose: boolean;
}

function parseArgs(): PlayConfig {
  const args = process.argv.slice(2);
  const config: PlayConfig = {
    bot: 'mcts-lite',
    seed: Math.floor(Math.random() * 100000),
    maxMoves: Infinity,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--bot' && args[i + 1]) config.bot = args[++i];
    if (args[i] === '--seed' && args[i + 1]) config.seed = parseInt(args[++i], 10);
    if (args[i] === '--moves' && args[i + 1]) config.maxMoves = parseInt(args[++i], 10);
    if (args[i] === '--verbose') config.verbose = true;
  }

  return config;
}

// ============================================================================
// DISPLAY HELPERS
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

function c(color: string, text: string): string {
  return `${color}${text}${COLORS.reset}`;
}

function tileColor(value: number): string {
  if (value === 0) return COLORS.dim;
  if (value <= 4) return '';
  if (value <= 16) return COLORS.yellow;
  if (value <= 64) return COLORS.red;
  if (value <= 256) return COLORS.magenta;
  if (value <= 1024) return COLORS.cyan;
  return COLORS.bright + COLORS.green;
}

function printBoard(board: Board): void {
  const width = String(BoardEngine.maxTile(board)).length;
  for (const row of board) {
    const cells = row.map(v => c(tileColor(v), (v === 0 ? '.' : String(v)).padStart(width)));
    console.log(`  ${cells.join(' ')}`);
  }
}

// ============================================================================
// MAIN
// ============================================================================

function runGame(config: PlayConfig): void {
  const bot = createBot(config.bot, config.seed);
  const env = new Game2048Env({ seed: config.seed });

  console.log(c(COLORS.bright + COLORS.yellow, `\n2048 - ${bot.name}`));
  console.log(c(COLORS.dim, `   Bot: ${bot.id} | Seed: ${config.seed} | Max moves: ${config.maxMoves}\n`));

  const startTime = performance.now();
  const result = runEpisode(env, bot, {
    maxMoves: config.maxMoves,
    onStep: (move, step) => {
      if (!config.verbose) return;
      const stats = bot instanceof MctsBot ? bot.lastResult : null;
      const detail = stats ? c(COLORS.dim, ` (${stats.nodeCount} nodes, value ${stats.value.toFixed(1)})`) : '';
      console.log(`Move ${step.info.steps}: ${c(COLORS.blue, Move[move])} +${step.reward}${detail}`);
      printBoard(step.observation);
      console.log('');
    },
  });
  const elapsed = (performance.now() - startTime) / 1000;

  console.log(c(COLORS.bright, '\n=== GAME OVER ==='));
  printBoard(result.board);
  console.log('');
  console.log(`  Score:         ${c(COLORS.bright, String(result.score))}`);
  console.log(`  Highest tile:  ${result.highest}`);
  console.log(`  Moves:         ${result.moves}`);
  console.log(`  Illegal moves: ${result.illegalMoves}`);
  console.log(`  Ended by:      ${result.reason}`);
  console.log(result.won ? c(COLORS.green, '  Reached 2048!') : c(COLORS.dim, '  Did not reach 2048'));
  console.log(`  Time: ${elapsed.toFixed(1)}s\n`);
}

const config = parseArgs();
try {
  runGame(config);
} catch (err) {
  console.error('Game crashed:', err instanceof Error ? err.message : err);
  console.error(`Available bots: ${getBotIds().join(', ')}`);
  process.exit(1);
}
