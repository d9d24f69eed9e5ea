/**
 * Evaluate bots against each other on the same seeded games.
 *
 * Prints a one-line summary per game and a results table per bot. With
 * --budgets, compares MCTS at several simulation budgets instead of
 * registry presets.
 *
 * Usage: node --import tsx scripts/evaluate.ts [--games 10] [--seed 1]
 *          [--bots random,flat-mc,mcts-lite] [--budgets 50,200,800] [--moves 2000]
 */

import { createBot, getBotIds } from '../src/ai/bot-registry.js';
import { compareBots, type BotSummary, type EpisodeResult } from '../src/ai/episode.js';
import { MctsBot } from '../src/ai/mcts/mcts-bot.js';
import type { Bot } from '../src/ai/types.js';

function parseList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function formatGameSummary(botId: string, game: number, result: EpisodeResult): string {
  const outcome = result.won ? 'WIN ' : '    ';
  return (
    `  ${botId.padEnd(14)} game ${String(game + 1).padStart(3)}  ${outcome}` +
    `score ${String(result.score).padStart(6)}  tile ${String(result.highest).padStart(5)}  ` +
    `moves ${String(result.moves).padStart(5)}  (${result.reason})`
  );
}

function printSummaries(summaries: BotSummary[]): void {
  console.log(`\n${'='.repeat(72)}`);
  console.log(
    `${'Bot'.padEnd(16)}${'Avg score'.padStart(11)}${'Best'.padStart(9)}` +
      `${'Best tile'.padStart(11)}${'Win %'.padStart(8)}${'Avg moves'.padStart(11)}`,
  );
  for (const s of summaries) {
    console.log(
      `${s.botId.padEnd(16)}${s.averageScore.toFixed(0).padStart(11)}${String(s.bestScore).padStart(9)}` +
        `${String(s.bestTile).padStart(11)}${(s.winRate * 100).toFixed(1).padStart(8)}` +
        `${s.averageMoves.toFixed(0).padStart(11)}`,
    );
  }
}

async function main() {
  const args = process.argv.slice(2);
  let numGames = 10;
  let seed = 1;
  let maxMoves: number | undefined;
  let botIds = ['random', 'flat-mc', 'mcts-lite'];
  let budgets: number[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--games' && args[i + 1]) numGames = parseInt(args[i + 1]);
    if (args[i] === '--seed' && args[i + 1]) seed = parseInt(args[i + 1]);
    if (args[i] === '--moves' && args[i + 1]) maxMoves = parseInt(args[i + 1]);
    if (args[i] === '--bots' && args[i + 1]) botIds = parseList(args[i + 1]);
    if (args[i] === '--budgets' && args[i + 1]) budgets = parseList(args[i + 1]).map(b => parseInt(b));
  }

  const factories: Record<string, (game: number) => Bot> = {};
  if (budgets.length > 0) {
    for (const simulations of budgets) {
      factories[`mcts-${simulations}`] = game => new MctsBot(`mcts-${simulations}`, { simulations, seed: seed + game });
    }
  } else {
    const known = getBotIds();
    for (const id of botIds) {
      if (!known.includes(id)) {
        throw new Error(`Unknown bot: ${id}. Available: ${known.join(', ')}`);
      }
      factories[id] = game => createBot(id, seed + game);
    }
  }

  console.log(`Evaluating ${Object.keys(factories).join(', ')} over ${numGames} games (seed ${seed})\n`);
  const startTime = performance.now();

  const summaries = compareBots(factories, {
    games: numGames,
    seed,
    maxMoves,
    onGame: (botId, game, result) => console.log(formatGameSummary(botId, game, result)),
  });

  printSummaries(summaries);
  console.log(`\nTime: ${((performance.now() - startTime) / 1000).toFixed(1)}s`);
}

main().catch(err => {
  console.error('Evaluation failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
