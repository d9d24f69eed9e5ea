/**
 * Episode runner and bot comparison.
 *
 * Drives an Environment with a Bot until the game ends, the bot has no move,
 * the move cap is hit or the environment reports truncation. `compareBots`
 * plays every bot on the same seeded sequence of games so averages are
 * comparable.
 */

import { BoardEngine } from '../engine/board-engine.js';
import { Game2048Env } from '../engine/environment.js';
import type { Board, Move, StepResult } from '../engine/types.js';
import type { Bot } from './types.js';

export interface EpisodeOptions {
  /** Stop after this many accepted moves (default: Infinity) */
  maxMoves?: number;
  onStep?: (move: Move, result: StepResult) => void;
}

export interface EpisodeResult {
  score: number;
  highest: number;
  /** Accepted moves */
  moves: number;
  illegalMoves: number;
  won: boolean;
  reason: 'terminal' | 'noMove' | 'maxMoves' | 'truncated';
  board: Board;
}

export function runEpisode(env: Game2048Env, bot: Bot, options: EpisodeOptions = {}): EpisodeResult {
  const maxMoves = options.maxMoves ?? Infinity;
  bot.reset?.();

  let observation = env.reset();
  let moves = 0;
  let illegalMoves = 0;
  let won = false;
  let reason: EpisodeResult['reason'] = 'terminal';

  while (!env.getState().terminal) {
    if (moves >= maxMoves) {
      reason = 'maxMoves';
      break;
    }

    const move = bot.selectMove(observation);
    if (move === null) {
      reason = 'noMove';
      break;
    }

    const result = env.step(move);
    options.onStep?.(move, result);
    observation = result.observation;
    won = won || result.info.won;
    if (result.info.isValid) {
      moves++;
    } else {
      illegalMoves++;
    }
    if (result.info.truncated && !result.done) {
      reason = 'truncated';
      break;
    }
  }

  const state = env.getState();
  return {
    score: state.score,
    highest: BoardEngine.maxTile(state.board),
    moves,
    illegalMoves,
    won,
    reason,
    board: state.board,
  };
}

export interface ComparisonOptions {
  games: number;
  /** Game i uses environment seed `seed + i` */
  seed: number;
  maxMoves?: number;
  onGame?: (botId: string, game: number, result: EpisodeResult) => void;
}

export interface BotSummary {
  botId: string;
  games: number;
  averageScore: number;
  bestScore: number;
  bestTile: number;
  winRate: number;
  averageMoves: number;
}

/**
 * Play `games` episodes per bot. Bots are created per game by their factory,
 * which receives the game index (useful for seeding).
 */
export function compareBots(
  factories: Record<string, (game: number) => Bot>,
  options: ComparisonOptions,
): BotSummary[] {
  if (!Number.isInteger(options.games) || options.games < 1) {
    throw new Error('games must be an integer >= 1');
  }

  const summaries: BotSummary[] = [];
  for (const [botId, factory] of Object.entries(factories)) {
    let totalScore = 0;
    let bestScore = 0;
    let bestTile = 0;
    let wins = 0;
    let totalMoves = 0;

    for (let game = 0; game < options.games; game++) {
      const env = new Game2048Env({ seed: (options.seed + game) >>> 0 });
      const result = runEpisode(env, factory(game), { maxMoves: options.maxMoves });
      options.onGame?.(botId, game, result);

      totalScore += result.score;
      totalMoves += result.moves;
      bestScore = Math.max(bestScore, result.score);
      bestTile = Math.max(bestTile, result.highest);
      if (result.won) wins++;
    }

    summaries.push({
      botId,
      games: options.games,
      averageScore: totalScore / options.games,
      bestScore,
      bestTile,
      winRate: wins / options.games,
      averageMoves: totalMoves / options.games,
    });
  }
  return summaries;
}
