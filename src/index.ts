// 2048 MCTS - Main Exports
export * from './engine/types.js';
export { BoardEngine } from './engine/board-engine.js';
export { SeededRandom, pickOne } from './engine/random.js';
export { Game2048Env } from './engine/environment.js';
export { MCTS } from './ai/mcts/mcts.js';
export type { MCTSConfig, SearchResult, ChildStat } from './ai/mcts/mcts.js';
export { SearchNode } from './ai/mcts/search-tree.js';
export { MctsBot } from './ai/mcts/mcts-bot.js';
export { RandomBot } from './ai/random-bot.js';
export { FlatMonteCarloBot } from './ai/flat-monte-carlo.js';
export type { Bot } from './ai/types.js';
export { getBots, getBot, getBotIds, registerBot, createBot } from './ai/bot-registry.js';
export { runEpisode, compareBots } from './ai/episode.js';
