import { FlatMonteCarloBot, type FlatMonteCarloConfig } from './flat-monte-carlo.js';
import { MctsBot } from './mcts/mcts-bot.js';
import type { MCTSConfig } from './mcts/mcts.js';
import { RandomBot } from './random-bot.js';
import type { Bot } from './types.js';

export type BotKind = 'random' | 'flat-mc' | 'mcts';

export interface BotPreset {
  id: string;
  name: string;
  description: string;
  kind: BotKind;
  /** MCTS config if applicable */
  mctsConfig?: Partial<MCTSConfig>;
  /** Flat Monte Carlo config if applicable */
  flatConfig?: Partial<FlatMonteCarloConfig>;
}

const presets: BotPreset[] = [
  {
    id: 'random',
    name: 'Random',
    description: 'Uniformly random legal move',
    kind: 'random',
  },
  {
    id: 'flat-mc',
    name: 'Flat MC',
    description: 'Flat Monte Carlo 20 playouts x 15 moves per move',
    kind: 'flat-mc',
    flatConfig: { searchesPerMove: 20, movesPerSearch: 15 },
  },
  {
    id: 'mcts-lite',
    name: 'Lite',
    description: 'MCTS 100 sims, rollout depth 10',
    kind: 'mcts',
    mctsConfig: { simulations: 100, maxRolloutDepth: 10 },
  },
  {
    id: 'mcts-full',
    name: 'Full',
    description: 'MCTS 1000 sims, rollout depth 30, subtree reuse',
    kind: 'mcts',
    mctsConfig: { simulations: 1000, maxRolloutDepth: 30, reuseTree: true },
  },
];

/** Get all registered bot presets */
export function getBots(): readonly BotPreset[] {
  return presets;
}

/** Get a preset by id */
export function getBot(id: string): BotPreset | undefined {
  return presets.find(p => p.id === id);
}

/** Get all preset IDs */
export function getBotIds(): string[] {
  return presets.map(p => p.id);
}

/** Register a new preset at runtime, replacing one with the same id */
export function registerBot(preset: BotPreset): void {
  const existing = presets.findIndex(p => p.id === preset.id);
  if (existing >= 0) {
    presets[existing] = preset;
  } else {
    presets.push(preset);
  }
}

/**
 * Instantiate the preset `id`. The seed, when given, overrides any seed in
 * the preset config.
 */
export function createBot(id: string, seed?: number): Bot {
  const preset = getBot(id);
  if (!preset) {
    throw new Error(`Unknown bot: ${id}. Available: ${getBotIds().join(', ')}`);
  }

  const seeded = seed !== undefined ? { seed } : {};
  switch (preset.kind) {
    case 'random':
      return new RandomBot(preset.id, seed);
    case 'flat-mc':
      return new FlatMonteCarloBot(preset.id, { ...preset.flatConfig, ...seeded });
    case 'mcts':
      return new MctsBot(preset.id, { ...preset.mctsConfig, ...seeded });
  }
}
