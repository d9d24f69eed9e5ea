/**
 * 2048 Engine - Core Type Definitions
 *
 * Board, move and state types shared by the engine, the environment and the bots.
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Side length of the board. The game is always played on a 4x4 grid. */
export const BOARD_SIZE = 4;

/** Probability that a spawned tile is a 2 (otherwise a 4). */
export const SPAWN_TWO_PROBABILITY = 0.9;

/** Tile value that counts as a won game. */
export const DEFAULT_WIN_TILE = 2048;

// ============================================================================
// ENUMS
// ============================================================================

/**
 * Slide directions. The numeric value is the action index used by the
 * environment's action space, so the order here is part of the public contract.
 */
export enum Move {
  Up = 0,
  Down = 1,
  Left = 2,
  Right = 3,
}

/** All moves in action-index order. Also the tie-break order for bots. */
export const ALL_MOVES: readonly Move[] = [Move.Up, Move.Down, Move.Left, Move.Right];

// ============================================================================
// BOARD & STATE
// ============================================================================

/**
 * A 4x4 grid of cell values, row-major (`board[row][col]`).
 * 0 is an empty cell; any other value is a power of two >= 2.
 */
export type Board = ReadonlyArray<ReadonlyArray<number>>;

/** Mutable grid used while building a new board. */
export type MutableBoard = number[][];

/** Row/column coordinates of a cell. */
export interface Cell {
  row: number;
  col: number;
}

/**
 * Result of sliding the board in one direction, before any tile spawns.
 */
export interface TransitionResult {
  board: Board;
  /** Sum of the values produced by merges (two k tiles add 2k). */
  scoreDelta: number;
  /** False when the move changed nothing; such a move must not spawn a tile. */
  moved: boolean;
  /** Value produced by each merge, in line order. */
  mergedValues: number[];
}

/**
 * Full state of one 2048 episode.
 */
export interface GameState {
  board: Board;
  /** Cumulative score; never decreases. */
  score: number;
  /** True once no move can change the board. */
  terminal: boolean;
}

// ============================================================================
// RANDOMNESS
// ============================================================================

/**
 * Source of uniform random numbers in [0, 1).
 * Injected wherever the engine needs randomness.
 */
export interface RandomSource {
  next(): number;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * How the environment turns an accepted move into a reward.
 * - score: the raw score delta of the move
 * - log2: sum of log2 of every merged value
 * - merges: number of merges performed
 */
export type RewardPolicy = 'score' | 'log2' | 'merges';

export interface EnvironmentConfig {
  /** Seed for the environment's RNG stream (default: Date.now()) */
  seed: number;
  /** Reseed the RNG with `seed` on every reset, making episodes reproducible (default: false) */
  reseedOnReset: boolean;
  /** Reward policy for accepted moves (default: 'score') */
  rewardPolicy: RewardPolicy;
  /** Reward for an illegal move; must be <= 0 (default: 0) */
  illegalMovePenalty: number;
  /** Tile value reported as a win in step info (default: 2048) */
  winTile: number;
  /** Steps after which `truncated` is reported (default: 10000) */
  maxSteps: number;
  /** Illegal moves after which `truncated` is reported (default: 10) */
  maxIllegalMoves: number;
}

/** Diagnostic information returned by every step. */
export interface StepInfo {
  score: number;
  highest: number;
  steps: number;
  illegalMoves: number;
  /** Whether the requested action was applied. */
  isValid: boolean;
  won: boolean;
  /** Step or illegal-move limits exceeded. Never changes `done`. */
  truncated: boolean;
}

export interface StepResult {
  observation: Board;
  reward: number;
  done: boolean;
  info: StepInfo;
}

/**
 * Reset/step contract consumed by any bot or front end.
 */
export interface Environment {
  readonly actionSpace: readonly Move[];
  reset(): Board;
  step(action: Move | number): StepResult;
  legalMoves(observation: Board): Move[];
}
