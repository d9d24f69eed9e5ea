/**
 * Stateful 2048 episode with a reset/step contract.
 *
 * The environment owns the live board, the cumulative score and a single
 * RNG stream used for tile spawns. Observations handed out are copies, so
 * nothing a caller does to them reaches the live state.
 */

import { BoardEngine } from './board-engine.js';
import { SeededRandom } from './random.js';
import {
  ALL_MOVES,
  Board,
  DEFAULT_WIN_TILE,
  Environment,
  EnvironmentConfig,
  GameState,
  Move,
  StepInfo,
  StepResult,
  TransitionResult,
} from './types.js';

export class Game2048Env implements Environment {
  readonly actionSpace: readonly Move[] = ALL_MOVES;

  private config: EnvironmentConfig;
  private rng: SeededRandom;
  private board: Board;
  private score = 0;
  private terminal = false;
  private steps = 0;
  private illegalMoves = 0;

  constructor(config: Partial<EnvironmentConfig> = {}) {
    this.config = {
      seed: config.seed ?? Date.now(),
      reseedOnReset: config.reseedOnReset ?? false,
      rewardPolicy: config.rewardPolicy ?? 'score',
      illegalMovePenalty: config.illegalMovePenalty ?? 0,
      winTile: config.winTile ?? DEFAULT_WIN_TILE,
      maxSteps: config.maxSteps ?? 10000,
      maxIllegalMoves: config.maxIllegalMoves ?? 10,
    };

    if (this.config.illegalMovePenalty > 0) {
      throw new Error('illegalMovePenalty must be <= 0');
    }
    if (!BoardEngine.isTileValue(this.config.winTile)) {
      throw new Error('winTile must be a power of two >= 2');
    }
    if (this.config.maxSteps < 1) {
      throw new Error('maxSteps must be >= 1');
    }
    if (this.config.maxIllegalMoves < 0) {
      throw new Error('maxIllegalMoves must be >= 0');
    }

    this.rng = new SeededRandom(this.config.seed);
    this.board = BoardEngine.createEmptyBoard();
  }

  /**
   * Start a new episode: empty board plus two spawned tiles, score 0.
   */
  reset(): Board {
    if (this.config.reseedOnReset) {
      this.rng.reseed(this.config.seed);
    }
    this.board = BoardEngine.initialBoard(this.rng);
    this.score = 0;
    this.terminal = BoardEngine.isTerminal(this.board);
    this.steps = 0;
    this.illegalMoves = 0;
    return this.observe();
  }

  /**
   * Apply an action.
   *
   * A move that would not change the board (including any move once the game
   * is over) leaves the state untouched and earns `illegalMovePenalty`.
   * Otherwise the move is applied, a tile spawns and the reward follows the
   * configured reward policy.
   */
  step(action: Move | number): StepResult {
    if (!BoardEngine.isMove(action)) {
      throw new Error(`Action must be an integer in [0, ${ALL_MOVES.length - 1}], got ${action}`);
    }

    this.steps++;
    const transition = this.terminal ? null : BoardEngine.applyMove(this.board, action);

    if (!transition || !transition.moved) {
      this.illegalMoves++;
      return {
        observation: this.observe(),
        reward: this.config.illegalMovePenalty,
        done: this.terminal,
        info: this.buildInfo(false),
      };
    }

    this.score += transition.scoreDelta;
    this.board = BoardEngine.spawnTile(transition.board, this.rng);
    this.terminal = BoardEngine.isTerminal(this.board);

    return {
      observation: this.observe(),
      reward: this.computeReward(transition),
      done: this.terminal,
      info: this.buildInfo(true),
    };
  }

  legalMoves(observation: Board): Move[] {
    return BoardEngine.legalMoves(observation);
  }

  /**
   * Install a position, e.g. to replay or test from a known board.
   */
  loadState(board: Board, score = 0): void {
    BoardEngine.validateBoard(board);
    if (!Number.isInteger(score) || score < 0) {
      throw new Error('score must be a non-negative integer');
    }
    this.board = BoardEngine.cloneBoard(board);
    this.score = score;
    this.terminal = BoardEngine.isTerminal(this.board);
    this.steps = 0;
    this.illegalMoves = 0;
  }

  getState(): GameState {
    return {
      board: this.observe(),
      score: this.score,
      terminal: this.terminal,
    };
  }

  getConfig(): EnvironmentConfig {
    return { ...this.config };
  }

  render(): string {
    let out = `Score: ${this.score}\n`;
    out += `Highest: ${BoardEngine.maxTile(this.board)}\n`;
    out += `${BoardEngine.formatBoard(this.board)}\n`;
    return out;
  }

  private observe(): Board {
    return BoardEngine.cloneBoard(this.board);
  }

  private computeReward(transition: TransitionResult): number {
    switch (this.config.rewardPolicy) {
      case 'score':
        return transition.scoreDelta;
      case 'log2':
        return transition.mergedValues.reduce((sum, v) => sum + Math.log2(v), 0);
      case 'merges':
        return transition.mergedValues.length;
    }
  }

  private buildInfo(isValid: boolean): StepInfo {
    const highest = BoardEngine.maxTile(this.board);
    return {
      score: this.score,
      highest,
      steps: this.steps,
      illegalMoves: this.illegalMoves,
      isValid,
      won: highest >= this.config.winTile,
      truncated:
        this.steps > this.config.maxSteps || this.illegalMoves > this.config.maxIllegalMoves,
    };
  }
}
