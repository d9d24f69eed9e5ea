/**
 * 2048 Board Engine - Core Game Logic
 *
 * Pure board mechanics:
 * - Sliding and merging in the four directions
 * - Tile spawning through an injected RandomSource
 * - Terminal detection and legal move generation
 *
 * All methods are pure functions: Board -> Board (or similar).
 * Input boards are never mutated. Malformed boards are rejected with an Error.
 */

import {
  ALL_MOVES,
  BOARD_SIZE,
  Board,
  Cell,
  Move,
  MutableBoard,
  RandomSource,
  SPAWN_TWO_PROBABILITY,
  TransitionResult,
} from './types.js';
import { pickOne } from './random.js';

interface LineResult {
  line: number[];
  scoreDelta: number;
  mergedValues: number[];
}

export class BoardEngine {
  // ==========================================================================
  // CONSTRUCTION & VALIDATION
  // ==========================================================================

  static createEmptyBoard(): MutableBoard {
    return Array.from({ length: BOARD_SIZE }, () => new Array<number>(BOARD_SIZE).fill(0));
  }

  static cloneBoard(board: Board): MutableBoard {
    return board.map(row => [...row]);
  }

  /**
   * Check the board is 4x4 and every cell is 0 or a power of two >= 2.
   * Throws on the first violation found.
   */
  static validateBoard(board: Board): void {
    if (!Array.isArray(board) || board.length !== BOARD_SIZE) {
      throw new Error(`Board must have ${BOARD_SIZE} rows`);
    }
    for (let r = 0; r < BOARD_SIZE; r++) {
      const row = board[r];
      if (!Array.isArray(row) || row.length !== BOARD_SIZE) {
        throw new Error(`Board row ${r} must have ${BOARD_SIZE} cells`);
      }
      for (let c = 0; c < BOARD_SIZE; c++) {
        const value = row[c];
        if (value !== 0 && !BoardEngine.isTileValue(value)) {
          throw new Error(`Invalid cell value ${String(value)} at (${r}, ${c})`);
        }
      }
    }
  }

  static isTileValue(value: number): boolean {
    return Number.isInteger(value) && value >= 2 && Number.isInteger(Math.log2(value));
  }

  static isMove(value: unknown): value is Move {
    return typeof value === 'number' && ALL_MOVES.some(move => move === value);
  }

  // ==========================================================================
  // TRANSITIONS
  // ==========================================================================

  /**
   * Slide the board in one direction.
   *
   * Each row/column is read so that the move points toward index 0, compacted,
   * merged from the leading edge (each tile merges at most once), and compacted
   * again. No tile is spawned.
   */
  static applyMove(board: Board, move: Move): TransitionResult {
    BoardEngine.validateBoard(board);
    if (!BoardEngine.isMove(move)) {
      throw new Error(`Unknown move: ${String(move)}`);
    }
    return BoardEngine.slide(board, move);
  }

  /**
   * Place a 2 (p = 0.9) or 4 (p = 0.1) on a uniformly chosen empty cell.
   * The first draw picks the cell, the second the value. A full board is
   * returned as is.
   */
  static spawnTile(board: Board, rng: RandomSource): Board {
    BoardEngine.validateBoard(board);
    const empties = BoardEngine.emptyCells(board);
    if (empties.length === 0) return board;

    const { row, col } = pickOne(empties, rng);
    const value = rng.next() < SPAWN_TWO_PROBABILITY ? 2 : 4;

    const next = BoardEngine.cloneBoard(board);
    next[row][col] = value;
    return next;
  }

  /**
   * Empty board with two spawned tiles.
   */
  static initialBoard(rng: RandomSource): Board {
    let board: Board = BoardEngine.createEmptyBoard();
    board = BoardEngine.spawnTile(board, rng);
    board = BoardEngine.spawnTile(board, rng);
    return board;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * True when the board is full and no two orthogonal neighbours are equal.
   */
  static isTerminal(board: Board): boolean {
    BoardEngine.validateBoard(board);
    for (let r = 0; r < BOARD_SIZE; r++) {
      for (let c = 0; c < BOARD_SIZE; c++) {
        const value = board[r][c];
        if (value === 0) return false;
        if (c + 1 < BOARD_SIZE && board[r][c + 1] === value) return false;
        if (r + 1 < BOARD_SIZE && board[r + 1][c] === value) return false;
      }
    }
    return true;
  }

  /**
   * Moves that change the board, in action-index order.
   */
  static legalMoves(board: Board): Move[] {
    BoardEngine.validateBoard(board);
    return ALL_MOVES.filter(move => BoardEngine.slide(board, move).moved);
  }

  static emptyCells(board: Board): Cell[] {
    const cells: Cell[] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        if (board[row][col] === 0) cells.push({ row, col });
      }
    }
    return cells;
  }

  static maxTile(board: Board): number {
    let max = 0;
    for (const row of board) {
      for (const value of row) {
        if (value > max) max = value;
      }
    }
    return max;
  }

  static hasTile(board: Board, value: number): boolean {
    return board.some(row => row.includes(value));
  }

  static boardsEqual(a: Board, b: Board): boolean {
    for (let r = 0; r < BOARD_SIZE; r++) {
      for (let c = 0; c < BOARD_SIZE; c++) {
        if (a[r][c] !== b[r][c]) return false;
      }
    }
    return true;
  }

  /**
   * Text grid with right-aligned values and '.' for empty cells.
   */
  static formatBoard(board: Board): string {
    const width = Math.max(1, ...board.flatMap(row => row.map(v => String(v).length)));
    return board
      .map(row => row.map(v => (v === 0 ? '.' : String(v)).padStart(width)).join(' '))
      .join('\n');
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  /** Unchecked slide; callers validate first. */
  private static slide(board: Board, move: Move): TransitionResult {
    const next = BoardEngine.createEmptyBoard();
    let scoreDelta = 0;
    let moved = false;
    const mergedValues: number[] = [];

    for (let i = 0; i < BOARD_SIZE; i++) {
      const line: number[] = [];
      for (let j = 0; j < BOARD_SIZE; j++) {
        const { row, col } = BoardEngine.lineCell(move, i, j);
        line.push(board[row][col]);
      }

      const result = BoardEngine.mergeLine(line);
      scoreDelta += result.scoreDelta;
      mergedValues.push(...result.mergedValues);

      for (let j = 0; j < BOARD_SIZE; j++) {
        const { row, col } = BoardEngine.lineCell(move, i, j);
        next[row][col] = result.line[j];
        if (result.line[j] !== board[row][col]) moved = true;
      }
    }

    return { board: next, scoreDelta, moved, mergedValues };
  }

  /**
   * Board coordinates of position `j` of line `i`, where position 0 is the
   * edge the move slides toward.
   */
  private static lineCell(move: Move, i: number, j: number): Cell {
    switch (move) {
      case Move.Left:
        return { row: i, col: j };
      case Move.Right:
        return { row: i, col: BOARD_SIZE - 1 - j };
      case Move.Up:
        return { row: j, col: i };
      case Move.Down:
        return { row: BOARD_SIZE - 1 - j, col: i };
    }
  }

  /** Compact, merge from index 0, compact. */
  private static mergeLine(line: readonly number[]): LineResult {
    const tiles = line.filter(v => v !== 0);
    const out: number[] = [];
    const mergedValues: number[] = [];
    let scoreDelta = 0;

    for (let k = 0; k < tiles.length; k++) {
      if (k + 1 < tiles.length && tiles[k] === tiles[k + 1]) {
        const merged = tiles[k] * 2;
        out.push(merged);
        mergedValues.push(merged);
        scoreDelta += merged;
        k++;
      } else {
        out.push(tiles[k]);
      }
    }

    while (out.length < BOARD_SIZE) out.push(0);
    return { line: out, scoreDelta, mergedValues };
  }
}
