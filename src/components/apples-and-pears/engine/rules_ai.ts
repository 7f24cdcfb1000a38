import type { Board, Cell, GameOutcome, GameState, Mark, MoveResult, Pos } from './types';
import { BOARD_SIZE } from './types';
import type { Rng } from './rng';
import { pickIndex } from './rng';

export const EMPTY = 0 satisfies Cell;
export const APPLE: Mark = 1;
export const PEAR: Mark = 2;

export const CENTER: Pos = { r: 1, c: 1 };

export function otherMark(m: Mark): Mark {
  return m === APPLE ? PEAR : APPLE;
}

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, () => EMPTY)
  );
}

export function cloneBoard(board: Board): Board {
  return board.map(row => row.slice());
}

export function inBounds(r: number, c: number): boolean {
  return (
    Number.isInteger(r) &&
    Number.isInteger(c) &&
    r >= 0 &&
    r < BOARD_SIZE &&
    c >= 0 &&
    c < BOARD_SIZE
  );
}

/** Empty cells in row-major order. */
export function emptyCells(board: Board): Pos[] {
  const cells: Pos[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (board[r][c] === EMPTY) cells.push({ r, c });
    }
  }
  return cells;
}

// rows, columns, main diagonal, anti-diagonal
const LINES: Pos[][] = (() => {
  const lines: Pos[][] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    lines.push(Array.from({ length: BOARD_SIZE }, (_, c) => ({ r, c })));
  }
  for (let c = 0; c < BOARD_SIZE; c++) {
    lines.push(Array.from({ length: BOARD_SIZE }, (_, r) => ({ r, c })));
  }
  lines.push(Array.from({ length: BOARD_SIZE }, (_, i) => ({ r: i, c: i })));
  lines.push(Array.from({ length: BOARD_SIZE }, (_, i) => ({ r: i, c: BOARD_SIZE - 1 - i })));
  return lines;
})();

/**
 * First line fully owned by `mark`, for the win highlight.
 */
export function findWinningLine(board: Board, mark: Mark): Pos[] | null {
  for (const line of LINES) {
    if (line.every(({ r, c }) => board[r][c] === mark)) {
      return line.map(p => ({ ...p }));
    }
  }
  return null;
}

export function checkWin(board: Board, mark: Mark): boolean {
  return findWinningLine(board, mark) !== null;
}

/** Only meaningful once checkWin has come back false. */
export function checkDraw(board: Board): boolean {
  for (const row of board) {
    for (const cell of row) if (cell === EMPTY) return false;
  }
  return true;
}

export function winOutcome(mark: Mark): GameOutcome {
  return mark === APPLE ? 'APPLE_WINS' : 'PEAR_WINS';
}

export function isTerminal(outcome: GameOutcome): boolean {
  return outcome !== 'PLAYING';
}

export function createGameState(): GameState {
  return {
    board: createBoard(),
    turn: APPLE,
    outcome: 'PLAYING',
    aiDelay: 0,
    lastMove: null,
  };
}

export function resetGame(state: GameState): void {
  for (const row of state.board) row.fill(EMPTY);
  state.turn = APPLE;
  state.outcome = 'PLAYING';
  state.aiDelay = 0;
  state.lastMove = null;
}

/**
 * Mutates state in-place. A rejected move leaves every field untouched; the frame
 * loop drops rejections, since stray clicks are routine.
 */
export function applyMove(state: GameState, row: number, col: number, mark: Mark): MoveResult {
  if (!inBounds(row, col)) return { ok: false, reason: 'OUT_OF_BOUNDS' };
  if (state.outcome !== 'PLAYING') return { ok: false, reason: 'GAME_OVER' };
  if (mark !== state.turn) return { ok: false, reason: 'NOT_YOUR_TURN' };
  if (state.board[row][col] !== EMPTY) return { ok: false, reason: 'OCCUPIED' };

  state.board[row][col] = mark;
  state.lastMove = { r: row, c: col };

  if (checkWin(state.board, mark)) {
    state.outcome = winOutcome(mark);
  } else if (checkDraw(state.board)) {
    state.outcome = 'DRAW';
  } else {
    state.turn = otherMark(mark);
  }

  return { ok: true, pos: { r: row, c: col } };
}

/* =========================
   AI: greedy, one ply
   ========================= */

/**
 * Picks the bot's cell: a winning cell if one exists (first in row-major order),
 * otherwise the center, otherwise a uniformly random empty cell.
 *
 * It never blocks the opponent. Returns null only for a full board.
 */
export function selectAIMove(board: Board, aiMark: Mark, rng: Rng): Pos | null {
  const open = emptyCells(board);
  if (open.length === 0) return null;

  for (const pos of open) {
    const b2 = cloneBoard(board);
    b2[pos.r][pos.c] = aiMark;
    if (checkWin(b2, aiMark)) return pos;
  }

  if (board[CENTER.r][CENTER.c] === EMPTY) return { ...CENTER };

  return open[pickIndex(rng, open.length)];
}
