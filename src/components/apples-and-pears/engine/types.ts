export const BOARD_SIZE = 3 as const;

export type Cell = 0 | 1 | 2; // 0 EMPTY, 1 APPLE, 2 PEAR
export type Mark = Exclude<Cell, 0>; // 1 | 2

export type Board = Cell[][];

export type Pos = { r: number; c: number };

export type GameOutcome = 'PLAYING' | 'APPLE_WINS' | 'PEAR_WINS' | 'DRAW';

export type MoveRejection = 'OUT_OF_BOUNDS' | 'OCCUPIED' | 'GAME_OVER' | 'NOT_YOUR_TURN';

export type MoveResult =
  | { ok: true; pos: Pos }
  | { ok: false; reason: MoveRejection };

export type GameState = {
  board: Board;
  turn: Mark;
  outcome: GameOutcome;
  aiDelay: number; // frames left before the bot plays; cosmetic only
  lastMove: Pos | null;
};

/** One sample of the pointer, taken once per frame in logical canvas pixels. */
export type FrameInput = {
  cursorX: number;
  cursorY: number;
  justPressed: boolean;
};
