import type { FrameInput, GameOutcome, GameState, Mark } from './engine/types';
import {
  APPLE,
  PEAR,
  applyMove,
  createGameState,
  isTerminal,
  resetGame,
  selectAIMove,
} from './engine/rules_ai';
import type { Rng } from './engine/rng';
import { createRng } from './engine/rng';
import type { GameConfig } from './config';
import { DEFAULT_CONFIG } from './config';
import { GameErrorCode, InvalidStateError } from './errors';
import type { PieceImages, RenderSurface } from './render/renderer';
import { drawBoard } from './render/renderer';

export const HUMAN: Mark = APPLE;
export const BOT: Mark = PEAR;

export type GameContextOptions = {
  /** Seed for the bot's random fallback; defaults to the startup time. */
  seed?: number;
  /** Overrides `seed` when given. */
  rng?: Rng;
  config?: GameConfig;
  /** Called once each time the game reaches a win or a draw. */
  onOutcome?: (outcome: GameOutcome) => void;
};

/**
 * The one long-lived object of a play session: game state, bot RNG, decoded piece
 * images and config. The frame loop calls `update` then `draw` once per frame.
 */
export class GameContext<TImage> {
  readonly config: GameConfig;
  private readonly state: GameState = createGameState();
  private readonly rng: Rng;
  private readonly pieces: PieceImages<TImage>;
  private readonly onOutcome?: (outcome: GameOutcome) => void;

  constructor(pieces: PieceImages<TImage>, options: GameContextOptions = {}) {
    this.pieces = pieces;
    this.config = options.config ?? { ...DEFAULT_CONFIG };
    this.rng = options.rng ?? createRng(options.seed ?? Date.now());
    this.onOutcome = options.onOutcome;
  }

  get snapshot(): Readonly<GameState> {
    return this.state;
  }

  reset(): void {
    resetGame(this.state);
  }

  update(input: FrameInput): void {
    if (isTerminal(this.state.outcome)) {
      if (input.justPressed) this.reset();
      return;
    }

    if (this.state.turn === HUMAN) {
      this.updateHuman(input);
    } else {
      this.updateBot();
    }
  }

  draw(surface: RenderSurface<TImage>): void {
    drawBoard(surface, this.state, this.pieces, this.config);
  }

  private updateHuman(input: FrameInput) {
    if (!input.justPressed) return;

    const { cellSize } = this.config;
    const row = Math.floor(input.cursorY / cellSize);
    const col = Math.floor(input.cursorX / cellSize);

    // stray clicks (outside the grid, on a taken cell) are dropped
    const res = applyMove(this.state, row, col, HUMAN);
    if (!res.ok) return;

    if (this.state.outcome === 'PLAYING') {
      this.state.aiDelay = this.config.aiDelayFrames;
    } else {
      this.onOutcome?.(this.state.outcome);
    }
  }

  private updateBot() {
    if (this.state.aiDelay > 0) {
      this.state.aiDelay--;
      return;
    }

    const pos = selectAIMove(this.state.board, BOT, this.rng);
    if (!pos) {
      throw new InvalidStateError(
        GameErrorCode.STATE_NO_EMPTY_CELL,
        'Bot asked to move on a full board',
        { outcome: this.state.outcome }
      );
    }

    const res = applyMove(this.state, pos.r, pos.c, BOT);
    if (!res.ok) {
      throw new InvalidStateError(
        GameErrorCode.STATE_BOT_MOVE_REJECTED,
        `Bot move (${pos.r}, ${pos.c}) was rejected: ${res.reason}`,
        { pos, reason: res.reason }
      );
    }

    if (isTerminal(this.state.outcome)) this.onOutcome?.(this.state.outcome);
  }
}
