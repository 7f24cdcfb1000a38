/**
 * Error types for the game.
 *
 * Only two things can go wrong in a session:
 * - a piece image fails to decode at startup (fatal, `AssetLoadError`);
 * - the bot has no legal cell, or its cell is refused, while the game is still
 *   running (`InvalidStateError`, a bug).
 *
 * Rejected clicks are not errors: `applyMove` reports them through `MoveResult`
 * and the frame loop drops them.
 */

export enum GameErrorCode {
  ASSET_DECODE_FAILED = 'ASSET_DECODE_FAILED',
  STATE_NO_EMPTY_CELL = 'STATE_NO_EMPTY_CELL',
  STATE_BOT_MOVE_REJECTED = 'STATE_BOT_MOVE_REJECTED',
}

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, GameError.prototype);
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export class AssetLoadError extends GameError {
  constructor(piece: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      GameErrorCode.ASSET_DECODE_FAILED,
      `Failed to decode ${piece} image from ${url}: ${reason}`,
      { piece, url, reason }
    );
    this.name = 'AssetLoadError';
    Object.setPrototypeOf(this, AssetLoadError.prototype);
  }
}

export class InvalidStateError extends GameError {
  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context);
    this.name = 'InvalidStateError';
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
