import { BOARD_SIZE } from './engine/types';

/* ================= CONFIG ================= */

export type GameConfig = {
  title: string;
  screenWidth: number;
  screenHeight: number;
  /** Derived: screenWidth / BOARD_SIZE. */
  cellSize: number;
  /** Piece images are drawn at this fraction of a cell, centered. */
  pieceScale: number;
  /** Frames between the player's move and the bot's reply. */
  aiDelayFrames: number;
  colors: {
    background: string;
    grid: string;
    text: string;
    winLine: string;
  };
  gridLineWidth: number;
  winLineWidth: number;
  font: string;
  statusX: number;
  statusBottomMargin: number;
};

const SCREEN = 600;

export const DEFAULT_CONFIG: Readonly<GameConfig> = Object.freeze({
  title: 'Apples and Pears',
  screenWidth: SCREEN,
  screenHeight: SCREEN,
  cellSize: SCREEN / BOARD_SIZE,
  pieceScale: 0.8,
  aiDelayFrames: 30, // ~half a second at 60fps
  colors: Object.freeze({
    background: 'rgb(240, 240, 240)',
    grid: 'rgb(50, 50, 50)',
    text: '#000000',
    winLine: 'rgba(220, 50, 50, 0.55)',
  }),
  gridLineWidth: 1,
  winLineWidth: 8,
  font: '13px monospace',
  statusX: 10,
  statusBottomMargin: 10,
});

export type GameConfigOverrides = Partial<Omit<GameConfig, 'cellSize' | 'colors'>> & {
  colors?: Partial<GameConfig['colors']>;
};

export function createConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const screenWidth = overrides.screenWidth ?? DEFAULT_CONFIG.screenWidth;
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    screenWidth,
    cellSize: screenWidth / BOARD_SIZE,
    colors: { ...DEFAULT_CONFIG.colors, ...overrides.colors },
  };
}
