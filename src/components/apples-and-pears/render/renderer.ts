import type { GameState, Mark, Pos } from '../engine/types';
import { BOARD_SIZE } from '../engine/types';
import { APPLE, EMPTY, PEAR, findWinningLine } from '../engine/rules_ai';
import type { GameConfig } from '../config';

/* =========================================================
   Renderer
   - Draws onto any surface exposing the 2D-context calls below;
     CanvasRenderingContext2D satisfies it with TImage = HTMLImageElement.
   - Stateless: everything comes from GameState + config.
   ========================================================= */

export interface RenderSurface<TImage> {
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  lineCap: CanvasLineCap;
  font: string;
  fillRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  stroke(): void;
  fillText(text: string, x: number, y: number): void;
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void;
}

export type PieceImages<TImage> = {
  apple: TImage;
  pear: TImage;
};

export function pieceFor<TImage>(pieces: PieceImages<TImage>, mark: Mark): TImage {
  return mark === APPLE ? pieces.apple : pieces.pear;
}

export function statusText(state: GameState): string {
  switch (state.outcome) {
    case 'PLAYING':
      return state.turn === PEAR ? "Pear's turn" : "Apple's turn";
    case 'APPLE_WINS':
      return 'Apple wins! Click to play again';
    case 'PEAR_WINS':
      return 'Pear wins! Click to play again';
    case 'DRAW':
      return 'Draw! Click to play again';
  }
}

/** Top-left corner and side of a piece image inside cell (r, c). */
export function pieceRect(pos: Pos, cfg: GameConfig): { x: number; y: number; size: number } {
  const size = cfg.cellSize * cfg.pieceScale;
  const inset = (cfg.cellSize - size) / 2;
  return {
    x: pos.c * cfg.cellSize + inset,
    y: pos.r * cfg.cellSize + inset,
    size,
  };
}

function cellCenter(pos: Pos, cfg: GameConfig): { x: number; y: number } {
  return {
    x: pos.c * cfg.cellSize + cfg.cellSize / 2,
    y: pos.r * cfg.cellSize + cfg.cellSize / 2,
  };
}

function drawGrid<TImage>(surface: RenderSurface<TImage>, cfg: GameConfig) {
  surface.strokeStyle = cfg.colors.grid;
  surface.lineWidth = cfg.gridLineWidth;
  surface.lineCap = 'butt';

  for (let i = 1; i < BOARD_SIZE; i++) {
    const at = i * cfg.cellSize;

    // horizontal
    surface.beginPath();
    surface.moveTo(0, at);
    surface.lineTo(cfg.screenWidth, at);
    surface.stroke();

    // vertical
    surface.beginPath();
    surface.moveTo(at, 0);
    surface.lineTo(at, cfg.screenHeight);
    surface.stroke();
  }
}

function drawWinLine<TImage>(surface: RenderSurface<TImage>, line: Pos[], cfg: GameConfig) {
  const from = cellCenter(line[0], cfg);
  const to = cellCenter(line[line.length - 1], cfg);

  surface.strokeStyle = cfg.colors.winLine;
  surface.lineWidth = cfg.winLineWidth;
  surface.lineCap = 'round';
  surface.beginPath();
  surface.moveTo(from.x, from.y);
  surface.lineTo(to.x, to.y);
  surface.stroke();
}

/* =========================================================
   Public API
   ========================================================= */
export function drawBoard<TImage>(
  surface: RenderSurface<TImage>,
  state: GameState,
  pieces: PieceImages<TImage>,
  cfg: GameConfig
) {
  surface.fillStyle = cfg.colors.background;
  surface.fillRect(0, 0, cfg.screenWidth, cfg.screenHeight);

  drawGrid(surface, cfg);

  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = state.board[r][c];
      if (cell === EMPTY) continue;

      const { x, y, size } = pieceRect({ r, c }, cfg);
      surface.drawImage(pieceFor(pieces, cell), x, y, size, size);
    }
  }

  const winner: Mark | null =
    state.outcome === 'APPLE_WINS' ? APPLE : state.outcome === 'PEAR_WINS' ? PEAR : null;
  if (winner !== null) {
    const line = findWinningLine(state.board, winner);
    if (line) drawWinLine(surface, line, cfg);
  }

  surface.fillStyle = cfg.colors.text;
  surface.font = cfg.font;
  surface.fillText(statusText(state), cfg.statusX, cfg.screenHeight - cfg.statusBottomMargin);
}
