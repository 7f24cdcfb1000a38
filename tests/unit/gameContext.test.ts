import { BOT, GameContext, HUMAN } from '../../src/components/apples-and-pears/gameContext';
import { APPLE, EMPTY, PEAR, createBoard } from '../../src/components/apples-and-pears/engine/rules_ai';
import { createConfig } from '../../src/components/apples-and-pears/config';
import type { FrameInput } from '../../src/components/apples-and-pears/engine/types';
import { RecordingSurface } from '../helpers/recordingSurface';

const PIECES = { apple: 'apple', pear: 'pear' };

const idle: FrameInput = { cursorX: 0, cursorY: 0, justPressed: false };

/** A click in the middle of cell (r, c) on the default 200px grid. */
function clickCell(r: number, c: number): FrameInput {
  return { cursorX: c * 200 + 100, cursorY: r * 200 + 100, justPressed: true };
}

function tick(game: GameContext<string>, frames: number) {
  for (let i = 0; i < frames; i++) game.update(idle);
}

describe('GameContext', () => {
  it('plays Apple for the human and Pear for the bot', () => {
    expect(HUMAN).toBe(APPLE);
    expect(BOT).toBe(PEAR);
  });

  it('maps a click to the cell under the cursor', () => {
    const game = new GameContext(PIECES, { rng: () => 0 });
    game.update({ cursorX: 599, cursorY: 250, justPressed: true });

    expect(game.snapshot.board[1][2]).toBe(APPLE);
    expect(game.snapshot.turn).toBe(PEAR);
  });

  it('ignores pointer movement without a press', () => {
    const game = new GameContext(PIECES, { rng: () => 0 });
    game.update({ cursorX: 300, cursorY: 300, justPressed: false });

    expect(game.snapshot.board).toEqual(createBoard());
    expect(game.snapshot.turn).toBe(APPLE);
  });

  it('drops clicks outside the grid and on taken cells', () => {
    const game = new GameContext(PIECES, { rng: () => 0, config: createConfig({ aiDelayFrames: 0 }) });

    game.update({ cursorX: -5, cursorY: 100, justPressed: true });
    game.update({ cursorX: 100, cursorY: 600, justPressed: true });
    expect(game.snapshot.board).toEqual(createBoard());
    expect(game.snapshot.turn).toBe(APPLE);

    game.update(clickCell(1, 1));
    game.update(idle); // bot: no win, center taken -> first empty cell (0,0)
    expect(game.snapshot.board[0][0]).toBe(PEAR);

    game.update(clickCell(0, 0));
    expect(game.snapshot.board[0][0]).toBe(PEAR);
    expect(game.snapshot.turn).toBe(APPLE);
  });

  it('waits 30 frames before the bot replies', () => {
    const game = new GameContext(PIECES, { rng: () => 0 });

    game.update(clickCell(1, 1));
    expect(game.snapshot.aiDelay).toBe(30);

    tick(game, 30);
    expect(game.snapshot.aiDelay).toBe(0);
    expect(game.snapshot.turn).toBe(PEAR);
    expect(game.snapshot.board.flat().filter(c => c === PEAR)).toHaveLength(0);

    tick(game, 1);
    expect(game.snapshot.board[0][0]).toBe(PEAR);
    expect(game.snapshot.turn).toBe(APPLE);
  });

  it('ignores clicks while the bot is thinking', () => {
    const game = new GameContext(PIECES, { rng: () => 0, config: createConfig({ aiDelayFrames: 3 }) });

    game.update(clickCell(1, 1));
    game.update(clickCell(2, 2));

    expect(game.snapshot.board[2][2]).toBe(EMPTY);
    expect(game.snapshot.aiDelay).toBe(2);
  });

  it('declares Apple the winner on its third move, before the bot moves again', () => {
    const onOutcome = jest.fn();
    // fallback picks index 1 of 6 empty cells after Apple's second move: (1,0)
    const game = new GameContext(PIECES, {
      rng: () => 0.2,
      config: createConfig({ aiDelayFrames: 0 }),
      onOutcome,
    });

    game.update(clickCell(0, 0));
    game.update(idle); // Pear takes the center
    expect(game.snapshot.board[1][1]).toBe(PEAR);

    game.update(clickCell(0, 1));
    game.update(idle);
    expect(game.snapshot.board[1][0]).toBe(PEAR);

    game.update(clickCell(0, 2));
    expect(game.snapshot.outcome).toBe('APPLE_WINS');
    expect(onOutcome).toHaveBeenCalledTimes(1);
    expect(onOutcome).toHaveBeenCalledWith('APPLE_WINS');

    tick(game, 5);
    expect(game.snapshot.board).toEqual([
      [APPLE, APPLE, APPLE],
      [PEAR, PEAR, EMPTY],
      [EMPTY, EMPTY, EMPTY],
    ]);
    expect(onOutcome).toHaveBeenCalledTimes(1);
  });

  it('lets the bot take a winning cell and report it', () => {
    const onOutcome = jest.fn();
    const game = new GameContext(PIECES, {
      rng: () => 0,
      config: createConfig({ aiDelayFrames: 0 }),
      onOutcome,
    });

    game.update(clickCell(0, 0));
    game.update(idle); // center
    game.update(clickCell(2, 2));
    game.update(idle); // no win, center taken: first empty cell (0,1)
    expect(game.snapshot.board[0][1]).toBe(PEAR);

    game.update(clickCell(0, 2));
    game.update(idle); // (2,1) completes column 1

    expect(game.snapshot.board[2][1]).toBe(PEAR);
    expect(game.snapshot.outcome).toBe('PEAR_WINS');
    expect(onOutcome).toHaveBeenCalledTimes(1);
    expect(onOutcome).toHaveBeenCalledWith('PEAR_WINS');
  });

  it('restarts on a click once the game is over', () => {
    const game = new GameContext(PIECES, { rng: () => 0.2, config: createConfig({ aiDelayFrames: 0 }) });
    for (const [r, c] of [[0, 0], [0, 1], [0, 2]] as const) {
      game.update(clickCell(r, c));
      game.update(idle);
    }
    expect(game.snapshot.outcome).toBe('APPLE_WINS');

    game.update(idle);
    expect(game.snapshot.outcome).toBe('APPLE_WINS');

    game.update(clickCell(2, 2));
    expect(game.snapshot.outcome).toBe('PLAYING');
    expect(game.snapshot.board).toEqual(createBoard());
    expect(game.snapshot.turn).toBe(APPLE);
    expect(game.snapshot.aiDelay).toBe(0);
  });

  it('reset() clears a game in progress, including a pending bot delay', () => {
    const game = new GameContext(PIECES, { rng: () => 0 });
    game.update(clickCell(0, 0));
    expect(game.snapshot.aiDelay).toBe(30);

    game.reset();

    expect(game.snapshot.board).toEqual(createBoard());
    expect(game.snapshot.turn).toBe(APPLE);
    expect(game.snapshot.aiDelay).toBe(0);
  });

  it('replays the same bot choices for the same seed', () => {
    const playOut = (seed: number) => {
      const game = new GameContext(PIECES, { seed, config: createConfig({ aiDelayFrames: 0 }) });
      for (const [r, c] of [[1, 1], [0, 0], [2, 2]] as const) {
        game.update(clickCell(r, c));
        game.update(idle);
      }
      return game.snapshot.board.map(row => row.slice());
    };

    expect(playOut(7)).toEqual(playOut(7));
  });

  it('draws through the renderer with its own pieces and config', () => {
    const game = new GameContext(PIECES, { rng: () => 0 });
    game.update(clickCell(1, 1));

    const surface = new RecordingSurface();
    game.draw(surface);

    expect(surface.calls).toContain('drawImage apple 220 220 160 160');
    expect(surface.calls[surface.calls.length - 1]).toBe(
      "fillText Pear's turn 10 590 #000000 13px monospace"
    );
  });
});
