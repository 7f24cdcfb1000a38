import { useCallback, useEffect, useRef, useState } from 'react';
import { useNavigate } from 'react-router-dom';
import confetti from 'canvas-confetti';
import { Home, RefreshCw, XCircle } from 'lucide-react';
import './ApplesAndPearsGame.css';
import appleUrl from './assets/apple.svg';
import pearUrl from './assets/pear.svg';
import type { FrameInput, GameOutcome } from './engine/types';
import { DEFAULT_CONFIG } from './config';
import { GameContext } from './gameContext';
import { isGameError } from './errors';
import { decodeImage, loadPieceImages } from './render/assets';
import { statusText } from './render/renderer';

type Phase = 'LOADING' | 'READY' | 'FATAL';

/* ================= COMPONENT ================= */

export default function ApplesAndPearsGame() {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const rafRef = useRef<number | null>(null);
  const gameRef = useRef<GameContext<HTMLImageElement> | null>(null);
  const inputRef = useRef<FrameInput>({ cursorX: -1, cursorY: -1, justPressed: false });
  const navigate = useNavigate();

  const [phase, setPhase] = useState<Phase>('LOADING');
  const [fatalMessage, setFatalMessage] = useState<string | null>(null);
  const [status, setStatus] = useState('');

  const fail = useCallback((message: string, err: unknown) => {
    console.error(message, isGameError(err) ? err.toJSON() : err);
    setFatalMessage(err instanceof Error ? err.message : String(err));
    setPhase('FATAL');
  }, []);

  const celebrate = useCallback((outcome: GameOutcome) => {
    console.info(`apples-and-pears: game over (${outcome})`);
    if (outcome !== 'APPLE_WINS') return;
    void confetti({
      particleCount: 90,
      spread: 74,
      startVelocity: 34,
      origin: { y: 0.6 },
      colors: ['#dc3232', '#3c9a3c', '#b9c93a'],
    });
  }, []);

  useEffect(() => {
    const previous = document.title;
    document.title = DEFAULT_CONFIG.title;
    return () => {
      document.title = previous;
    };
  }, []);

  /* ================= ASSETS (fatal on failure) ================= */

  useEffect(() => {
    let cancelled = false;

    const load = async () => {
      try {
        const pieces = await loadPieceImages({ apple: appleUrl, pear: pearUrl }, decodeImage);
        if (cancelled) return;
        gameRef.current = new GameContext(pieces, { onOutcome: celebrate });
        setPhase('READY');
      } catch (err) {
        if (cancelled) return;
        fail('Failed to load piece images.', err);
      }
    };

    void load();

    return () => {
      cancelled = true;
    };
  }, [celebrate, fail]);

  /* ================= GAME LOOP ================= */

  useEffect(() => {
    if (phase !== 'READY') return;

    const canvas = canvasRef.current;
    const game = gameRef.current;
    if (!canvas || !game) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const { screenWidth: w, screenHeight: h } = game.config;

    /* HiDPI */
    const dpr = Math.max(1, Math.floor(window.devicePixelRatio || 1));
    canvas.width = w * dpr;
    canvas.height = h * dpr;
    canvas.style.width = `${w}px`;
    canvas.style.height = `${h}px`;
    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);

    const input = inputRef.current;

    // CSS may shrink the canvas on small screens; map back to logical pixels.
    const track = (e: PointerEvent) => {
      const rect = canvas.getBoundingClientRect();
      input.cursorX = ((e.clientX - rect.left) * w) / (rect.width || w);
      input.cursorY = ((e.clientY - rect.top) * h) / (rect.height || h);
    };

    const onPointerMove = (e: PointerEvent) => track(e);

    const onPointerDown = (e: PointerEvent) => {
      if (e.button !== 0) return;
      track(e);
      input.justPressed = true;
    };

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') navigate('/');
      if (e.key.toLowerCase() === 'r' && !e.ctrlKey && !e.metaKey) {
        game.reset();
      }
    };

    const step = () => {
      try {
        game.update(input);
        input.justPressed = false;
        game.draw(ctx);
      } catch (err) {
        fail('apples-and-pears frame failed:', err);
        return;
      }
      setStatus(statusText(game.snapshot));
      rafRef.current = requestAnimationFrame(step);
    };

    canvas.addEventListener('pointermove', onPointerMove);
    canvas.addEventListener('pointerdown', onPointerDown);
    window.addEventListener('keydown', onKeyDown);

    rafRef.current = requestAnimationFrame(step);

    return () => {
      if (rafRef.current) cancelAnimationFrame(rafRef.current);
      canvas.removeEventListener('pointermove', onPointerMove);
      canvas.removeEventListener('pointerdown', onPointerDown);
      window.removeEventListener('keydown', onKeyDown);
    };
  }, [phase, navigate, fail]);

  /* ================= UI ================= */

  if (phase === 'FATAL') {
    return (
      <main className="aap aap--fatal" role="alert">
        <XCircle size={36} />
        <h2>The board could not be drawn</h2>
        <p>{fatalMessage}</p>
        <button type="button" onClick={() => navigate('/')}>
          <Home size={16} /> Back home
        </button>
      </main>
    );
  }

  return (
    <main className="aap">
      <header className="aap__header">
        <h1>{DEFAULT_CONFIG.title}</h1>
        <div className="aap__controls">
          <button type="button" onClick={() => navigate('/')} title="Home (Esc)">
            <Home size={16} />
          </button>
          <button
            type="button"
            onClick={() => gameRef.current?.reset()}
            disabled={phase !== 'READY'}
            title="New game (R)"
          >
            <RefreshCw size={16} />
          </button>
        </div>
      </header>

      {phase === 'LOADING' && <p className="aap__loading">Loading pieces…</p>}

      <canvas
        ref={canvasRef}
        className="aap__canvas"
        width={DEFAULT_CONFIG.screenWidth}
        height={DEFAULT_CONFIG.screenHeight}
        aria-label="Apples and Pears board"
      />

      <p className="aap__sr-status" aria-live="polite">
        {status}
      </p>
    </main>
  );
}
