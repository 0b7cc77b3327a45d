import terminalKit from 'terminal-kit';
import type { TaskStore } from '../store/task-store.js';
import { buildFrame } from './frame.js';
import { createAppState, type ViewMode } from './modes.js';
import { paintFrame } from './render.js';
import { applyKey } from './session.js';
import { setCursorVisible, type Term } from './term-cursor.js';

export type ExitReason = 'quit' | 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export interface TuiOptions {
  store: TaskStore;
  view: ViewMode;
  colorsDisabled: boolean;
  /** Shown on the message line until the first key. */
  message?: string | null;
}

const EXIT_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

/**
 * Hold the terminal in fullscreen raw mode for the duration of `body`, and
 * give it back on every exit path.
 */
async function withTerminal<T>(term: Term, body: () => Promise<T>): Promise<T> {
  term.fullscreen(true);
  term.grabInput(true);
  try {
    return await body();
  } finally {
    term.grabInput(false);
    term.fullscreen(false);
    setCursorVisible(term, true);
    term.styleReset();
  }
}

/**
 * Run the session loop until the user quits or a termination signal arrives,
 * then write the list one last time.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<ExitReason> {
  const term: Term = terminalKit.terminal;
  const state = createAppState(options.store, { view: options.view, message: options.message ?? null });

  let resolveExit: (reason: ExitReason) => void = () => undefined;
  const exitPromise = new Promise<ExitReason>((resolve) => {
    resolveExit = resolve;
  });

  function draw(): void {
    const frame = buildFrame(state, {
      width: process.stdout.columns || term.width,
      height: process.stdout.rows || term.height,
    });
    state.scroll = frame.scroll;
    paintFrame(term, frame, { colorsDisabled: options.colorsDisabled });
  }

  const onKey = (name: string): void => {
    try {
      const outcome = applyKey(state, name);
      if (outcome.kind === 'quit') {
        resolveExit('quit');
        return;
      }
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      state.message = `Error: ${msg}`;
    }
    draw();
  };

  const onResize = (): void => {
    draw();
  };

  const signalHandlers = EXIT_SIGNALS.map((signal) => {
    const handler = (): void => resolveExit(signal);
    process.once(signal, handler);
    return { signal, handler };
  });

  const reason = await withTerminal(term, async () => {
    process.stdout.on('resize', onResize);
    term.on('key', onKey);
    try {
      draw();
      return await exitPromise;
    } finally {
      term.removeListener('key', onKey);
      process.stdout.removeListener('resize', onResize);
      for (const { signal, handler } of signalHandlers) {
        process.removeListener(signal, handler);
      }
    }
  });

  state.store.save();
  return reason;
}
