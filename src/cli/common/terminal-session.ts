/**
 * Full-screen host for a MapPreview on a TTY: raw-mode keys, resize events,
 * spinner ticks and redraws.
 */

import { emitKeypressEvents } from 'readline';
import type { MapPreview } from '../../preview/map-preview.js';
import { normalizeKeypress, type Keypress } from '../../preview/keymap.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[H\x1b[2J';
/** Deletes kitty graphics placements left by the previous frame. */
const KITTY_DELETE_ALL = '\x1b_Ga=d\x1b\\';

const TICK_INTERVAL_MS = 120;

export type TerminalIo = {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
};

/** Raw mode turns off output post-processing, so each newline needs its CR. */
export function toRawModeText(text: string): string {
  return text.replace(/\r?\n/g, '\r\n');
}

export function createRedraw(preview: MapPreview, write: (chunk: string) => void): () => void {
  let lastView: string | undefined;
  return () => {
    const view = preview.view();
    if (view === lastView) return;
    lastView = view;
    const clearGraphics = preview.protocol === 'native' ? KITTY_DELETE_ALL : '';
    write(clearGraphics + CLEAR_SCREEN + toRawModeText(view));
  };
}

/** A resize re-lays out the frame and re-probes the terminal's graphics. */
export function postResize(preview: MapPreview, width: number, height: number): void {
  preview.post({ type: 'resize', width, height });
  preview.post({ type: 'redetect' });
}

/**
 * Attach the preview to the terminal and run its dispatch loop until it
 * closes. The terminal is restored even when the loop throws.
 */
export async function runTerminalSession(preview: MapPreview, io: TerminalIo): Promise<void> {
  const { stdin, stdout } = io;
  const write = (chunk: string) => {
    stdout.write(chunk);
  };
  const redraw = createRedraw(preview, write);
  const unregister = preview.registerUpdateListener(redraw);

  const onKeypress = (str: string | undefined, key?: Keypress) => {
    preview.post({ type: 'key', key: normalizeKeypress(str, key) });
  };
  const onResize = () => {
    postResize(preview, stdout.columns, stdout.rows);
  };

  emitKeypressEvents(stdin);
  const wasRaw = stdin.isTTY ? stdin.isRaw : false;
  if (stdin.isTTY) stdin.setRawMode(true);
  stdin.on('keypress', onKeypress);
  stdin.resume();
  stdout.on('resize', onResize);

  const ticker = setInterval(() => {
    preview.post({ type: 'tick' });
  }, TICK_INTERVAL_MS);
  ticker.unref();

  write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  redraw();

  try {
    await preview.run();
  } finally {
    clearInterval(ticker);
    unregister();
    stdin.off('keypress', onKeypress);
    stdout.off('resize', onResize);
    if (stdin.isTTY) stdin.setRawMode(wasRaw);
    stdin.pause();
    write((preview.protocol === 'native' ? KITTY_DELETE_ALL : '') + SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }
}
