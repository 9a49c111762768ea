/**
 * Key bindings for the map preview.
 */

export type PreviewAction =
  | 'close'
  | 'zoom-in'
  | 'zoom-out'
  | 'pan-up'
  | 'pan-down'
  | 'pan-left'
  | 'pan-right'
  | 'refresh'
  | 'next-style'
  | 'prev-style';

export type KeyBinding = {
  keys: readonly string[];
  help: string;
};

export const PREVIEW_KEYMAP: Readonly<Record<PreviewAction, KeyBinding>> = {
  'close': { keys: ['esc', 'q', 'ctrl+c'], help: 'close' },
  'zoom-in': { keys: ['+', '='], help: 'zoom in' },
  'zoom-out': { keys: ['-', '_'], help: 'zoom out' },
  'pan-up': { keys: ['up', 'k'], help: 'pan up' },
  'pan-down': { keys: ['down', 'j'], help: 'pan down' },
  'pan-left': { keys: ['left', 'h'], help: 'pan left' },
  'pan-right': { keys: ['right', 'l'], help: 'pan right' },
  'refresh': { keys: ['r'], help: 'refresh' },
  'next-style': { keys: ['s'], help: 'next style' },
  'prev-style': { keys: ['S'], help: 'prev style' },
};

export const PREVIEW_ACTIONS: readonly PreviewAction[] = [
  'close',
  'zoom-in',
  'zoom-out',
  'pan-up',
  'pan-down',
  'pan-left',
  'pan-right',
  'refresh',
  'next-style',
  'prev-style',
];

const KEY_TO_ACTION: ReadonlyMap<string, PreviewAction> = new Map(
  PREVIEW_ACTIONS.flatMap((action) => PREVIEW_KEYMAP[action].keys.map((key) => [key, action] as const)),
);

export function resolveKeyAction(key: string): PreviewAction | undefined {
  return KEY_TO_ACTION.get(key);
}

/** Shape of the second argument of readline's 'keypress' event. */
export type Keypress = {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

const NAMED_KEYS: Readonly<Record<string, string>> = {
  escape: 'esc',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
};

/**
 * Reduce a readline keypress to the token used in the keymap: a named key
 * ('esc', 'up', ...), 'ctrl+<name>', or the typed character ('S' for shift+s).
 */
export function normalizeKeypress(str: string | undefined, key?: Keypress): string {
  if (key?.ctrl && key.name) return `ctrl+${key.name}`;
  if (key?.name && NAMED_KEYS[key.name]) return NAMED_KEYS[key.name];
  if (str && str.length > 0) return str;
  return key?.sequence ?? key?.name ?? '';
}
