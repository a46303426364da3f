interface KeyModifiers {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

/**
 * A single key press. `code` is either one character or the name of a
 * special key (`esc`, `ret`, `backspace`, ...).
 */
interface KeyEvent {
  code: string;
  modifiers: KeyModifiers;
}

type InputEvent = { type: 'key'; key: KeyEvent } | { type: 'paste'; text: string };

type InputResult = { ok: true; event: InputEvent } | { ok: false; error: Error };

/** The consumer half of an input queue. */
interface EventSource<T> {
  /** Next queued value, without waiting. */
  tryRecv(): T | undefined;
  /** Next value, waiting for one; `undefined` once the producer closed. */
  recv(): Promise<T | undefined>;
}

const NAMED_KEYS = new Set([
  'esc',
  'ret',
  'backspace',
  'del',
  'tab',
  'left',
  'right',
  'up',
  'down',
  'home',
  'end',
  'pageup',
  'pagedown',
]);

const CHAR_NAMES: Record<string, string> = {
  ' ': 'space',
  '<': 'lt',
  '>': 'gt',
  '-': 'minus',
};

const NO_MODIFIERS: KeyModifiers = { ctrl: false, alt: false, shift: false };

function key(code: string, modifiers: Partial<KeyModifiers> = {}): KeyEvent {
  return { code, modifiers: { ...NO_MODIFIERS, ...modifiers } };
}

/** Canonical name used by keymaps, e.g. `C-s`, `esc`, `space`. */
function formatKey(event: KeyEvent): string {
  let prefix = '';
  if (event.modifiers.ctrl) prefix += 'C-';
  if (event.modifiers.alt) prefix += 'A-';
  if (event.modifiers.shift) prefix += 'S-';
  return prefix + (CHAR_NAMES[event.code] ?? event.code);
}

function isPrintable(event: KeyEvent): boolean {
  return (
    event.code.length === 1 && !event.modifiers.ctrl && !event.modifiers.alt
  );
}

function keyInput(event: KeyEvent): InputResult {
  return { ok: true, event: { type: 'key', key: event } };
}

export { CHAR_NAMES, formatKey, isPrintable, key, keyInput, NAMED_KEYS };
export type { EventSource, InputEvent, InputResult, KeyEvent, KeyModifiers };
