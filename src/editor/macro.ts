import { CHAR_NAMES, key, NAMED_KEYS } from './input.js';
import type { KeyEvent, KeyModifiers } from './input.js';

class MacroParseError extends Error {
  constructor(
    message: string,
    readonly macro: string,
  ) {
    super(message);
    this.name = 'MacroParseError';
  }
}

const NAMED_CHARS = new Map(
  Object.entries(CHAR_NAMES).map(([char, name]) => [name, char]),
);

const MODIFIER_PREFIXES: Record<string, keyof KeyModifiers> = {
  'C-': 'ctrl',
  'A-': 'alt',
  'S-': 'shift',
};

function parseBracketed(body: string, macro: string): KeyEvent {
  const modifiers: Partial<KeyModifiers> = {};
  let rest = body;
  for (;;) {
    const modifier = MODIFIER_PREFIXES[rest.slice(0, 2)];
    if (modifier === undefined || rest.length <= 2) {
      break;
    }
    if (modifiers[modifier] === true) {
      throw new MacroParseError(`Repeated modifier in <${body}>`, macro);
    }
    modifiers[modifier] = true;
    rest = rest.slice(2);
  }

  if (NAMED_KEYS.has(rest)) {
    return key(rest, modifiers);
  }
  const char = NAMED_CHARS.get(rest);
  if (char !== undefined) {
    return key(char, modifiers);
  }
  if (rest.length === 1) {
    return key(rest, modifiers);
  }
  throw new MacroParseError(`Unknown key <${body}>`, macro);
}

/**
 * Expands a human-readable key sequence into key events. Every character is
 * one key; `<...>` names a special key with optional `C-`, `A-` and `S-`
 * modifiers, and a literal `<` is written `<lt>`.
 */
function parseMacro(macro: string): KeyEvent[] {
  const keys: KeyEvent[] = [];
  let index = 0;
  while (index < macro.length) {
    const char = macro.charAt(index);
    if (char !== '<') {
      keys.push(key(char));
      index += 1;
      continue;
    }
    const close = macro.indexOf('>', index + 1);
    if (close < 0) {
      throw new MacroParseError(`Unclosed '<' at offset ${index}`, macro);
    }
    const body = macro.slice(index + 1, close);
    if (body.length === 0) {
      throw new MacroParseError(`Empty key name at offset ${index}`, macro);
    }
    keys.push(parseBracketed(body, macro));
    index = close + 1;
  }
  return keys;
}

export { MacroParseError, parseMacro };
