import type { KeyTrie, Keymaps, KeymapOverrides } from '../schema/schema.js';

const DEFAULT_KEYMAPS: Keymaps = {
  normal: {
    h: 'move_char_left',
    left: 'move_char_left',
    l: 'move_char_right',
    right: 'move_char_right',
    j: 'move_line_down',
    down: 'move_line_down',
    k: 'move_line_up',
    up: 'move_line_up',
    home: 'goto_line_start',
    end: 'goto_line_end',
    g: {
      g: 'goto_file_start',
      e: 'goto_file_end',
      h: 'goto_line_start',
      l: 'goto_line_end',
    },
    '%': 'select_all',
    x: 'extend_line_below',
    d: 'delete_selection',
    c: 'change_selection',
    D: 'kill_to_line_end',
    i: 'insert_mode',
    a: 'append_mode',
    o: 'open_below',
    ';': 'collapse_selection',
    C: 'copy_selection_on_next_line',
    'C-c': 'toggle_comments',
    ':': 'command_mode',
    esc: 'normal_mode',
  },
  insert: {
    esc: 'normal_mode',
    ret: 'insert_newline',
    backspace: 'delete_char_backward',
    del: 'delete_char_forward',
    tab: 'insert_tab',
    left: 'move_char_left',
    right: 'move_char_right',
    up: 'move_line_up',
    down: 'move_line_down',
  },
};

/** A fresh copy of the default bindings; callers may change it freely. */
function defaultKeymaps(): Keymaps {
  return structuredClone(DEFAULT_KEYMAPS);
}

function mergeTrie(base: KeyTrie, overrides: KeyTrie): KeyTrie {
  const merged: Record<string, string | KeyTrie> = { ...base };
  for (const [name, binding] of Object.entries(overrides)) {
    const existing = merged[name];
    if (typeof binding !== 'string' && existing !== undefined && typeof existing !== 'string') {
      merged[name] = mergeTrie(existing, binding);
    } else {
      merged[name] = binding;
    }
  }
  return merged;
}

/**
 * Layers `overrides` on top of `base`. Nested key sequences merge
 * recursively; on a collision the override wins.
 */
function mergeKeys(base: Keymaps, overrides: KeymapOverrides): Keymaps {
  return {
    normal: overrides.normal ? mergeTrie(base.normal, overrides.normal) : base.normal,
    insert: overrides.insert ? mergeTrie(base.insert, overrides.insert) : base.insert,
  };
}

type Lookup =
  | { kind: 'command'; command: string }
  | { kind: 'pending' }
  | { kind: 'none' };

function lookup(trie: KeyTrie, keys: readonly string[]): Lookup {
  let node: string | KeyTrie = trie;
  for (const name of keys) {
    if (typeof node === 'string') {
      return { kind: 'none' };
    }
    const child: string | KeyTrie | undefined = node[name];
    if (child === undefined) {
      return { kind: 'none' };
    }
    node = child;
  }
  return typeof node === 'string' ? { kind: 'command', command: node } : { kind: 'pending' };
}

export { defaultKeymaps, lookup, mergeKeys };
export type { Lookup };
