import { configSchema, editorConfigSchema } from '../schema/schema.js';
import type { EditorConfig, Keymaps } from '../schema/schema.js';
import { defaultKeymaps, mergeKeys } from './keymap.js';

interface Config {
  editor: EditorConfig;
  keys: Keymaps;
}

function defaultEditorConfig(): EditorConfig {
  return editorConfigSchema.parse({});
}

function defaultConfig(): Config {
  return { editor: defaultEditorConfig(), keys: defaultKeymaps() };
}

/**
 * Validates a user configuration. Key bindings it names are layered over the
 * default keymap rather than replacing it.
 */
function parseConfig(raw: unknown): Config {
  const parsed = configSchema.parse(raw);
  return {
    editor: parsed.editor ?? defaultEditorConfig(),
    keys: mergeKeys(defaultKeymaps(), parsed.keys ?? {}),
  };
}

export { defaultConfig, defaultEditorConfig, parseConfig };
export type { Config };
