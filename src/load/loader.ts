import type { z } from 'zod';
import { macroFileSchema, suiteSchema } from '../schema/schema.js';
import type { Suite, SuiteCase } from '../runtime/types.js';

type MacroFile = z.infer<typeof macroFileSchema>;

/** Macro name to the key sequence it stands for. */
type MacroLibrary = Record<string, string>;

const MACRO_REFERENCE = /@\{([^}]+)\}/g;

function assertUniqueNames(names: string[], label: string) {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new Error(
      `${label} contains duplicate names: ${Array.from(duplicates).join(', ')}`,
    );
  }
}

function parseMacroFile(raw: unknown): MacroFile {
  return macroFileSchema.parse(raw);
}

/** Validates a suite file; case names must be unique within it. */
function parseSuite(raw: unknown): Suite {
  const suite = suiteSchema.parse(raw);
  assertUniqueNames(
    suite.cases.map((entry) => entry.name),
    `suite ${suite.name}`,
  );
  return suite;
}

function mergeMacros(files: MacroFile[]): MacroLibrary {
  const merged: MacroLibrary = {};
  for (const file of files) {
    for (const [name, keys] of Object.entries(file.macros)) {
      if (Object.prototype.hasOwnProperty.call(merged, name)) {
        throw new Error(`Macro "${name}" already defined`);
      }
      merged[name] = keys;
    }
  }
  return merged;
}

/**
 * Replaces every `@{name}` in `keys` with that macro's keys. Macros may
 * reference other macros.
 */
function expandMacros(keys: string, macros: MacroLibrary, stack: string[] = []): string {
  return keys.replace(MACRO_REFERENCE, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(macros, name)) {
      throw new Error(`Macro "${name}" not found`);
    }
    if (stack.includes(name)) {
      throw new Error(`Macro cycle detected: ${[...stack, name].join(' -> ')}`);
    }
    return expandMacros(macros[name], macros, [...stack, name]);
  });
}

function expandCase(entry: SuiteCase, macros: MacroLibrary): SuiteCase {
  if (entry.type === 'case') {
    return { ...entry, keys: expandMacros(entry.keys, macros) };
  }
  return {
    ...entry,
    steps: entry.steps.map((step) =>
      step.keys === undefined ? step : { ...step, keys: expandMacros(step.keys, macros) },
    ),
  };
}

function expandSuiteMacros(suite: Suite, macros: MacroLibrary): Suite {
  return { ...suite, cases: suite.cases.map((entry) => expandCase(entry, macros)) };
}

export {
  expandMacros,
  expandSuiteMacros,
  mergeMacros,
  parseMacroFile,
  parseSuite,
};

export type { MacroFile, MacroLibrary };
