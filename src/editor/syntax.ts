import fs from 'node:fs';
import path from 'node:path';
import { languagesOverrideSchema, languagesSchema } from '../schema/schema.js';
import type {
  LanguageConfig,
  LanguagesConfig,
  LanguagesOverride,
} from '../schema/schema.js';

const DEFAULT_LANGUAGES_URL = new URL('../../languages.json', import.meta.url);

function defaultLanguageConfig(): LanguagesConfig {
  const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_LANGUAGES_URL, 'utf8'));
  return languagesSchema.parse(raw);
}

/**
 * Layers language overrides over a base table. Entries match by name; fields
 * an override sets replace the base's, and unknown names are appended.
 */
function mergeLanguageConfig(
  base: LanguagesConfig,
  overrides: LanguagesOverride,
): LanguagesConfig {
  const merged = base.language.map((language) => ({ ...language }));
  for (const override of overrides.language) {
    const index = merged.findIndex((language) => language.name === override.name);
    const existing = merged[index];
    if (existing === undefined) {
      merged.push({ ...override, fileTypes: override.fileTypes ?? [] });
      continue;
    }
    merged[index] = {
      name: existing.name,
      fileTypes: override.fileTypes ?? existing.fileTypes,
      commentToken: override.commentToken ?? existing.commentToken,
      indent: override.indent ?? existing.indent,
    };
  }
  return { language: merged };
}

class SyntaxLoader {
  private readonly byName = new Map<string, LanguageConfig>();
  private readonly byFileType = new Map<string, LanguageConfig>();

  constructor(config: LanguagesConfig) {
    for (const language of config.language) {
      if (this.byName.has(language.name)) {
        throw new Error(`Language "${language.name}" defined twice`);
      }
      this.byName.set(language.name, language);
      for (const fileType of language.fileTypes) {
        this.byFileType.set(fileType, language);
      }
    }
  }

  languageForPath(filePath: string): LanguageConfig | undefined {
    const extension = path.extname(filePath).slice(1);
    return extension.length > 0 ? this.byFileType.get(extension) : undefined;
  }

  languageByName(name: string): LanguageConfig | undefined {
    return this.byName.get(name);
  }

  languageNames(): string[] {
    return Array.from(this.byName.keys());
  }
}

/** Loader over the bundled language table with `overrides` merged in. */
function createSyntaxLoader(overrides?: unknown): SyntaxLoader {
  let config = defaultLanguageConfig();
  if (overrides !== undefined) {
    config = mergeLanguageConfig(config, languagesOverrideSchema.parse(overrides));
  }
  return new SyntaxLoader(config);
}

export { createSyntaxLoader, defaultLanguageConfig, mergeLanguageConfig, SyntaxLoader };
