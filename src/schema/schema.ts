import { z } from 'zod';

type KeyTrie = { [key: string]: string | KeyTrie };

const keyTrieSchema: z.ZodType<KeyTrie> = z.lazy(() =>
  z.record(z.string().min(1), z.union([z.string().min(1), keyTrieSchema])),
);

const keymapsSchema = z.object({
  normal: keyTrieSchema,
  insert: keyTrieSchema,
});

const keymapOverridesSchema = z.strictObject({
  normal: keyTrieSchema.optional(),
  insert: keyTrieSchema.optional(),
});

const editorConfigSchema = z.strictObject({
  lineEnding: z.enum(['native', 'lf', 'crlf']).default('native'),
  insertFinalNewline: z.boolean().default(true),
});

const configSchema = z.strictObject({
  editor: editorConfigSchema.optional(),
  keys: keymapOverridesSchema.optional(),
});

const languageSchema = z.object({
  name: z.string().min(1),
  fileTypes: z.array(z.string().min(1)).default([]),
  commentToken: z.string().min(1).optional(),
  indent: z.object({ unit: z.string().min(1) }).optional(),
});

const languagesSchema = z.object({
  language: z.array(languageSchema),
});

const languageOverrideSchema = z.object({
  name: z.string().min(1),
  fileTypes: z.array(z.string().min(1)).optional(),
  commentToken: z.string().min(1).optional(),
  indent: z.object({ unit: z.string().min(1) }).optional(),
});

const languagesOverrideSchema = z.object({
  language: z.array(languageOverrideSchema),
});

const positionSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

const lineFeedSchema = z.enum(['native', 'asIs']);

const severitySchema = z.enum(['hint', 'info', 'warning', 'error']);

const statusMatcherSchema = z
  .object({
    severity: severitySchema.optional(),
    contains: z.string().min(1).optional(),
  })
  .refine((value) => value.severity !== undefined || value.contains !== undefined, {
    message: 'Status matcher requires severity or contains',
  });

const expectationSchema = z
  .object({
    document: z.string().optional(),
    text: z.string().optional(),
    mode: z.enum(['normal', 'insert', 'command']).optional(),
    status: z
      .union([z.literal('clear'), z.literal('notError'), statusMatcherSchema])
      .optional(),
  })
  .refine(
    (value) =>
      value.document !== undefined ||
      value.text !== undefined ||
      value.mode !== undefined ||
      value.status !== undefined,
    { message: 'Expectation requires document, text, mode, or status' },
  );

const scenarioStepSchema = z.object({
  keys: z.string().optional(),
  expect: expectationSchema.optional(),
});

const fileSpecSchema = z.object({
  path: z.string().min(1),
  position: positionSchema.optional(),
});

const keyCaseSchema = z.object({
  type: z.literal('case'),
  name: z.string().min(1),
  input: z.string(),
  keys: z.string(),
  output: z.string(),
  lineFeed: lineFeedSchema.optional(),
});

const scenarioCaseSchema = z.object({
  type: z.literal('scenario'),
  name: z.string().min(1),
  files: z.array(fileSpecSchema).optional(),
  inputText: z.string().optional(),
  lineFeed: lineFeedSchema.optional(),
  shouldExit: z.boolean().optional(),
  steps: z.array(scenarioStepSchema).min(1),
});

const suiteCaseSchema = z.discriminatedUnion('type', [keyCaseSchema, scenarioCaseSchema]);

const suiteSchema = z.object({
  schemaVersion: z.literal('v1'),
  name: z.string().min(1),
  config: configSchema.optional(),
  languages: languagesOverrideSchema.optional(),
  shutdownTimeoutMs: z.number().int().positive().optional(),
  cases: z.array(suiteCaseSchema).min(1),
});

const macroFileSchema = z.object({
  schemaVersion: z.literal('v1'),
  macros: z.record(z.string().min(1), z.string()),
});

type Keymaps = z.infer<typeof keymapsSchema>;
type KeymapOverrides = z.infer<typeof keymapOverridesSchema>;
type EditorConfig = z.output<typeof editorConfigSchema>;
type ConfigInput = z.input<typeof configSchema>;
type LanguageConfig = z.output<typeof languageSchema>;
type LanguagesConfig = z.output<typeof languagesSchema>;
type LanguagesOverride = z.output<typeof languagesOverrideSchema>;
type Severity = z.infer<typeof severitySchema>;
type Expectation = z.infer<typeof expectationSchema>;

export {
  configSchema,
  editorConfigSchema,
  expectationSchema,
  fileSpecSchema,
  keyCaseSchema,
  keymapOverridesSchema,
  keymapsSchema,
  keyTrieSchema,
  languageOverrideSchema,
  languageSchema,
  languagesOverrideSchema,
  languagesSchema,
  lineFeedSchema,
  macroFileSchema,
  positionSchema,
  scenarioCaseSchema,
  scenarioStepSchema,
  severitySchema,
  suiteCaseSchema,
  suiteSchema,
};

export type {
  ConfigInput,
  EditorConfig,
  Expectation,
  KeymapOverrides,
  Keymaps,
  KeyTrie,
  LanguageConfig,
  LanguagesConfig,
  LanguagesOverride,
  Severity,
};
