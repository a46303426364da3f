export { Application, createArgs } from './editor/application.js';
export type { Args } from './editor/application.js';
export { defaultConfig, defaultEditorConfig, parseConfig } from './editor/config.js';
export type { Config } from './editor/config.js';
export { Editor } from './editor/editor.js';
export type { Mode } from './editor/editor.js';
export { key, keyInput } from './editor/input.js';
export type { EventSource, InputEvent, InputResult, KeyEvent } from './editor/input.js';
export { defaultKeymaps, mergeKeys } from './editor/keymap.js';
export { MacroParseError, parseMacro } from './editor/macro.js';
export { createSyntaxLoader, mergeLanguageConfig, SyntaxLoader } from './editor/syntax.js';
export { expandMacros, expandSuiteMacros, mergeMacros, parseMacroFile, parseSuite } from './load/loader.js';
export { createConsoleLogger, getLogger, nullLogger, resetLogger, setLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { AppBuilder, testConfig, testEditorConfig, testSyntaxLoader } from './runtime/app-builder.js';
export { unboundedChannel } from './runtime/channel.js';
export type { Receiver, Sender } from './runtime/channel.js';
export {
  CloseError,
  ConfigurationError,
  ExitExpectationError,
  HarnessError,
  PrematureExitError,
  ShutdownTimeoutError,
} from './runtime/errors.js';
export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  runEventLoopUntilIdle,
  runTestCase,
  testKeySequence,
  testKeySequences,
  testKeySequenceWithInputText,
  testWithConfig,
} from './runtime/executor.js';
export type { Check, HarnessOptions, Step } from './runtime/executor.js';
export {
  assertFileHasContent,
  assertStatusNotError,
  newReadonlyTempfile,
  newReadonlyTempfileIn,
  reloadFile,
  tempFileWithContents,
  TempFile,
} from './runtime/fixtures.js';
export { buildRunPlan } from './runtime/plan.js';
export { reportSchema } from './runtime/report-schema.js';
export { runSuite } from './runtime/suite.js';
export type { SuiteOptions } from './runtime/suite.js';
export { createTestCase, toTestCase } from './runtime/test-case.js';
export type { TestCase, TestCaseTuple } from './runtime/test-case.js';
export type { CaseResult, RunReport, StepResult, Suite } from './runtime/types.js';
export { applyLineFeedHandling, LineFeedHandling, NATIVE_LINE_ENDING } from './text/line-ending.js';
export { MarkerParseError, parseMarked, renderMarked } from './text/markers.js';
export { Range, Selection } from './text/selection.js';
export { Transaction } from './text/transaction.js';
export type { Change } from './text/transaction.js';
export type { Position } from './text/lines.js';
