import assert from 'node:assert/strict';
import path from 'node:path';
import type { Application } from '../editor/application.js';
import type { Config } from '../editor/config.js';
import { parseConfig } from '../editor/config.js';
import type { SyntaxLoader } from '../editor/syntax.js';
import { getLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Expectation } from '../schema/schema.js';
import { applyLineFeedHandling, LineFeedHandling } from '../text/line-ending.js';
import { parseMarked } from '../text/markers.js';
import { AppBuilder, testEditorConfig, testSyntaxLoader } from './app-builder.js';
import { testKeySequences, testWithConfig } from './executor.js';
import type { Step } from './executor.js';
import { assertStatusNotError } from './fixtures.js';
import { createReport } from './report.js';
import { createTestCase } from './test-case.js';
import type {
  CaseResult,
  KeyCase,
  RunPlan,
  RunReport,
  ScenarioCase,
  StepResult,
  Suite,
  SuiteCase,
} from './types.js';

interface SuiteOptions {
  /** Directory that relative file paths in scenarios resolve against. */
  baseDir?: string;
  logger?: Logger;
}

interface SuiteContext {
  config: Config;
  syntaxLoader: SyntaxLoader;
  baseDir: string;
  shutdownTimeoutMs?: number;
  logger: Logger;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  return String(error);
}

/** Suites get the test editor settings unless they set their own. */
function suiteConfig(suite: Suite): Config {
  const parsed = parseConfig(suite.config ?? {});
  return {
    editor: suite.config?.editor ? parsed.editor : testEditorConfig(),
    keys: parsed.keys,
  };
}

/**
 * Tracks step outcomes as the driver reaches each step's check. The first
 * step without a result when the run fails is the one that failed.
 */
class StepRecorder {
  readonly results: StepResult[] = [];
  private lastMark = Date.now();

  constructor(private readonly keys: readonly (string | undefined)[]) {}

  pass(): void {
    this.record('passed', null);
  }

  fail(message: string): void {
    if (this.results.length < this.keys.length) {
      this.record('failed', message);
    }
    while (this.results.length < this.keys.length) {
      this.record('skipped', null);
    }
  }

  private record(status: StepResult['status'], error: string | null): void {
    const now = Date.now();
    const index = this.results.length;
    this.results.push({
      index,
      keys: this.keys[index] ?? null,
      status,
      durationMs: status === 'skipped' ? 0 : now - this.lastMark,
      error,
    });
    this.lastMark = now;
  }
}

function expectDocument(app: Application, expected: Expectation, handling: LineFeedHandling): void {
  const { view, doc } = app.editor.current();
  if (expected.document !== undefined) {
    const marked = parseMarked(applyLineFeedHandling(handling, expected.document));
    assert.equal(doc.text, marked.text);
    assert.deepEqual(doc.selection(view.id), marked.selection);
  }
  if (expected.text !== undefined) {
    assert.equal(doc.text, applyLineFeedHandling(handling, expected.text));
  }
  if (expected.mode !== undefined) {
    assert.equal(app.editor.mode, expected.mode);
  }
}

function expectStatus(app: Application, expected: Expectation['status']): void {
  if (expected === undefined) {
    return;
  }
  const status = app.editor.getStatus();
  if (expected === 'clear') {
    assert.equal(status, undefined, `expected no status, found ${JSON.stringify(status)}`);
    return;
  }
  if (expected === 'notError') {
    assertStatusNotError(app.editor);
    return;
  }
  if (status === undefined) {
    throw new assert.AssertionError({ message: 'expected a status message, found none' });
  }
  const [message, severity] = status;
  if (expected.severity !== undefined) {
    assert.equal(severity, expected.severity);
  }
  if (expected.contains !== undefined) {
    assert.ok(
      message.includes(expected.contains),
      `status ${JSON.stringify(message)} does not contain ${JSON.stringify(expected.contains)}`,
    );
  }
}

async function runKeyCase(entry: KeyCase, ctx: SuiteContext, recorder: StepRecorder): Promise<void> {
  const testCase = createTestCase(entry.input, entry.keys, entry.output, entry.lineFeed);
  const builder = new AppBuilder().withConfig(ctx.config).withLangLoader(ctx.syntaxLoader);
  await testWithConfig(builder, testCase, {
    shutdownTimeoutMs: ctx.shutdownTimeoutMs,
    logger: ctx.logger,
  });
  recorder.pass();
}

async function runScenarioCase(
  entry: ScenarioCase,
  ctx: SuiteContext,
  recorder: StepRecorder,
): Promise<void> {
  const handling = entry.lineFeed ?? LineFeedHandling.Native;
  const builder = new AppBuilder().withConfig(ctx.config).withLangLoader(ctx.syntaxLoader);
  for (const file of entry.files ?? []) {
    builder.withFile(path.resolve(ctx.baseDir, file.path), file.position);
  }
  if (entry.inputText !== undefined) {
    builder.withInputText(applyLineFeedHandling(handling, entry.inputText));
  }

  const steps: Step[] = entry.steps.map((step) => ({
    keys: step.keys,
    check: (app) => {
      if (step.expect) {
        expectDocument(app, step.expect, handling);
        expectStatus(app, step.expect.status);
      }
      recorder.pass();
    },
  }));
  await testKeySequences(builder.build(), steps, entry.shouldExit ?? false, {
    shutdownTimeoutMs: ctx.shutdownTimeoutMs,
    logger: ctx.logger,
  });
}

async function runCase(entry: SuiteCase, ctx: SuiteContext): Promise<CaseResult> {
  const start = Date.now();
  const keys = entry.type === 'case' ? [entry.keys] : entry.steps.map((step) => step.keys);
  const recorder = new StepRecorder(keys);
  try {
    if (entry.type === 'case') {
      await runKeyCase(entry, ctx, recorder);
    } else {
      await runScenarioCase(entry, ctx, recorder);
    }
  } catch (error) {
    const message = describeError(error);
    ctx.logger.warn('suite', `case ${entry.name} failed: ${message}`);
    recorder.fail(message);
    return {
      name: entry.name,
      status: 'failed',
      durationMs: Date.now() - start,
      error: message,
      steps: recorder.results,
    };
  }
  return {
    name: entry.name,
    status: 'passed',
    durationMs: Date.now() - start,
    error: null,
    steps: recorder.results,
  };
}

/**
 * Runs every planned case on its own application. A failing case does not
 * stop the ones after it.
 */
async function runSuite(plan: RunPlan, options: SuiteOptions = {}): Promise<RunReport> {
  const startedAt = new Date();
  const ctx: SuiteContext = {
    config: suiteConfig(plan.suite),
    syntaxLoader: testSyntaxLoader(plan.suite.languages),
    baseDir: options.baseDir ?? process.cwd(),
    shutdownTimeoutMs: plan.suite.shutdownTimeoutMs,
    logger: options.logger ?? getLogger(),
  };

  const results: CaseResult[] = [];
  for (const entry of plan.cases) {
    ctx.logger.info('suite', `running ${entry.name}`);
    results.push(await runCase(entry, ctx));
  }
  return createReport(plan.suite.name, results, startedAt);
}

export { runSuite, suiteConfig };
export type { SuiteOptions };
