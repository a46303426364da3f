import assert from 'node:assert/strict';
import type { Application } from '../editor/application.js';
import type { InputResult } from '../editor/input.js';
import { keyInput } from '../editor/input.js';
import { parseMacro } from '../editor/macro.js';
import { getLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { renderMarked } from '../text/markers.js';
import { Transaction } from '../text/transaction.js';
import { AppBuilder } from './app-builder.js';
import { unboundedChannel } from './channel.js';
import type { Receiver, Sender } from './channel.js';
import {
  CloseError,
  ExitExpectationError,
  PrematureExitError,
  ShutdownTimeoutError,
} from './errors.js';
import type { TestCase } from './test-case.js';

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 2000;

/** Leaves any mode and quits without saving. */
const FORCE_QUIT_KEYS = '<esc>:q!<ret>';

/** Runs against the application once a step's keys were handled. */
type Check = (app: Application) => void | Promise<void>;

interface Step {
  keys?: string;
  check?: Check;
}

interface HarnessOptions {
  /** Bound on the forced quit after the last step. */
  shutdownTimeoutMs?: number;
  logger?: Logger;
}

interface Driver {
  sender: Sender<InputResult>;
  receiver: Receiver<InputResult>;
  logger: Logger;
}

function logSnapshot(app: Application, index: number, logger: Logger): void {
  const { view, doc } = app.editor.current();
  const snapshot = renderMarked(doc.text, doc.selection(view.id));
  logger.debug('harness', `before step ${index + 1}: ${JSON.stringify(snapshot)}`);
}

function sendKeys(sender: Sender<InputResult>, keys: string): void {
  for (const event of parseMacro(keys)) {
    sender.send(keyInput(event));
  }
}

async function runSteps(
  app: Application,
  steps: readonly Step[],
  shouldExit: boolean,
  driver: Driver,
): Promise<void> {
  for (const [index, step] of steps.entries()) {
    logSnapshot(app, index, driver.logger);
    if (step.keys !== undefined) {
      sendKeys(driver.sender, step.keys);
    }
    const exited = !(await app.eventLoopUntilIdle(driver.receiver));
    const isLast = index === steps.length - 1;
    if (exited && !isLast) {
      throw new PrematureExitError(index);
    }
    if (isLast && exited !== shouldExit) {
      throw new ExitExpectationError(shouldExit, exited);
    }
    await step.check?.(app);
  }
}

async function forceShutdown(
  app: Application,
  driver: Driver,
  timeoutMs: number,
): Promise<void> {
  sendKeys(driver.sender, FORCE_QUIT_KEYS);
  const loop = app.eventLoop(driver.receiver);
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });
  try {
    const outcome = await Promise.race([loop, timeout]);
    if (outcome === 'timeout') {
      // wakes the loop if it is waiting for input
      driver.sender.close();
      void loop.catch((error: unknown) => {
        driver.logger.error(
          'harness',
          'event loop failed after the shutdown timeout',
          error instanceof Error ? error : new Error(String(error)),
        );
      });
      throw new ShutdownTimeoutError(timeoutMs);
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Feeds each step's keys to `app`, waits until it is idle and runs the
 * step's check. Only the last step may see the application exit, and it
 * must exit exactly when `shouldExit` says so. Without an expected exit the
 * application is force-quit afterwards. `app.close()` runs once either way;
 * its errors fail the run unless it already failed.
 */
async function testKeySequences(
  app: Application,
  steps: readonly Step[],
  shouldExit: boolean,
  options: HarnessOptions = {},
): Promise<void> {
  const [sender, receiver] = unboundedChannel<InputResult>();
  const driver: Driver = { sender, receiver, logger: options.logger ?? getLogger() };
  const script: readonly Step[] = steps.length > 0 ? steps : [{}];

  let completed = false;
  try {
    await runSteps(app, script, shouldExit, driver);
    if (!shouldExit) {
      await forceShutdown(app, driver, options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS);
    }
    completed = true;
  } finally {
    const errors = await app.close();
    for (const error of errors) {
      driver.logger.error('harness', 'error closing application', error);
    }
    if (completed && errors.length > 0) {
      throw new CloseError(errors);
    }
  }
}

async function testKeySequence(
  app: Application,
  keys: string,
  check: Check | undefined,
  shouldExit: boolean,
  options?: HarnessOptions,
): Promise<void> {
  await testKeySequences(app, [{ keys, check }], shouldExit, options);
}

/**
 * Replaces the focused document with the case's input, then runs its keys as
 * one step. Without an `app`, a default one is built.
 */
async function testKeySequenceWithInputText(
  app: Application | undefined,
  testCase: TestCase,
  check: Check | undefined,
  shouldExit: boolean,
  options?: HarnessOptions,
): Promise<void> {
  const target = app ?? new AppBuilder().build();
  const doc = target.editor.currentDocument();
  const transaction = Transaction.change(doc.text, [
    { from: 0, to: doc.text.length, insert: testCase.inText },
  ]).withSelection(testCase.inSelection);
  target.editor.apply(transaction);
  await testKeySequence(target, testCase.inKeys, check, shouldExit, options);
}

/**
 * Runs `testCase` on the application `builder` produces and checks that the
 * document ends up as the case's output with a single selection.
 */
async function testWithConfig(
  builder: AppBuilder,
  testCase: TestCase,
  options?: HarnessOptions,
): Promise<void> {
  const app = builder.build();
  await testKeySequenceWithInputText(
    app,
    testCase,
    (current) => {
      const { view, doc } = current.editor.current();
      assert.equal(doc.text, testCase.outText);
      assert.equal(doc.allSelections().size, 1);
      assert.deepEqual(doc.selection(view.id), testCase.outSelection);
    },
    false,
    options,
  );
}

async function runTestCase(testCase: TestCase, options?: HarnessOptions): Promise<void> {
  await testWithConfig(new AppBuilder(), testCase, options);
}

/** Lets work the application queued for itself settle, without new input. */
async function runEventLoopUntilIdle(app: Application): Promise<boolean> {
  const [sender, receiver] = unboundedChannel<InputResult>();
  try {
    return await app.eventLoopUntilIdle(receiver);
  } finally {
    sender.close();
  }
}

export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  FORCE_QUIT_KEYS,
  runEventLoopUntilIdle,
  runTestCase,
  testKeySequence,
  testKeySequences,
  testKeySequenceWithInputText,
  testWithConfig,
};
export type { Check, HarnessOptions, Step };
