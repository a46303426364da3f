import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { nullLogger, resetLogger, setLogger } from '../src/logger.js';
import { runTestCase, testKeySequenceWithInputText } from '../src/runtime/executor.js';
import { createTestCase, toTestCase } from '../src/runtime/test-case.js';
import type { TestCaseTuple } from '../src/runtime/test-case.js';
import { renderMarked } from '../src/text/markers.js';

async function check(tuple: TestCaseTuple): Promise<void> {
  await runTestCase(toTestCase(tuple));
}

describe('editing commands', () => {
  beforeEach(() => {
    setLogger(nullLogger);
  });

  afterEach(() => {
    resetLogger();
  });

  it('kills to the end of the line', async () => {
    await check(['#[|]#hello', 'D', '#[|]#']);
    await check(['ab#[|]#cd\nef', 'D', 'ab#[|]#\nef']);
  });

  it('moves by characters and lines', async () => {
    await check(['a#[|]#bc\nxyz', 'jl', 'abc\nxy#[|]#z']);
    await check(['abc\nxyz#[|]#', 'k', 'abc#[|]#\nxyz']);
    await check(['ab\nc#[|]#d', 'gg', '#[|]#ab\ncd']);
    await check(['ab\n#[|]#cd\n', 'ge', 'ab\ncd\n#[|]#', 'asIs']);
    await check(['ab#[|]#c', 'gh', '#[|]#abc']);
  });

  it('deletes the selected line', async () => {
    await check(['one\n#[|]#two\nthree', 'xd', 'one\n#[|]#three']);
  });

  it('selects and deletes everything', async () => {
    await check(['#[|]#abc', '%d', '#[|]#', 'asIs']);
  });

  it('inserts and appends text', async () => {
    await check(['#[|]#world', 'ihello <esc>', 'hello #[|]#world']);
    await check(['#[ab|]#c', 'aX<esc>', 'abX#[|]#c']);
    await check(['one #[two|]# three', 'c2<esc>', 'one 2#[|]# three']);
  });

  it('opens a line below', async () => {
    await check(['fir#[|]#st\nsecond', 'onew<esc>', 'first\nnew#[|]#\nsecond']);
  });

  it('edits in insert mode', async () => {
    await check(['#[|]#ab', 'i<ret><esc>', '\n#[|]#ab']);
    await check(['ab#[|]#c', 'i<backspace><esc>', 'a#[|]#c']);
    await check(['a#[|]#bc', 'i<del><esc>', 'a#[|]#c']);
  });

  it('copies the cursor to the next line', async () => {
    await check(['a#[|]#b\ncd', 'C', 'a#(|)#b\nc#[|]#d']);
    await check(['a#[|]#b\ncd', 'CiX<esc>', 'aX#(|)#b\ncX#[|]#d']);
  });

  it('toggles line comments', async () => {
    await check(['#[|]#let a', '<C-c>', '// #[|]#let a']);
    await check(['#[|]#let a', '<C-c><C-c>', '#[|]#let a']);
    await check(['#[|]#let a', ':lang python<ret><C-c>', '# #[|]#let a']);
  });

  it('indents with the language unit', async () => {
    await check(['#[|]#x', 'i<tab><esc>', '\t#[|]#x']);
    await check(['#[|]#x', ':lang python<ret>i<tab><esc>', '    #[|]#x']);
  });

  it('reports unknown commands on the status line', async () => {
    const testCase = createTestCase('#[|]#abc', ':nope<ret>', '#[|]#abc');
    await testKeySequenceWithInputText(
      undefined,
      testCase,
      (app) => {
        expect(app.editor.getStatus()).toStrictEqual(["No such command: 'nope'", 'error']);
        expect(app.editor.mode).toBe('normal');
      },
      false,
    );
  });

  it('refuses to quit with unsaved changes', async () => {
    const testCase = createTestCase('#[|]#abc', ':q<ret>', '#[|]#abc');
    await testKeySequenceWithInputText(
      undefined,
      testCase,
      (app) => {
        expect(app.editor.getStatus()).toStrictEqual([
          '1 unsaved buffer(s) remaining: [scratch]',
          'error',
        ]);
        expect(app.editor.shouldClose()).toBe(false);
      },
      false,
    );
  });

  it('rejects unknown languages', async () => {
    const testCase = createTestCase('#[|]#abc', ':lang cobol<ret>', '#[|]#abc');
    await testKeySequenceWithInputText(
      undefined,
      testCase,
      (app) => {
        expect(app.editor.getStatus()).toStrictEqual(['Unknown language: cobol', 'error']);
      },
      false,
    );
  });

  it('cancels the command line with escape', async () => {
    const testCase = createTestCase('#[|]#abc', ':q!<esc>l', 'a#[|]#bc');
    await testKeySequenceWithInputText(
      undefined,
      testCase,
      (app) => {
        const { view, doc } = app.editor.current();
        expect(renderMarked(doc.text, doc.selection(view.id))).toBe('a#[|]#bc');
        expect(app.editor.commandLine).toBe('');
      },
      false,
    );
  });

  it('reports a directory passed to open on the status line', async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'editor-harness-open-'));
    try {
      const testCase = createTestCase('#[|]#abc', `:o ${directory}<ret>`, '#[|]#abc');
      await testKeySequenceWithInputText(
        undefined,
        testCase,
        (app) => {
          expect(app.editor.getStatus()).toStrictEqual([
            `Failed to open ${directory}: ${directory} is a directory`,
            'error',
          ]);
          expect(app.editor.currentDocument().text).toBe('abc');
        },
        false,
      );
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });
});
