import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Application } from '../src/editor/application.js';
import { defaultConfig } from '../src/editor/config.js';
import type { InputResult } from '../src/editor/input.js';
import { keyInput } from '../src/editor/input.js';
import { parseMacro } from '../src/editor/macro.js';
import { nullLogger, resetLogger, setLogger } from '../src/logger.js';
import { testConfig, testSyntaxLoader } from '../src/runtime/app-builder.js';
import { unboundedChannel } from '../src/runtime/channel.js';
import type { Sender } from '../src/runtime/channel.js';
import { NATIVE_LINE_ENDING } from '../src/text/line-ending.js';

function send(sender: Sender<InputResult>, keys: string): void {
  for (const event of parseMacro(keys)) {
    sender.send(keyInput(event));
  }
}

function createApp(files: [string, { row: number; col: number }[]][] = []): Application {
  return new Application({ files: new Map(files) }, testConfig(), testSyntaxLoader());
}

describe('application', () => {
  let tempDir: string;

  beforeEach(() => {
    setLogger(nullLogger);
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'editor-harness-app-'));
  });

  afterEach(() => {
    resetLogger();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('starts with a scratch document', () => {
    const app = createApp();
    const doc = app.editor.currentDocument();
    expect(doc.text).toBe('');
    expect(doc.filePath).toBeUndefined();
  });

  it('reports idle while running and exit after a quit', async () => {
    const app = createApp();
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, 'ihi<esc>');
    await expect(app.eventLoopUntilIdle(receiver)).resolves.toBe(true);
    expect(app.editor.currentDocument().text).toBe('hi');

    send(sender, ':q!<ret>');
    await expect(app.eventLoopUntilIdle(receiver)).resolves.toBe(false);
  });

  it('stops when the event source closes', async () => {
    const app = createApp();
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, 'ia');
    sender.close();
    await expect(app.eventLoop(receiver)).resolves.toBe(true);
    expect(app.editor.currentDocument().text).toBe('a');
  });

  it('fails on an input error', async () => {
    const app = createApp();
    const [sender, receiver] = unboundedChannel<InputResult>();

    sender.send({ ok: false, error: new Error('terminal went away') });
    await expect(app.eventLoopUntilIdle(receiver)).rejects.toThrow('terminal went away');
  });

  it('inserts pasted text', async () => {
    const app = createApp();
    const [sender, receiver] = unboundedChannel<InputResult>();

    sender.send({ ok: true, event: { type: 'paste', text: 'pasted' } });
    await app.eventLoopUntilIdle(receiver);
    expect(app.editor.currentDocument().text).toBe('pasted');
  });

  it('opens files in order and focuses the first', () => {
    const first = path.join(tempDir, 'first.txt');
    const second = path.join(tempDir, 'second.txt');
    fs.writeFileSync(first, 'one\ntwo');

    const app = createApp([
      [first, [{ row: 1, col: 1 }]],
      [second, [{ row: 0, col: 0 }]],
    ]);

    const doc = app.editor.currentDocument();
    expect(doc.filePath).toBe(first);
    expect(doc.selection(1).primary().head).toBe(5);
    expect(app.editor.documents.size).toBe(2);
  });

  it('writes and reports on the status line', async () => {
    const target = path.join(tempDir, 'notes.txt');
    const app = createApp([[target, [{ row: 0, col: 0 }]]]);
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, 'ihi<esc>:w<ret>');
    await expect(app.eventLoopUntilIdle(receiver)).resolves.toBe(true);

    expect(fs.readFileSync(target, 'utf8')).toBe('hi');
    expect(app.editor.getStatus()).toStrictEqual([`'${target}' written`, 'info']);
    expect(app.editor.currentDocument().isModified).toBe(false);
    await expect(app.close()).resolves.toStrictEqual([]);
  });

  it('adds a final newline when configured', async () => {
    const target = path.join(tempDir, 'final.txt');
    const app = new Application(
      { files: new Map([[target, [{ row: 0, col: 0 }]]]) },
      defaultConfig(),
      testSyntaxLoader(),
    );
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, 'ihi<esc>:w<ret>');
    await app.eventLoopUntilIdle(receiver);

    expect(fs.readFileSync(target, 'utf8')).toBe(`hi${NATIVE_LINE_ENDING}`);
  });

  it('refuses to write a scratch document', async () => {
    const app = createApp();
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, ':w<ret>');
    await app.eventLoopUntilIdle(receiver);
    expect(app.editor.getStatus()).toStrictEqual([
      'Cannot write a buffer without a filename',
      'error',
    ]);
  });

  it('returns pending write failures from close', async () => {
    const blocked = path.join(tempDir, 'blocked.txt');
    fs.writeFileSync(blocked, 'keep');
    fs.chmodSync(blocked, 0o444);
    const app = createApp([[blocked, [{ row: 0, col: 0 }]]]);
    const [sender, receiver] = unboundedChannel<InputResult>();

    send(sender, 'iX<esc>:wq<ret>');
    await expect(app.eventLoopUntilIdle(receiver)).resolves.toBe(false);

    const errors = await app.close();
    expect(errors.map((error) => error.message)).toStrictEqual([
      `Cannot write to read-only file ${blocked}`,
    ]);
    expect(fs.readFileSync(blocked, 'utf8')).toBe('keep');
  });
});
