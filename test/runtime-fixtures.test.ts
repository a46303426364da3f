import { describe, expect, it } from 'vitest';
import { AssertionError } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AppBuilder } from '../src/runtime/app-builder.js';
import {
  assertFileHasContent,
  assertStatusNotError,
  newReadonlyTempfile,
  newReadonlyTempfileIn,
  reloadFile,
  tempFileWithContents,
} from '../src/runtime/fixtures.js';

describe('temp files', () => {
  it('holds the given contents', async () => {
    const file = await tempFileWithContents('hello');
    expect(fs.readFileSync(file.path, 'utf8')).toBe('hello');
    await assertFileHasContent(file, 'hello');
    await file.remove();
    expect(fs.existsSync(file.path)).toBe(false);
  });

  it('rereads the file from disk', async () => {
    const file = await tempFileWithContents('old');
    try {
      fs.writeFileSync(file.path, 'new');
      await assertFileHasContent(file, 'new');
      await expect(assertFileHasContent(file, 'old')).rejects.toBeInstanceOf(AssertionError);
    } finally {
      await file.remove();
    }
  });

  it('reopens the handle from disk', async () => {
    const file = await tempFileWithContents('first');
    try {
      const before = file.handle;
      fs.writeFileSync(file.path, 'second');
      await reloadFile(file);
      expect(file.handle).not.toBe(before);
      expect(await file.handle.readFile('utf8')).toBe('second');
    } finally {
      await file.remove();
    }
  });

  it('creates read-only files', async () => {
    const file = await newReadonlyTempfile();
    try {
      expect(fs.statSync(file.path).mode & 0o222).toBe(0);
      expect(path.dirname(file.path)).toBe(os.tmpdir());
    } finally {
      await file.remove();
    }
  });

  it('creates read-only files in a given directory', async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'editor-harness-fixtures-'));
    try {
      const file = await newReadonlyTempfileIn(directory);
      expect(path.dirname(file.path)).toBe(directory);
      expect(fs.statSync(file.path).mode & 0o222).toBe(0);
      await file.remove();
    } finally {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });
});

describe('assertStatusNotError', () => {
  it('accepts no status and informational ones', () => {
    const { editor } = new AppBuilder().build();
    assertStatusNotError(editor);
    editor.setStatus('saved');
    assertStatusNotError(editor);
  });

  it('rejects an error status', () => {
    const { editor } = new AppBuilder().build();
    editor.setError('disk full');
    expect(() => assertStatusNotError(editor)).toThrow('unexpected error status: disk full');
  });
});
