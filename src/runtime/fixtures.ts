import assert from 'node:assert/strict';
import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Editor } from '../editor/editor.js';

/** A file in a temp directory, kept open until {@link TempFile.remove}. */
class TempFile {
  constructor(
    readonly path: string,
    public handle: fs.promises.FileHandle,
  ) {}

  async remove(): Promise<void> {
    await this.handle.close();
    await fs.promises.rm(this.path, { force: true });
  }
}

function uniquePath(directory: string): string {
  return path.join(directory, `editor-harness-${randomUUID()}.txt`);
}

async function createTempFile(directory: string): Promise<TempFile> {
  const filePath = uniquePath(directory);
  const handle = await fs.promises.open(filePath, 'wx+');
  return new TempFile(filePath, handle);
}

/** Creates a temp file holding `text`, synced to disk before it returns. */
async function tempFileWithContents(text: string): Promise<TempFile> {
  const file = await createTempFile(os.tmpdir());
  await file.handle.writeFile(text, 'utf8');
  await file.handle.sync();
  return file;
}

/** An empty temp file in `directory` with every write bit cleared. */
async function newReadonlyTempfileIn(directory: string): Promise<TempFile> {
  const file = await createTempFile(directory);
  const { mode } = await file.handle.stat();
  await fs.promises.chmod(file.path, mode & 0o7777 & ~0o222);
  const after = await fs.promises.stat(file.path);
  if ((after.mode & 0o222) !== 0) {
    await file.remove();
    throw new Error(`Could not make ${file.path} read-only`);
  }
  return file;
}

async function newReadonlyTempfile(): Promise<TempFile> {
  return newReadonlyTempfileIn(os.tmpdir());
}

/** Swaps the file's handle for a fresh one opened from disk. */
async function reloadFile(file: TempFile): Promise<void> {
  await file.handle.close();
  file.handle = await fs.promises.open(file.path, 'r');
}

async function assertFileHasContent(file: TempFile, content: string): Promise<void> {
  await reloadFile(file);
  assert.equal(await file.handle.readFile('utf8'), content);
}

function assertStatusNotError(editor: Editor): void {
  const status = editor.getStatus();
  if (status === undefined) {
    return;
  }
  const [message, severity] = status;
  assert.notEqual(severity, 'error', `unexpected error status: ${message}`);
}

export {
  assertFileHasContent,
  assertStatusNotError,
  newReadonlyTempfile,
  newReadonlyTempfileIn,
  reloadFile,
  tempFileWithContents,
  TempFile,
};
