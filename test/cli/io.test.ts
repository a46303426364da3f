import { afterEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ensureDir, readJson, readJsonFiles } from '../../src/cli/io.js';

const fixturesDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

describe('cli io', () => {
  const tempDir = path.join(os.tmpdir(), `editor-harness-io-${process.pid}`);

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates directories when missing', () => {
    ensureDir(path.join(tempDir, 'nested'));
    expect(fs.existsSync(path.join(tempDir, 'nested'))).toBe(true);
  });

  it('returns an empty list for a missing directory', () => {
    expect(readJsonFiles(path.join(tempDir, 'missing'))).toStrictEqual([]);
  });

  it('reads json files sorted by name', () => {
    ensureDir(tempDir);
    fs.writeFileSync(path.join(tempDir, 'b.json'), '{"order":2}');
    fs.writeFileSync(path.join(tempDir, 'a.json'), '{"order":1}');
    fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'skip');

    expect(readJsonFiles(tempDir)).toStrictEqual([{ order: 1 }, { order: 2 }]);
  });

  it('reads a single json file', () => {
    expect(readJson(path.join(fixturesDir, 'macros', 'editing.json'))).toStrictEqual({
      schemaVersion: 'v1',
      macros: { 'append-bang': 'gli!<esc>' },
    });
  });
});
