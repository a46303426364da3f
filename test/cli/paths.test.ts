import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { resolveSuitePaths } from '../../src/cli/paths.js';

describe('cli paths', () => {
  it('resolves the suite directory and its macros directory', () => {
    const resolved = resolveSuitePaths(path.join('fixtures', 'suite.json'));

    expect(resolved.suitePath).toBe(path.resolve('fixtures', 'suite.json'));
    expect(resolved.rootDir).toBe(path.resolve('fixtures'));
    expect(resolved.macrosDir).toBe(path.resolve('fixtures', 'macros'));
  });
});
