import path from 'node:path';

interface SuitePaths {
  suitePath: string;
  rootDir: string;
  macrosDir: string;
}

function resolveSuitePaths(suitePath: string): SuitePaths {
  const absolute = path.resolve(suitePath);
  const rootDir = path.dirname(absolute);
  return {
    suitePath: absolute,
    rootDir,
    macrosDir: path.join(rootDir, 'macros'),
  };
}

export type { SuitePaths };
export { resolveSuitePaths };
