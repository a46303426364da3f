import type { CaseResult, RunReport } from './types.js';

function createReport(suiteName: string, cases: CaseResult[], startedAt: Date): RunReport {
  const status = cases.some((entry) => entry.status === 'failed') ? 'failed' : 'passed';

  return {
    schemaVersion: 'v1',
    suite: suiteName,
    startedAt: startedAt.toISOString(),
    finishedAt: new Date().toISOString(),
    status,
    cases,
  };
}

export { createReport };
