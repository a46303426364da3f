import type { RunPlan, Suite } from './types.js';

/** All of the suite's cases in file order, or just `caseName`. */
function buildRunPlan(suite: Suite, caseName?: string): RunPlan {
  if (caseName === undefined) {
    return { suite, cases: suite.cases };
  }
  const selected = suite.cases.find((entry) => entry.name === caseName);
  if (!selected) {
    throw new Error(`Suite ${suite.name} has no case named ${caseName}`);
  }
  return { suite, cases: [selected] };
}

export { buildRunPlan };
