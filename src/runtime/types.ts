import type { z } from 'zod';
import type {
  keyCaseSchema,
  scenarioCaseSchema,
  scenarioStepSchema,
  suiteCaseSchema,
  suiteSchema,
} from '../schema/schema.js';

type Suite = z.infer<typeof suiteSchema>;
type SuiteCase = z.infer<typeof suiteCaseSchema>;
type KeyCase = z.infer<typeof keyCaseSchema>;
type ScenarioCase = z.infer<typeof scenarioCaseSchema>;
type ScenarioStep = z.infer<typeof scenarioStepSchema>;

type RunStatus = 'passed' | 'failed' | 'skipped';

interface StepResult {
  index: number;
  keys: string | null;
  status: RunStatus;
  durationMs: number;
  error: string | null;
}

interface CaseResult {
  name: string;
  status: RunStatus;
  durationMs: number;
  error: string | null;
  steps: StepResult[];
}

interface RunReport {
  schemaVersion: 'v1';
  suite: string;
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  cases: CaseResult[];
}

interface RunPlan {
  suite: Suite;
  cases: SuiteCase[];
}

export type {
  CaseResult,
  KeyCase,
  RunPlan,
  RunReport,
  RunStatus,
  ScenarioCase,
  ScenarioStep,
  StepResult,
  Suite,
  SuiteCase,
};
