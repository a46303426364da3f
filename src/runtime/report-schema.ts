import { z } from 'zod';

const runStatusSchema = z.enum(['passed', 'failed', 'skipped']);

const stepResultSchema = z.object({
  index: z.number().int().nonnegative(),
  keys: z.union([z.string(), z.literal(null)]),
  status: runStatusSchema,
  durationMs: z.number().int().nonnegative(),
  error: z.union([z.string().min(1), z.literal(null)]),
});

const caseResultSchema = z.object({
  name: z.string().min(1),
  status: runStatusSchema,
  durationMs: z.number().int().nonnegative(),
  error: z.union([z.string().min(1), z.literal(null)]),
  steps: z.array(stepResultSchema),
});

const reportSchema = z.object({
  schemaVersion: z.literal('v1'),
  suite: z.string().min(1),
  startedAt: z.string().min(1),
  finishedAt: z.string().min(1),
  status: runStatusSchema,
  cases: z.array(caseResultSchema).min(1),
});

type ReportSchema = z.infer<typeof reportSchema>;

type CaseResultSchema = z.infer<typeof caseResultSchema>;

type StepResultSchema = z.infer<typeof stepResultSchema>;

export {
  caseResultSchema,
  reportSchema,
  stepResultSchema,
  type CaseResultSchema,
  type ReportSchema,
  type StepResultSchema,
};
