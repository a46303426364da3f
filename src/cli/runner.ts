import fs from 'node:fs';
import path from 'node:path';
import {
  expandSuiteMacros,
  mergeMacros,
  parseMacroFile,
  parseSuite,
} from '../load/loader.js';
import { getLogger } from '../logger.js';
import { buildRunPlan } from '../runtime/plan.js';
import { reportSchema } from '../runtime/report-schema.js';
import { runSuite } from '../runtime/suite.js';
import type { RunReport } from '../runtime/types.js';
import { ensureDir, readJson, readJsonFiles } from './io.js';
import { resolveSuitePaths } from './paths.js';
import type { RunOptions } from './args.js';

async function runFromOptions(options: RunOptions): Promise<RunReport> {
  const suitePath = options.suitePath;
  if (!suitePath) {
    throw new Error('Missing --suite path');
  }

  const paths = resolveSuitePaths(suitePath);
  const suite = parseSuite(readJson(paths.suitePath));
  const macros = mergeMacros(
    readJsonFiles(paths.macrosDir).map((file) => parseMacroFile(file)),
  );
  getLogger().debug('cli', `loaded ${Object.keys(macros).length} macro(s) from ${paths.macrosDir}`);

  const plan = buildRunPlan(expandSuiteMacros(suite, macros), options.caseName);
  const report = await runSuite(plan, { baseDir: paths.rootDir });

  const parsed = reportSchema.parse(report);
  await emitReport(parsed, options);

  return parsed;
}

async function emitReport(report: RunReport, options: RunOptions): Promise<void> {
  const reportTarget = options.report;
  const payload = JSON.stringify(report, null, 2);
  if (!reportTarget || reportTarget === 'stdout') {
    process.stdout.write(`${payload}\n`);
    return;
  }
  const outputPath = path.resolve(reportTarget);
  ensureDir(path.dirname(outputPath));
  await fs.promises.writeFile(outputPath, payload, 'utf8');
}

export { emitReport, runFromOptions };
