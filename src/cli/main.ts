#!/usr/bin/env node
import { getLogger } from '../logger.js';
import { parseArgs } from './args.js';
import { runFromOptions } from './runner.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  const report = await runFromOptions(options);
  if (report.status === 'failed') {
    const failed = report.cases.filter((entry) => entry.status === 'failed');
    getLogger().error('cli', `${failed.length} of ${report.cases.length} case(s) failed`);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
