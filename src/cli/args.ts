interface RunOptions {
  suitePath?: string;
  caseName?: string;
  report?: string;
}

function parseArgs(argv: string[]): RunOptions {
  const args = argv.slice(2);
  const options: RunOptions = {};

  let index = 0;
  while (index < args.length) {
    const value = args[index];
    if (!value) {
      index += 1;
      continue;
    }
    if (value === '--suite') {
      options.suitePath = args[index + 1];
      index += 2;
      continue;
    }
    if (value === '--case') {
      options.caseName = args[index + 1];
      index += 2;
      continue;
    }
    if (value === '--report') {
      options.report = args[index + 1];
      index += 2;
      continue;
    }
    index += 1;
  }

  return options;
}

export type { RunOptions };
export { parseArgs };
