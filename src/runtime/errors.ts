/** Base class for failures the harness itself reports. */
class HarnessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The builder was asked for something the in-process application cannot do. */
class ConfigurationError extends HarnessError {}

class PrematureExitError extends HarnessError {
  constructor(readonly step: number) {
    super(`Application exited before the last step (step ${step + 1})`);
  }
}

class ExitExpectationError extends HarnessError {
  constructor(
    readonly expected: boolean,
    readonly actual: boolean,
  ) {
    super(
      expected
        ? 'Expected the application to exit after the last step, but it is still running'
        : 'Application exited after the last step, but no exit was expected',
    );
  }
}

class ShutdownTimeoutError extends HarnessError {
  constructor(readonly timeoutMs: number) {
    super(`Application did not shut down within ${timeoutMs}ms`);
  }
}

class CloseError extends HarnessError {
  constructor(readonly errors: readonly Error[]) {
    super(`Closing the application failed with ${errors.length} error(s)`);
  }
}

export {
  CloseError,
  ConfigurationError,
  ExitExpectationError,
  HarnessError,
  PrematureExitError,
  ShutdownTimeoutError,
};
