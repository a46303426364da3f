/** A command the user invoked could not run; shown on the status line. */
class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export { CommandError };
