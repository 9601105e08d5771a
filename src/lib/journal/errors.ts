/**
 * Errors raised by the journal engine.
 *
 * Missing data is never an error: it travels as an undefined Measure.
 * These classes cover caller mistakes and a misbehaving log store.
 */

export class JournalError extends Error {
  code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = 'JournalError';
    this.code = code;
  }
}

export class InvalidInputError extends JournalError {
  issues: string[];
  constructor(message: string, issues: string[] = []) {
    super('invalid_input', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

/** The log store answered, but with data the engine cannot trust */
export class LogStoreError extends JournalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('log_store_failure', message);
    this.name = 'LogStoreError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
