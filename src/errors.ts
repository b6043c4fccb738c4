import type { ExceptionSummary } from './types/events';

/**
 * Expected and actual values of a failed comparison, with their rendered diff
 */
export class ComparisonFailure {
  constructor(
    readonly expected: string,
    readonly actual: string,
    private readonly diff?: string
  ) {}

  getDiff(): string {
    if (this.diff !== undefined) {
      return this.diff;
    }

    const expectedLines = this.expected.split('\n');
    const actualLines = this.actual.split('\n');
    const lines = ['', '--- Expected', '+++ Actual', '@@ @@'];
    const length = Math.max(expectedLines.length, actualLines.length);

    for (let i = 0; i < length; i++) {
      const expectedLine = expectedLines[i];
      const actualLine = actualLines[i];
      if (expectedLine === actualLine) {
        lines.push(` ${expectedLine}`);
        continue;
      }
      if (expectedLine !== undefined) lines.push(`-${expectedLine}`);
      if (actualLine !== undefined) lines.push(`+${actualLine}`);
    }

    return lines.join('\n') + '\n';
  }
}

export class AssertionFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssertionFailedError';
  }
}

export class ExpectationFailedError extends AssertionFailedError {
  constructor(message: string, readonly comparisonFailure?: ComparisonFailure) {
    super(message);
    this.name = 'ExpectationFailedError';
  }
}

export class IncompleteTestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IncompleteTestError';
  }
}

export class RiskyTestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RiskyTestError';
  }
}

export class SkippedTestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SkippedTestError';
  }
}

export class TestWarning extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TestWarning';
  }
}

export function summarizeException(error: Error): ExceptionSummary {
  const summary: ExceptionSummary = {
    name: error.name,
    message: error.message
  };
  if (error.stack) {
    summary.stackTrace = error.stack;
  }
  return summary;
}
