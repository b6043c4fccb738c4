import {
  AssertionFailedError,
  IncompleteTestError,
  SkippedTestError
} from '../../errors';
import type { HostTestCase, HostTestSuite, TestListener } from '../../types/host';

export type CaseOutcome =
  | { status: 'passed' }
  | { status: 'failed'; error: AssertionFailedError }
  | { status: 'broken'; error: Error }
  | { status: 'incomplete'; error: IncompleteTestError }
  | { status: 'skipped'; error: SkippedTestError };

export interface ReplayedCase {
  test: HostTestCase;
  outcome: CaseOutcome;
  /** Milliseconds */
  duration: number;
}

/**
 * Split a runner failure text into its message and the stack frames after it
 */
export function splitFailureText(text: string): { message: string; stack: string } {
  const frameIndex = text.search(/\n\s+at /);
  const head = frameIndex === -1 ? text : text.slice(0, frameIndex);
  const message = head.replace(/^[A-Za-z]*Error(?: \[[A-Z_]+\])?: /, '').trim();
  return { message, stack: text };
}

/**
 * Build a host error whose stack is the runner's, not the reporter's
 */
export function toHostError<E extends Error>(
  ErrorClass: new (message: string) => E,
  text: string
): E {
  const { message, stack } = splitFailureText(text);
  const error = new ErrorClass(message);
  error.stack = stack;
  return error;
}

/**
 * Bridges runners that report results after the fact: each finished file is
 * replayed into the listener as an ordered run of notifications.
 */
export abstract class AdapterBridge {
  protected listener: TestListener;

  constructor(listener: TestListener) {
    this.listener = listener;
  }

  protected replaySuite(suite: HostTestSuite, cases: ReplayedCase[]): void {
    this.listener.startTestSuite(suite);
    for (const replayed of cases) {
      this.replayCase(replayed);
    }
    this.listener.endTestSuite(suite);
  }

  private replayCase({ test, outcome, duration }: ReplayedCase): void {
    if (outcome.status === 'skipped') {
      // Never started; the listener brackets it
      this.listener.addSkippedTest(test, outcome.error, duration);
      return;
    }

    this.listener.startTest(test);
    switch (outcome.status) {
      case 'failed':
        this.listener.addFailure(test, outcome.error, duration);
        break;
      case 'broken':
        this.listener.addError(test, outcome.error, duration);
        break;
      case 'incomplete':
        this.listener.addIncompleteTest(test, outcome.error, duration);
        break;
      case 'passed':
        break;
    }
    this.listener.endTest(test, duration);
  }
}
