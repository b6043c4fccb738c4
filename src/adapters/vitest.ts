import * as path from 'path';
import type { Reporter } from 'vitest';
import {
  AdapterBridge,
  type CaseOutcome,
  type ReplayedCase
} from './base/AdapterBridge';
import type { ReportingOptions } from '../config';
import {
  ComparisonFailure,
  ExpectationFailedError,
  IncompleteTestError,
  SkippedTestError
} from '../errors';
import { createReporting, type Reporting } from '../reporting';
import { Logger } from '../utils/logger';

/**
 * The parts of a Vitest task the reporter reads
 */
export interface VitestTask {
  type: string;
  name: string;
  mode: string;
  tasks?: VitestTask[];
  result?: {
    state?: string;
    duration?: number;
    errors?: unknown[];
  };
}

export interface VitestFile extends VitestTask {
  filepath: string;
}

interface ReportedError {
  name: string;
  message: string;
  stack?: string;
  diff?: string;
  expected?: string;
  actual?: string;
}

function readString(value: object, key: string): string | undefined {
  if (!(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function toBrokenError(reported: ReportedError): Error {
  const error = new Error(reported.message);
  error.name = reported.name;
  error.stack = reported.stack ?? reported.message;
  return error;
}

function readError(value: unknown): ReportedError {
  if (typeof value === 'string') {
    return { name: 'Error', message: value };
  }
  if (typeof value !== 'object' || value === null) {
    return { name: 'Error', message: String(value) };
  }
  return {
    name: readString(value, 'name') ?? 'Error',
    message: readString(value, 'message') ?? '',
    stack: readString(value, 'stack'),
    diff: readString(value, 'diff'),
    expected: readString(value, 'expected'),
    actual: readString(value, 'actual')
  };
}

export default class SuitecastVitestReporter extends AdapterBridge implements Reporter {
  private reporting: Reporting;
  private logger: Logger;

  constructor(options: ReportingOptions = {}) {
    const reporting = createReporting(options);
    super(reporting.adapter);
    this.reporting = reporting;
    this.logger = Logger.create('vitest-adapter');

    this.logger.startupPreamble([
      '==================================',
      'suitecast Vitest Adapter',
      'Configuration:',
      `  - Results: ${reporting.lifecycle.getOutputDirectory() ?? 'not set'}`,
      `  - Process ID: ${process.pid}`,
      '=================================='
    ]);
  }

  onInit(): void {
    this.logger.lifecycle('Test run initializing');
  }

  async onFinished(files: VitestFile[] = [], errors: unknown[] = []): Promise<void> {
    this.logger.lifecycle('Test run finishing', { files: files.length, errors: errors.length });

    for (const file of files) {
      this.reportFile(file);
    }
    if (errors.length > 0) {
      this.reportUnhandledErrors(errors);
    }

    try {
      await this.reporting.summary.finalize();
    } catch (error) {
      this.logger.error('Failed to write final summary', error);
    }

    this.logger.lifecycle('Vitest adapter shutdown complete');
  }

  /**
   * Replay one finished test file as a suite
   */
  reportFile(file: VitestFile): void {
    const suiteName = path.relative(process.cwd(), file.filepath) || file.filepath;
    const cases: ReplayedCase[] = [];
    this.collectCases(suiteName, file.tasks ?? [], [], cases);

    // Collection and hook errors belong to the file, not to any one test
    const fileErrors = file.result?.errors ?? [];
    if (fileErrors.length > 0 || (file.result?.state === 'fail' && cases.length === 0)) {
      const reported = fileErrors.length > 0
        ? readError(fileErrors[0])
        : { name: 'Error', message: 'Test file failed' };
      this.logger.error('Test file failed', reported.message, { file: suiteName });
      cases.push({
        test: { kind: 'case', className: suiteName, methodName: suiteName, name: suiteName },
        outcome: { status: 'broken', error: toBrokenError(reported) },
        duration: file.result?.duration ?? 0
      });
    }

    this.logger.testFlow('Replaying test file', suiteName, { tests: cases.length });
    this.replaySuite({ name: suiteName }, cases);
  }

  /**
   * Errors raised outside any test are replayed as one suite of broken cases
   */
  reportUnhandledErrors(errors: unknown[]): void {
    const suiteName = 'Unhandled errors';
    this.logger.error('Unhandled errors during the run', undefined, { count: errors.length });
    const cases = errors.map((value, index): ReplayedCase => {
      const name = `Unhandled error #${index + 1}`;
      return {
        test: { kind: 'case', className: suiteName, methodName: name, name },
        outcome: { status: 'broken', error: toBrokenError(readError(value)) },
        duration: 0
      };
    });
    this.replaySuite({ name: suiteName }, cases);
  }

  private collectCases(suiteName: string, tasks: VitestTask[], titles: string[], cases: ReplayedCase[]): void {
    for (const task of tasks) {
      if (task.type === 'suite') {
        this.collectCases(suiteName, task.tasks ?? [], [...titles, task.name], cases);
        continue;
      }

      const fullName = [...titles, task.name].join(' › ');
      cases.push({
        test: { kind: 'case', className: suiteName, methodName: fullName, name: fullName },
        outcome: this.toOutcome(task),
        duration: task.result?.duration ?? 0
      });
    }
  }

  private toOutcome(task: VitestTask): CaseOutcome {
    const state = task.result?.state;

    if (task.mode === 'todo' || state === 'todo') {
      return { status: 'incomplete', error: new IncompleteTestError('Test is marked as todo') };
    }
    if (state === 'pass') {
      return { status: 'passed' };
    }
    if (state === 'fail') {
      const errors = (task.result?.errors ?? []).map(readError);
      const first = errors[0] ?? { name: 'Error', message: 'Test failed' };
      const text = first.stack ?? first.message;

      if (first.name === 'AssertionError') {
        const comparison = first.diff !== undefined
          ? new ComparisonFailure(first.expected ?? '', first.actual ?? '', `\n${first.diff}`)
          : undefined;
        const failure = new ExpectationFailedError(first.message, comparison);
        failure.stack = text;
        return { status: 'failed', error: failure };
      }

      return { status: 'broken', error: toBrokenError(first) };
    }

    // Skipped, or never ran
    return { status: 'skipped', error: new SkippedTestError(state === 'skip' || task.mode === 'skip' ? 'Test was skipped' : 'Test did not run') };
  }
}
