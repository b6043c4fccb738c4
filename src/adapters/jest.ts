import * as path from 'path';
import type {
  AggregatedResult,
  Reporter,
  Test,
  TestContext,
  TestResult
} from '@jest/reporters';
import {
  AdapterBridge,
  toHostError,
  type CaseOutcome,
  type ReplayedCase
} from './base/AdapterBridge';
import type { ReportingOptions } from '../config';
import {
  AssertionFailedError,
  IncompleteTestError,
  SkippedTestError
} from '../errors';
import { createReporting, type Reporting } from '../reporting';
import { Logger } from '../utils/logger';

/**
 * The parts of a Jest assertion result the reporter reads
 */
export interface JestCaseResult {
  ancestorTitles: string[];
  title: string;
  status: string;
  duration?: number | null;
  failureMessages: string[];
  failureDetails: unknown[];
}

/**
 * Why a test file could not run at all
 */
export interface JestFileError {
  message: string;
  stack?: string | null;
}

function isAssertionDetail(detail: unknown): boolean {
  if (typeof detail !== 'object' || detail === null) return false;
  if ('matcherResult' in detail) return true;
  return 'code' in detail && detail.code === 'ERR_ASSERTION';
}

export default class SuitecastJestReporter extends AdapterBridge implements Reporter {
  private reporting: Reporting;
  private logger: Logger;

  constructor(_globalConfig?: unknown, reporterOptions: ReportingOptions = {}) {
    const reporting = createReporting(reporterOptions);
    super(reporting.adapter);
    this.reporting = reporting;
    this.logger = Logger.create('jest-adapter');

    this.logger.startupPreamble([
      '==================================',
      'suitecast Jest Adapter',
      'Configuration:',
      `  - Results: ${reporting.lifecycle.getOutputDirectory() ?? 'not set'}`,
      `  - Process ID: ${process.pid}`,
      '=================================='
    ]);
  }

  onRunStart(): void {
    this.logger.lifecycle('Test run starting');
  }

  onTestFileResult(test: Test, testResult: TestResult, _aggregatedResult?: AggregatedResult): void {
    this.reportTestFile(test.path, testResult.testResults, testResult.testExecError);
  }

  /**
   * Replay one finished test file as a suite
   */
  reportTestFile(filePath: string, results: JestCaseResult[], execError?: JestFileError): void {
    const suiteName = path.relative(process.cwd(), filePath) || filePath;
    this.logger.testFlow('Replaying test file', suiteName, { tests: results.length });

    const cases = results.map(result => this.toReplayedCase(suiteName, result));
    if (execError) {
      this.logger.error('Test file failed to run', execError.message, { file: suiteName });
      cases.push({
        test: { kind: 'case', className: suiteName, methodName: suiteName, name: suiteName },
        outcome: { status: 'broken', error: toHostError(Error, execError.stack || execError.message) },
        duration: 0
      });
    }
    this.replaySuite({ name: suiteName }, cases);
  }

  async onRunComplete(_testContexts?: Set<TestContext>, results?: AggregatedResult): Promise<void> {
    this.logger.lifecycle('Test run completing', {
      totalSuites: results?.numTotalTestSuites,
      totalTests: results?.numTotalTests
    });

    try {
      await this.reporting.summary.finalize();
    } catch (error) {
      this.logger.error('Failed to write final summary', error);
    }

    this.logger.lifecycle('Jest adapter shutdown complete');
  }

  getLastError(): void {
    // Required by Reporter interface
  }

  private toReplayedCase(suiteName: string, result: JestCaseResult): ReplayedCase {
    const fullName = [...result.ancestorTitles, result.title].join(' › ');
    return {
      test: { kind: 'case', className: suiteName, methodName: fullName, name: fullName },
      outcome: this.toOutcome(result),
      duration: result.duration ?? 0
    };
  }

  private toOutcome(result: JestCaseResult): CaseOutcome {
    switch (result.status) {
      case 'passed':
      case 'focused':
        return { status: 'passed' };
      case 'failed': {
        const text = result.failureMessages.join('\n\n');
        if (result.failureDetails.some(isAssertionDetail)) {
          return { status: 'failed', error: toHostError(AssertionFailedError, text) };
        }
        return { status: 'broken', error: toHostError(Error, text) };
      }
      case 'todo':
        return { status: 'incomplete', error: new IncompleteTestError('Test is marked as todo') };
      default:
        return { status: 'skipped', error: new SkippedTestError(`Test was ${result.status}`) };
    }
  }
}
