import { promises as fs } from 'fs';
import debounce from 'lodash.debounce';
import type { ReportEvent } from '../types/events';
import { Logger } from '../utils/logger';

export type TestStatus = 'RUNNING' | 'PASSED' | 'FAILED' | 'BROKEN' | 'CANCELED' | 'PENDING';

export interface TestRecord {
  name: string;
  status: TestStatus;
  message?: string;
}

export interface SuiteRecord {
  uuid: string | null;
  name: string;
  status: 'RUNNING' | 'COMPLETE';
  tests: TestRecord[];
}

export interface SummaryCounts {
  suites: number;
  tests: number;
  passed: number;
  failed: number;
  broken: number;
  canceled: number;
  pending: number;
}

const OUTCOME_STATUS = {
  testCaseFailed: 'FAILED',
  testCaseBroken: 'BROKEN',
  testCaseCanceled: 'CANCELED',
  testCasePending: 'PENDING'
} as const;

/**
 * Aggregates the event stream into per-suite test outcomes
 */
export class ResultsSummary {
  private suites: SuiteRecord[] = [];
  private currentTest: TestRecord | null = null;
  private summaryPath: string | null;
  private debouncedWrite: (() => void) & { cancel(): void };
  private logger: Logger;

  /**
   * @param summaryPath - when set, the Markdown summary is rewritten there as events arrive
   */
  constructor(summaryPath: string | null = null) {
    this.summaryPath = summaryPath;
    this.logger = Logger.create('results-summary');

    // Debounced write function - batches updates every 250ms
    this.debouncedWrite = debounce(() => {
      this.logger.debug('Debounced write triggered');
      this.writeSummary().catch(error => {
        this.logger.error('Failed to write summary', error);
      });
    }, 250, { maxWait: 1000 });
  }

  handleEvent(event: ReportEvent): void {
    switch (event.eventType) {
      case 'testSuiteStarted':
        this.suites.push({ uuid: event.payload.uuid, name: event.payload.name, status: 'RUNNING', tests: [] });
        break;

      case 'testSuiteFinished': {
        const suite = this.findSuite(event.payload.uuid);
        if (suite) suite.status = 'COMPLETE';
        break;
      }

      case 'testCaseStarted': {
        const test: TestRecord = { name: event.payload.name, status: 'RUNNING' };
        this.currentTest = test;
        this.suiteFor(event.payload.suiteUuid).tests.push(test);
        break;
      }

      case 'testCaseFinished':
        if (this.currentTest?.status === 'RUNNING') {
          this.currentTest.status = 'PASSED';
        }
        this.currentTest = null;
        break;

      case 'testCaseFailed':
      case 'testCaseBroken':
      case 'testCaseCanceled':
      case 'testCasePending':
        // Outcomes are absorbing: the first one reported sticks
        if (this.currentTest?.status === 'RUNNING') {
          this.currentTest.status = OUTCOME_STATUS[event.eventType];
          this.currentTest.message = event.payload.message;
        } else if (!this.currentTest) {
          this.logger.warn('Outcome received with no test running', { eventType: event.eventType, name: event.payload.name });
        }
        break;
    }

    if (this.summaryPath) {
      this.debouncedWrite();
    }
  }

  /**
   * A snapshot; later events do not change the returned records
   */
  getSuites(): SuiteRecord[] {
    return this.suites.map(suite => ({ ...suite, tests: suite.tests.map(test => ({ ...test })) }));
  }

  getCounts(): SummaryCounts {
    const tests = this.suites.flatMap(suite => suite.tests);
    const count = (status: TestStatus): number => tests.filter(test => test.status === status).length;
    return {
      suites: this.suites.length,
      tests: tests.length,
      passed: count('PASSED'),
      failed: count('FAILED'),
      broken: count('BROKEN'),
      canceled: count('CANCELED'),
      pending: count('PENDING')
    };
  }

  hasFailures(): boolean {
    const counts = this.getCounts();
    return counts.failed > 0 || counts.broken > 0;
  }

  render(): string {
    const counts = this.getCounts();
    const lines = [
      '# Test Results Summary',
      '',
      `- Suites: ${counts.suites}`,
      `- Tests: ${counts.tests}`,
      `- Passed: ${counts.passed}`,
      `- Failed: ${counts.failed}`,
      `- Broken: ${counts.broken}`,
      `- Canceled: ${counts.canceled}`,
      `- Pending: ${counts.pending}`
    ];

    for (const suite of this.suites) {
      lines.push('', `## ${suite.name} (${suite.status})`, '| Status | Test | Message |', '| --- | --- | --- |');
      for (const test of suite.tests) {
        const message = test.message ? this.escapeCell(test.message) : '';
        lines.push(`| ${test.status} | ${this.escapeCell(test.name)} | ${message} |`);
      }
    }

    return lines.join('\n') + '\n';
  }

  /**
   * Cancel any pending debounced write and write the final summary
   */
  async finalize(): Promise<void> {
    this.logger.lifecycle('Finalizing summary', { ...this.getCounts() });
    this.debouncedWrite.cancel();
    await this.writeSummary();
  }

  private async writeSummary(): Promise<void> {
    if (!this.summaryPath) return;
    const markdown = this.render();
    await fs.writeFile(this.summaryPath, markdown);
    this.logger.debug('Summary written', { path: this.summaryPath, size: markdown.length });
  }

  private findSuite(uuid: string | null): SuiteRecord | undefined {
    return this.suites.find(suite => suite.uuid === uuid);
  }

  private suiteFor(uuid: string | null): SuiteRecord {
    let suite = this.findSuite(uuid);
    if (!suite) {
      // Tests reported outside any suite are grouped together
      suite = { uuid, name: '(no suite)', status: 'RUNNING', tests: [] };
      this.suites.push(suite);
    }
    return suite;
  }

  private escapeCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
  }
}
