import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { LifecycleAdapter } from '../../../src/LifecycleAdapter';
import { ResultsLifecycle } from '../../../src/lifecycle/ResultsLifecycle';
import { ResultsSummary } from '../../../src/lifecycle/ResultsSummary';
import {
  AssertionFailedError,
  IncompleteTestError,
  SkippedTestError
} from '../../../src/errors';
import type { HostTestCase } from '../../../src/types/host';

function testCase(methodName: string): HostTestCase {
  return { kind: 'case', className: 'SuiteA', methodName, name: methodName };
}

describe('ResultsSummary', () => {
  let tempDir: string;
  let lifecycle: ResultsLifecycle;
  let adapter: LifecycleAdapter;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suitecast-summary-'));
    lifecycle = new ResultsLifecycle();
    adapter = new LifecycleAdapter(lifecycle, { outputDirectory: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function runSuite(): void {
    const foo = testCase('testFoo');
    const bar = testCase('testBar');
    adapter.startTestSuite({ name: 'SuiteA' });
    adapter.startTest(foo);
    adapter.addFailure(foo, new AssertionFailedError('expected 1, got 2'), 0);
    adapter.endTest(foo, 0);
    adapter.startTest(bar);
    adapter.endTest(bar, 0);
    adapter.endTestSuite({ name: 'SuiteA' });
  }

  it('should count outcomes per status', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));

    adapter.startTestSuite({ name: 'SuiteA' });
    adapter.startTest(testCase('testPass'));
    adapter.endTest(testCase('testPass'), 0);
    adapter.startTest(testCase('testBroken'));
    adapter.addError(testCase('testBroken'), new Error('boom'), 0);
    adapter.endTest(testCase('testBroken'), 0);
    adapter.addSkippedTest(testCase('testSkipped'), new SkippedTestError('skip'), 0);
    adapter.startTest(testCase('testIncomplete'));
    adapter.addIncompleteTest(testCase('testIncomplete'), new IncompleteTestError('later'), 0);
    adapter.endTest(testCase('testIncomplete'), 0);
    adapter.endTestSuite({ name: 'SuiteA' });

    expect(summary.getCounts()).toEqual({
      suites: 1,
      tests: 4,
      passed: 1,
      failed: 0,
      broken: 1,
      canceled: 1,
      pending: 1
    });
    expect(summary.hasFailures()).toBe(true);
    expect(summary.getSuites()[0].status).toBe('COMPLETE');
  });

  it('should return suites the caller cannot change', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));
    runSuite();

    const suites = summary.getSuites();
    suites[0].tests[0].status = 'PASSED';
    suites.pop();

    expect(summary.getCounts()).toMatchObject({ suites: 1, failed: 1, passed: 1 });
  });

  it('should keep the first outcome of a test', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));
    const foo = testCase('testFoo');

    adapter.startTestSuite({ name: 'SuiteA' });
    adapter.startTest(foo);
    adapter.addFailure(foo, new AssertionFailedError('first'), 0);
    adapter.addError(foo, new Error('second'), 0);
    adapter.endTest(foo, 0);

    expect(summary.getSuites()[0].tests).toEqual([
      { name: 'testFoo', status: 'FAILED', message: 'first' }
    ]);
  });

  it('should render a Markdown table per suite', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));

    runSuite();

    expect(summary.render()).toBe([
      '# Test Results Summary',
      '',
      '- Suites: 1',
      '- Tests: 2',
      '- Passed: 1',
      '- Failed: 1',
      '- Broken: 0',
      '- Canceled: 0',
      '- Pending: 0',
      '',
      '## SuiteA (COMPLETE)',
      '| Status | Test | Message |',
      '| --- | --- | --- |',
      '| FAILED | testFoo | expected 1, got 2 |',
      '| PASSED | testBar |  |',
      ''
    ].join('\n'));
  });

  it('should group tests reported outside a suite', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));

    adapter.startTest(testCase('testLoose'));
    adapter.endTest(testCase('testLoose'), 0);

    expect(summary.getSuites()).toEqual([
      { uuid: null, name: '(no suite)', status: 'RUNNING', tests: [{ name: 'testLoose', status: 'PASSED' }] }
    ]);
  });

  it('should escape table cells', () => {
    const summary = new ResultsSummary();
    lifecycle.addListener(event => summary.handleEvent(event));

    adapter.startTestSuite({ name: 'SuiteA' });
    adapter.startTest(testCase('a|b'));
    adapter.addFailure(testCase('a|b'), new AssertionFailedError('line one\nline two'), 0);
    adapter.endTest(testCase('a|b'), 0);

    expect(summary.render()).toContain('| FAILED | a\\|b | line one line two |');
  });

  it('should write the summary file on finalize', async () => {
    const summaryPath = path.join(tempDir, 'summary.md');
    const summary = new ResultsSummary(summaryPath);
    lifecycle.addListener(event => summary.handleEvent(event));

    runSuite();
    await summary.finalize();

    const content = await fs.readFile(summaryPath, 'utf8');
    expect(content).toBe(summary.render());
  });
});
