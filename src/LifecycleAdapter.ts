import { randomUUID } from 'crypto';
import { AnnotationManager } from './annotations/AnnotationManager';
import {
  AnnotationRegistry,
  HOST_RUNNER_ANNOTATIONS,
  type AnnotationProvider
} from './annotations/AnnotationProvider';
import { DEFAULT_OUTPUT_DIRECTORY } from './config';
import {
  ExpectationFailedError,
  summarizeException,
  type AssertionFailedError,
  type TestWarning
} from './errors';
import type { EventLifecycle } from './lifecycle/ResultsLifecycle';
import type {
  ReportEvent,
  TestCaseOutcomeEvent,
  TestCaseOutcomeType,
  TestCaseStartedEvent,
  TestSuiteStartedEvent
} from './types/events';
import {
  isTestCase,
  type HostTest,
  type HostTestCase,
  type HostTestSuite,
  type TestListener
} from './types/host';
import { Logger } from './utils/logger';
import { prepareOutputDirectory } from './utils/output-directory';

export interface LifecycleAdapterOptions {
  outputDirectory?: string;
  deletePreviousResults?: boolean;
  ignoredAnnotations?: Iterable<string>;
  annotations?: AnnotationProvider;
}

export interface ActiveSuite {
  uuid: string;
  name: string;
}

/**
 * Translates host runner notifications into report events.
 *
 * Assumes the host runner calls it from a single thread, one notification at
 * a time: the active suite and test name are written only by the handlers below.
 */
export class LifecycleAdapter implements TestListener {
  private lifecycle: EventLifecycle;
  private annotations: AnnotationProvider;
  private activeSuite: ActiveSuite | null = null;
  private activeTest: { className: string; methodName: string } | null = null;
  private logger: Logger;

  constructor(lifecycle: EventLifecycle, options: LifecycleAdapterOptions = {}) {
    this.lifecycle = lifecycle;
    this.annotations = options.annotations ?? new AnnotationRegistry();
    this.logger = Logger.create('lifecycle-adapter');

    this.prepareOutputDirectory(
      options.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY,
      options.deletePreviousResults ?? false
    );

    this.annotations.addIgnoredAnnotations(HOST_RUNNER_ANNOTATIONS);
    this.annotations.addIgnoredAnnotations(options.ignoredAnnotations ?? []);
  }

  getActiveSuite(): ActiveSuite | null {
    return this.activeSuite;
  }

  getActiveTestName(): string | null {
    return this.activeTest?.methodName ?? null;
  }

  /**
   * Unexpected runtime error
   */
  addError(test: HostTest, error: Error, time: number): void {
    this.logger.testFlow('Error', test.name, { time });
    this.fire(this.outcomeEvent('testCaseBroken', test, error, error.message));
  }

  addWarning(test: HostTest, warning: TestWarning, time: number): void {
    // Warnings have no report event
    this.logger.warn('Dropping warning', { test: test.name, message: warning.message, time });
  }

  addFailure(test: HostTest, failure: AssertionFailedError, time: number): void {
    this.logger.testFlow('Failure', test.name, { time });

    let message = failure.message;
    if (failure instanceof ExpectationFailedError && failure.comparisonFailure) {
      message += failure.comparisonFailure.getDiff();
    }
    this.fire(this.outcomeEvent('testCaseFailed', test, failure, message));
  }

  addIncompleteTest(test: HostTest, error: Error, time: number): void {
    this.logger.testFlow('Incomplete', test.name, { time });
    this.fire(this.outcomeEvent('testCasePending', test, error));
  }

  addRiskyTest(test: HostTest, error: Error, time: number): void {
    this.addIncompleteTest(test, error, time);
  }

  /**
   * Runners may report a skip without ever starting the test; such tests get
   * a synthetic start and end around the cancellation.
   */
  addSkippedTest(test: HostTest, error: Error, time: number): void {
    let bracket = false;
    if (isTestCase(test) && !this.isActiveTest(test)) {
      this.logger.decision('Skipped test was never started', 'bracket', test.name);
      bracket = true;
      this.startTest(test);
    }

    this.fire(this.outcomeEvent('testCaseCanceled', test, error, error.message));

    if (bracket) {
      this.endTest(test, time);
    }
  }

  startTestSuite(suite: HostTestSuite): void {
    if (suite.dataProvider) {
      this.logger.debug('Ignoring data provider suite start', { suite: suite.name });
      return;
    }

    const uuid = randomUUID();
    this.activeSuite = { uuid, name: suite.name };
    this.activeTest = null;
    this.logger.lifecycle('Suite starting', { suite: suite.name, uuid });

    const event: TestSuiteStartedEvent = {
      eventType: 'testSuiteStarted',
      timestamp: Date.now(),
      payload: { uuid, name: suite.name, labels: [] }
    };
    if (this.annotations.hasClass(suite.name)) {
      new AnnotationManager(this.annotations.getClassAnnotations(suite.name)).updateTestSuiteEvent(event);
    }
    this.fire(event);
  }

  endTestSuite(suite: HostTestSuite): void {
    if (suite.dataProvider) {
      this.logger.debug('Ignoring data provider suite end', { suite: suite.name });
      return;
    }

    this.logger.lifecycle('Suite finished', { suite: suite.name });
    this.fire({
      eventType: 'testSuiteFinished',
      timestamp: Date.now(),
      payload: { uuid: this.activeSuite?.uuid ?? null }
    });
  }

  startTest(test: HostTest): void {
    if (!isTestCase(test)) return;

    this.activeTest = { className: test.className, methodName: test.methodName };
    this.logger.testFlow('Test starting', test.name);

    const event: TestCaseStartedEvent = {
      eventType: 'testCaseStarted',
      timestamp: Date.now(),
      payload: { suiteUuid: this.suiteUuid(), name: test.name, labels: [] }
    };
    if (this.annotations.hasMethod(test.className, test.methodName)) {
      new AnnotationManager(
        this.annotations.getMethodAnnotations(test.className, test.methodName)
      ).updateTestCaseEvent(event);
    }
    this.fire(event);
  }

  endTest(test: HostTest, time: number): void {
    if (!isTestCase(test)) return;

    this.logger.testFlow('Test finished', test.name, { time });
    this.activeTest = null;
    this.fire({
      eventType: 'testCaseFinished',
      timestamp: Date.now(),
      payload: { suiteUuid: this.suiteUuid(), name: test.name }
    });
  }

  private prepareOutputDirectory(outputDirectory: string, deletePreviousResults: boolean): void {
    const removed = prepareOutputDirectory(outputDirectory, deletePreviousResults);
    if (removed > 0) {
      this.logger.info('Deleted previous results', { outputDirectory, removed });
    }

    if (this.lifecycle.getOutputDirectory() === null) {
      this.lifecycle.setOutputDirectory(outputDirectory);
    } else {
      this.logger.decision('Output directory already configured', 'keep existing', outputDirectory);
    }
  }

  private isActiveTest(test: HostTestCase): boolean {
    return this.activeTest !== null
      && this.activeTest.className === test.className
      && this.activeTest.methodName === test.methodName;
  }

  private suiteUuid(): string | null {
    return this.activeSuite?.uuid ?? null;
  }

  private outcomeEvent<T extends TestCaseOutcomeType>(
    eventType: T,
    test: HostTest,
    error: Error,
    message?: string
  ): TestCaseOutcomeEvent<T> {
    const event: TestCaseOutcomeEvent<T> = {
      eventType,
      timestamp: Date.now(),
      payload: {
        suiteUuid: this.suiteUuid(),
        name: test.name,
        exception: summarizeException(error)
      }
    };
    if (message !== undefined) {
      event.payload.message = message;
    }
    return event;
  }

  private fire(event: ReportEvent): void {
    this.lifecycle.fire(event);
  }
}
