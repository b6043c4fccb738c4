import type {
  AssertionFailedError,
  TestWarning
} from '../errors';

/**
 * A concrete, runnable test case
 */
export interface HostTestCase {
  kind: 'case';
  /** Owning class or file, used for annotation lookup */
  className: string;
  /** Bare method name, without any data set suffix */
  methodName: string;
  /** Display name, including the data set when there is one */
  name: string;
}

/**
 * An abstract grouping the host runner models as a test
 */
export interface HostTestGroup {
  kind: 'group';
  name: string;
}

export type HostTest = HostTestCase | HostTestGroup;

export interface HostTestSuite {
  name: string;
  /** Synthetic suite enumerating data-provider variants */
  dataProvider?: boolean;
}

export function isTestCase(test: HostTest): test is HostTestCase {
  return test.kind === 'case';
}

/**
 * Notifications a host test runner binding delivers, one per lifecycle callback.
 * Times are in milliseconds.
 */
export interface TestListener {
  addError(test: HostTest, error: Error, time: number): void;
  addWarning(test: HostTest, warning: TestWarning, time: number): void;
  addFailure(test: HostTest, failure: AssertionFailedError, time: number): void;
  addIncompleteTest(test: HostTest, error: Error, time: number): void;
  addRiskyTest(test: HostTest, error: Error, time: number): void;
  addSkippedTest(test: HostTest, error: Error, time: number): void;
  startTestSuite(suite: HostTestSuite): void;
  endTestSuite(suite: HostTestSuite): void;
  startTest(test: HostTest): void;
  endTest(test: HostTest, time: number): void;
}
