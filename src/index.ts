export { LifecycleAdapter } from './LifecycleAdapter';
export type { ActiveSuite, LifecycleAdapterOptions } from './LifecycleAdapter';
export { createReporting, SUMMARY_FILE } from './reporting';
export type { Reporting } from './reporting';
export { resolveOptions, DEFAULT_OUTPUT_DIRECTORY } from './config';
export type { ReportingOptions, ResolvedOptions } from './config';
export {
  AssertionFailedError,
  ComparisonFailure,
  ExpectationFailedError,
  IncompleteTestError,
  RiskyTestError,
  SkippedTestError,
  TestWarning,
  summarizeException
} from './errors';
export { AnnotationRegistry, HOST_RUNNER_ANNOTATIONS } from './annotations/AnnotationProvider';
export type { Annotation, AnnotationInput, AnnotationProvider } from './annotations/AnnotationProvider';
export { AnnotationManager, SEVERITY_LEVELS } from './annotations/AnnotationManager';
export { ResultsLifecycle } from './lifecycle/ResultsLifecycle';
export type { EventLifecycle, LifecycleListener } from './lifecycle/ResultsLifecycle';
export { EventLogWriter, EVENT_LOG_FILE } from './lifecycle/EventLogWriter';
export { EventLogReader } from './lifecycle/EventLogReader';
export { ResultsSummary } from './lifecycle/ResultsSummary';
export type { SummaryCounts, SuiteRecord, TestRecord, TestStatus } from './lifecycle/ResultsSummary';
export { prepareOutputDirectory } from './utils/output-directory';
export { isTestCase } from './types/host';
export type { HostTest, HostTestCase, HostTestGroup, HostTestSuite, TestListener } from './types/host';
export { isReportEvent, isOutcomeEvent } from './types/events';
export type {
  ExceptionSummary,
  Label,
  ReportEvent,
  ReportEventType,
  TestCaseBrokenEvent,
  TestCaseCanceledEvent,
  TestCaseFailedEvent,
  TestCaseFinishedEvent,
  TestCaseOutcomeEvent,
  TestCaseOutcomeType,
  TestCasePendingEvent,
  TestCaseStartedEvent,
  TestSuiteFinishedEvent,
  TestSuiteStartedEvent
} from './types/events';
