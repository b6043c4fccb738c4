export interface Label {
  name: string;
  value: string;
}

export interface ExceptionSummary {
  name: string;
  message: string;
  stackTrace?: string;
}

export interface TestSuiteStartedEvent {
  eventType: 'testSuiteStarted';
  timestamp: number;
  payload: {
    uuid: string;
    name: string;
    title?: string;
    description?: string;
    labels: Label[];
  };
}

export interface TestSuiteFinishedEvent {
  eventType: 'testSuiteFinished';
  timestamp: number;
  payload: {
    uuid: string | null;
  };
}

export interface TestCaseStartedEvent {
  eventType: 'testCaseStarted';
  timestamp: number;
  payload: {
    suiteUuid: string | null;
    name: string;
    title?: string;
    description?: string;
    labels: Label[];
  };
}

export interface TestCaseFinishedEvent {
  eventType: 'testCaseFinished';
  timestamp: number;
  payload: {
    suiteUuid: string | null;
    name: string;
  };
}

export type TestCaseOutcomeType = 'testCaseFailed' | 'testCaseBroken' | 'testCaseCanceled' | 'testCasePending';

export interface TestCaseOutcomeEvent<T extends TestCaseOutcomeType = TestCaseOutcomeType> {
  eventType: T;
  timestamp: number;
  payload: {
    suiteUuid: string | null;
    name: string;
    message?: string;
    exception?: ExceptionSummary;
  };
}

export type TestCaseFailedEvent = TestCaseOutcomeEvent<'testCaseFailed'>;
export type TestCaseBrokenEvent = TestCaseOutcomeEvent<'testCaseBroken'>;
export type TestCaseCanceledEvent = TestCaseOutcomeEvent<'testCaseCanceled'>;
export type TestCasePendingEvent = TestCaseOutcomeEvent<'testCasePending'>;

export type ReportEvent =
  | TestSuiteStartedEvent
  | TestSuiteFinishedEvent
  | TestCaseStartedEvent
  | TestCaseFinishedEvent
  | TestCaseFailedEvent
  | TestCaseBrokenEvent
  | TestCaseCanceledEvent
  | TestCasePendingEvent;

export type ReportEventType = ReportEvent['eventType'];

export const OUTCOME_EVENT_TYPES: readonly TestCaseOutcomeType[] = [
  'testCaseFailed',
  'testCaseBroken',
  'testCaseCanceled',
  'testCasePending'
];

const EVENT_TYPES: readonly string[] = [
  'testSuiteStarted',
  'testSuiteFinished',
  'testCaseStarted',
  'testCaseFinished',
  ...OUTCOME_EVENT_TYPES
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow shape check for events read back from an event log
 */
export function isReportEvent(value: unknown): value is ReportEvent {
  if (!isRecord(value)) return false;
  if (typeof value.eventType !== 'string' || !EVENT_TYPES.includes(value.eventType)) return false;
  if (typeof value.timestamp !== 'number') return false;
  const payload = value.payload;
  if (!isRecord(payload)) return false;

  switch (value.eventType) {
    case 'testSuiteStarted':
      return typeof payload.uuid === 'string' && typeof payload.name === 'string' && Array.isArray(payload.labels);
    case 'testSuiteFinished':
      return payload.uuid === null || typeof payload.uuid === 'string';
    case 'testCaseStarted':
      return typeof payload.name === 'string' && Array.isArray(payload.labels);
    default:
      return typeof payload.name === 'string';
  }
}

export function isOutcomeEvent(event: ReportEvent): event is TestCaseOutcomeEvent {
  return OUTCOME_EVENT_TYPES.some(type => type === event.eventType);
}
