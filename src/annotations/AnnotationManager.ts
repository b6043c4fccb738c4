import type { Annotation } from './AnnotationProvider';
import type { Label, TestCaseStartedEvent, TestSuiteStartedEvent } from '../types/events';
import { Logger } from '../utils/logger';

export const SEVERITY_LEVELS = ['blocker', 'critical', 'normal', 'minor', 'trivial'] as const;

export type SeverityLevel = typeof SEVERITY_LEVELS[number];

interface Describable {
  title?: string;
  description?: string;
  labels: Label[];
}

function isSeverity(value: string): value is SeverityLevel {
  return SEVERITY_LEVELS.some(level => level === value);
}

/**
 * Applies annotation metadata to started events
 */
export class AnnotationManager {
  private annotations: Annotation[];
  private logger: Logger;

  constructor(annotations: Annotation[]) {
    this.annotations = annotations;
    this.logger = Logger.create('annotation-manager');
  }

  updateTestSuiteEvent(event: TestSuiteStartedEvent): void {
    this.apply(event.payload);
  }

  updateTestCaseEvent(event: TestCaseStartedEvent): void {
    this.apply(event.payload);
  }

  private apply(target: Describable): void {
    for (const { name, value } of this.annotations) {
      switch (name) {
        case 'title':
          target.title = value;
          break;
        case 'description':
          target.description = value;
          break;
        case 'severity':
          if (isSeverity(value)) {
            target.labels.push({ name, value });
          } else {
            this.logger.warn('Ignoring unknown severity', { value, allowed: SEVERITY_LEVELS.join(',') });
          }
          break;
        default:
          target.labels.push({ name, value });
      }
    }
  }
}
