import * as fs from 'fs';
import * as path from 'path';
import type { ReportEvent } from '../types/events';
import type { EventLifecycle } from './ResultsLifecycle';
import { Logger } from '../utils/logger';

export const EVENT_LOG_FILE = 'events.jsonl';

/**
 * Appends every fired event as one JSON line under the lifecycle's output directory
 */
export class EventLogWriter {
  private lifecycle: EventLifecycle;
  private fileName: string;
  private logger: Logger;

  constructor(lifecycle: EventLifecycle, fileName: string = EVENT_LOG_FILE) {
    this.lifecycle = lifecycle;
    this.fileName = fileName;
    this.logger = Logger.create('event-log-writer');
  }

  getLogPath(): string | null {
    const outputDirectory = this.lifecycle.getOutputDirectory();
    return outputDirectory === null ? null : path.join(outputDirectory, this.fileName);
  }

  /**
   * Synchronous, so the file keeps the order events were fired in
   */
  write(event: ReportEvent): void {
    const logPath = this.getLogPath();
    if (logPath === null) {
      this.logger.warn('No output directory configured, dropping event', { eventType: event.eventType });
      return;
    }

    const line = JSON.stringify(event) + '\n';
    fs.appendFileSync(logPath, line, 'utf8');
  }
}
