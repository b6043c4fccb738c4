import { promises as fs } from 'fs';
import { watch, type FSWatcher } from 'chokidar';
import { isReportEvent, type ReportEvent } from '../types/events';
import { Logger } from '../utils/logger';

export class EventLogReader {
  private logPath: string;
  private lastReadPosition: number = 0;
  private watcher: FSWatcher | null = null;
  private processing: Promise<void> = Promise.resolve();
  private logger: Logger;

  constructor(logPath: string) {
    this.logPath = logPath;
    this.logger = Logger.create('event-log-reader');
  }

  /**
   * Read every valid event currently in the log
   */
  async readAll(): Promise<ReportEvent[]> {
    const content = await fs.readFile(this.logPath, 'utf8');
    return this.parseLines(content.split('\n'));
  }

  /**
   * Tail the log, delivering only events appended since the last read
   */
  watchEvents(callback: (event: ReportEvent) => void): void {
    this.logger.info('Starting event log watcher', { path: this.logPath });

    this.watcher = watch(this.logPath, {
      persistent: true,
      usePolling: false,
      awaitWriteFinish: {
        stabilityThreshold: 50,
        pollInterval: 10
      }
    });

    const processNewLines = async (): Promise<void> => {
      try {
        const content = await fs.readFile(this.logPath, 'utf8');
        const lines = content.split('\n');
        if (lines.length - 1 < this.lastReadPosition) {
          // Truncated or replaced since the last read
          this.logger.debug('Event log shrank, reading from the start', { path: this.logPath });
          this.lastReadPosition = 0;
        }
        const newLines = lines.slice(this.lastReadPosition);
        // The last element is the partial line after the final newline
        this.lastReadPosition = lines.length - 1;
        for (const event of this.parseLines(newLines)) {
          callback(event);
        }
      } catch (error) {
        this.logger.error('Error reading event log', error);
      }
    };

    // Reads run one at a time so no line is delivered twice
    const scheduleRead = (): void => {
      this.processing = this.processing.then(processNewLines);
    };
    this.watcher.on('add', scheduleRead);
    this.watcher.on('change', scheduleRead);
    this.watcher.on('unlink', () => {
      this.processing = this.processing.then(() => {
        this.logger.debug('Event log removed', { path: this.logPath });
        this.lastReadPosition = 0;
      });
    });
  }

  async stopWatching(): Promise<void> {
    if (this.watcher) {
      this.logger.debug('Stopping event log watcher');
      await this.watcher.close();
      this.watcher = null;
      await this.processing;
    }
  }

  private parseLines(lines: string[]): ReportEvent[] {
    const events: ReportEvent[] = [];
    for (const line of lines) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isReportEvent(parsed)) {
          this.logger.event('read', parsed.eventType);
          events.push(parsed);
        } else {
          this.logger.warn('Skipping line that is not a report event', { line });
        }
      } catch (parseError) {
        this.logger.error('Failed to parse event log line', parseError, { line });
      }
    }
    return events;
  }
}
