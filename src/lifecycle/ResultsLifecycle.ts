import type { ReportEvent } from '../types/events';
import { Logger } from '../utils/logger';

export type LifecycleListener = (event: ReportEvent) => void;

/**
 * Ordered collector of report events, shared by every adapter in the process
 */
export interface EventLifecycle {
  fire(event: ReportEvent): void;
  getOutputDirectory(): string | null;
  setOutputDirectory(outputDirectory: string): void;
}

export class ResultsLifecycle implements EventLifecycle {
  private outputDirectory: string | null = null;
  private listeners: LifecycleListener[] = [];
  private logger: Logger;

  constructor() {
    this.logger = Logger.create('results-lifecycle');
  }

  /**
   * Register a listener; events reach listeners in registration order
   */
  addListener(listener: LifecycleListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(existing => existing !== listener);
    };
  }

  fire(event: ReportEvent): void {
    this.logger.event('fire', event.eventType, { listeners: this.listeners.length });
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Listener failed to handle event', error, { eventType: event.eventType });
      }
    }
  }

  getOutputDirectory(): string | null {
    return this.outputDirectory;
  }

  setOutputDirectory(outputDirectory: string): void {
    this.logger.info('Output directory set', { outputDirectory });
    this.outputDirectory = outputDirectory;
  }
}
