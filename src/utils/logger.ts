import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogData = Record<string, unknown>;

export class Logger {
  private logPath: string;
  private component: string;

  private constructor(component: string) {
    this.component = component;
    const logDir = process.env.SUITECAST_LOG_DIR || path.join(process.cwd(), '.suitecast');
    this.logPath = path.join(logDir, 'debug.log');
    this.ensureLogDirectory();
  }

  static create(component: string): Logger {
    return new Logger(component);
  }

  private ensureLogDirectory(): void {
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    } catch {
      // Directory might already exist
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: LogData): void {
    try {
      const formattedMessage = this.formatMessage(level, message, data);
      fs.appendFileSync(this.logPath, formattedMessage + '\n', 'utf8');
    } catch {
      // Logging must never break the host runner
    }
  }

  /**
   * Log human-readable startup preamble without timestamps
   */
  startupPreamble(lines: string[]): void {
    try {
      const preamble = lines.map(line => `[${this.component}] ${line}`).join('\n');
      fs.appendFileSync(this.logPath, preamble + '\n', 'utf8');
    } catch {
      // Logging must never break the host runner
    }
  }

  /**
   * Log machine-readable initialization complete
   */
  initComplete(config: LogData): void {
    this.info('Initialization complete', config);
  }

  debug(message: string, data?: LogData): void {
    if (process.env.SUITECAST_DEBUG === '1') {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: LogData): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    const errorData: LogData = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, errorData);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: LogData): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log test execution flow
   */
  testFlow(action: string, subject?: string, details?: LogData): void {
    const message = subject
      ? `Test flow: ${action} for ${subject}`
      : `Test flow: ${action}`;
    this.info(message, details);
  }

  /**
   * Log report events as they pass through
   */
  event(direction: 'fire' | 'read', eventType: string, details?: LogData): void {
    this.debug(`Event ${direction}: ${eventType}`, details);
  }

  /**
   * Log decision points
   */
  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}
