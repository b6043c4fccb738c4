import { Command } from 'commander';
import { existsSync } from 'fs';
import path from 'path';
import { DEFAULT_OUTPUT_DIRECTORY } from './config';
import { EventLogReader } from './lifecycle/EventLogReader';
import { EVENT_LOG_FILE } from './lifecycle/EventLogWriter';
import { ResultsSummary } from './lifecycle/ResultsSummary';
import type { ReportEvent } from './types/events';
import { Logger } from './utils/logger';
import { prepareOutputDirectory } from './utils/output-directory';

const logger = Logger.create('cli');

function eventLogPath(resultsDir: string): string {
  return path.join(resultsDir, EVENT_LOG_FILE);
}

/**
 * One line per event, as printed by `watch`
 */
export function formatEvent(event: ReportEvent): string {
  switch (event.eventType) {
    case 'testSuiteStarted':
      return `suite started   ${event.payload.name}`;
    case 'testSuiteFinished':
      return `suite finished  ${event.payload.uuid ?? '(none)'}`;
    case 'testCaseStarted':
      return `  test started  ${event.payload.name}`;
    case 'testCaseFinished':
      return `  test finished ${event.payload.name}`;
    default: {
      const outcome = event.eventType.replace(/^testCase/, '').toLowerCase();
      const message = event.payload.message ? `: ${event.payload.message.split('\n')[0]}` : '';
      return `  ${outcome.padEnd(12)}${event.payload.name}${message}`;
    }
  }
}

/**
 * Print the summary of a results directory; resolves to the exit code
 */
export async function runSummary(resultsDir: string): Promise<number> {
  const logPath = eventLogPath(resultsDir);
  if (!existsSync(logPath)) {
    console.error(`No event log found at ${logPath}`);
    return 2;
  }

  const summary = new ResultsSummary();
  const events = await new EventLogReader(logPath).readAll();
  logger.info('Replaying event log', { path: logPath, events: events.length });
  for (const event of events) {
    summary.handleEvent(event);
  }

  console.log(summary.render());
  return summary.hasFailures() ? 1 : 0;
}

export function runClean(resultsDir: string): number {
  const removed = prepareOutputDirectory(resultsDir, true);
  logger.info('Cleaned results directory', { resultsDir, removed });
  console.log(`Removed ${removed} file${removed === 1 ? '' : 's'} from ${resultsDir}`);
  return 0;
}

export async function runWatch(resultsDir: string): Promise<void> {
  prepareOutputDirectory(resultsDir, false);
  const reader = new EventLogReader(eventLogPath(resultsDir));
  console.log(`Watching ${eventLogPath(resultsDir)} (Ctrl+C to stop)`);
  reader.watchEvents(event => console.log(formatEvent(event)));

  await new Promise<void>(resolve => {
    process.once('SIGINT', resolve);
  });
  await reader.stopWatching();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('suitecast')
    .description('Inspect test report events written by the suitecast adapters');

  program
    .command('summary')
    .description('Print a Markdown summary of a results directory')
    .argument('[dir]', 'results directory', DEFAULT_OUTPUT_DIRECTORY)
    .action(async (dir: string) => {
      process.exitCode = await runSummary(dir);
    });

  program
    .command('watch')
    .description('Print events as they are written to a results directory')
    .argument('[dir]', 'results directory', DEFAULT_OUTPUT_DIRECTORY)
    .action(async (dir: string) => {
      await runWatch(dir);
    });

  program
    .command('clean')
    .description('Delete the result files in a results directory')
    .argument('[dir]', 'results directory', DEFAULT_OUTPUT_DIRECTORY)
    .action((dir: string) => {
      process.exitCode = runClean(dir);
    });

  return program;
}
