import * as path from 'path';
import { AnnotationRegistry } from './annotations/AnnotationProvider';
import { resolveOptions, type ReportingOptions } from './config';
import { LifecycleAdapter } from './LifecycleAdapter';
import { EventLogWriter } from './lifecycle/EventLogWriter';
import { ResultsLifecycle } from './lifecycle/ResultsLifecycle';
import { ResultsSummary } from './lifecycle/ResultsSummary';
import { Logger } from './utils/logger';

export const SUMMARY_FILE = 'summary.md';

export interface Reporting {
  lifecycle: ResultsLifecycle;
  adapter: LifecycleAdapter;
  summary: ResultsSummary;
}

/**
 * Wire a lifecycle with the event log and summary listeners, and an adapter feeding it
 */
export function createReporting(options: ReportingOptions = {}, env: NodeJS.ProcessEnv = process.env): Reporting {
  const logger = Logger.create('reporting');
  const resolved = resolveOptions(options, env);
  logger.info('Creating reporting pipeline', { ...resolved });

  const lifecycle = new ResultsLifecycle();
  const annotations = resolved.annotationsFile
    ? AnnotationRegistry.fromFile(resolved.annotationsFile)
    : new AnnotationRegistry();

  const adapter = new LifecycleAdapter(lifecycle, {
    outputDirectory: resolved.outputDirectory,
    deletePreviousResults: resolved.deletePreviousResults,
    ignoredAnnotations: resolved.ignoredAnnotations,
    annotations
  });

  const outputDirectory = lifecycle.getOutputDirectory() ?? resolved.outputDirectory;
  const writer = new EventLogWriter(lifecycle);
  const summary = new ResultsSummary(path.join(outputDirectory, SUMMARY_FILE));
  lifecycle.addListener(event => writer.write(event));
  lifecycle.addListener(event => summary.handleEvent(event));

  logger.initComplete({ outputDirectory, eventLog: writer.getLogPath() });
  return { lifecycle, adapter, summary };
}
