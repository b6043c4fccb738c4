import * as path from 'path';

export const DEFAULT_OUTPUT_DIRECTORY = path.join('build', 'suitecast-results');

export interface ReportingOptions {
  /** Results directory, created when missing */
  outputDirectory?: string;
  /** Remove files left in the results directory by an earlier run */
  deletePreviousResults?: boolean;
  /** Annotation names to leave out of reports, on top of the host runner's own */
  ignoredAnnotations?: string[];
  /** JSON file with class and method annotations */
  annotationsFile?: string;
}

export interface ResolvedOptions {
  outputDirectory: string;
  deletePreviousResults: boolean;
  ignoredAnnotations: string[];
  annotationsFile: string | null;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Explicit options win over SUITECAST_* environment variables, which win over defaults
 */
export function resolveOptions(options: ReportingOptions = {}, env: NodeJS.ProcessEnv = process.env): ResolvedOptions {
  return {
    outputDirectory: options.outputDirectory ?? (env.SUITECAST_RESULTS_DIR || DEFAULT_OUTPUT_DIRECTORY),
    deletePreviousResults: options.deletePreviousResults ?? parseFlag(env.SUITECAST_CLEAN) ?? false,
    ignoredAnnotations: options.ignoredAnnotations ?? parseList(env.SUITECAST_IGNORED_ANNOTATIONS) ?? [],
    annotationsFile: options.annotationsFile ?? (env.SUITECAST_ANNOTATIONS || null)
  };
}
