import type { ConfigOverrides } from '../infrastructure/config.js';

/** Flags shared by `run` and `resume`, as commander hands them over. */
export interface RunFlags {
  max?: string;
  year?: string;
  headless?: boolean;
  csv?: string;
  resume?: boolean;
  runId?: string;
}

/**
 * Maps command-line flags onto config overrides. Numbers are passed through unchecked so that
 * `loadConfig` reports a bad value as invalid configuration.
 */
export function toOverrides(flags: RunFlags): ConfigOverrides {
  return {
    ...(flags.max !== undefined && { maxCompanies: Number(flags.max) }),
    ...(flags.year !== undefined && { filterYear: Number(flags.year) }),
    ...(flags.headless !== undefined && { headless: flags.headless }),
    ...(flags.csv !== undefined && { companiesCsv: flags.csv }),
    ...(flags.runId !== undefined && { runId: flags.runId }),
  };
}
