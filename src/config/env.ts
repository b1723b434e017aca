import { OutlineConfigError } from '../core/errors.js';
import { DEFAULT_BATCH_CONCURRENCY } from '../batch/batch-runner.js';

export interface EnvConfig {
  inputDir: string;
  outputDir: string;
  concurrency: number;
  maxPages?: number;
  debug: boolean;
}

export const DEFAULT_INPUT_DIR = './input';
export const DEFAULT_OUTPUT_DIR = './output';

export function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new OutlineConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

const parseFlag = (raw: string | undefined): boolean => raw !== undefined && /^(1|true|yes|on)$/i.test(raw.trim());

const nonEmpty = (raw: string | undefined): string | undefined =>
  raw !== undefined && raw.trim().length > 0 ? raw.trim() : undefined;

/** Reads `PDF_OUTLINE_*` variables; unset or blank values fall back to defaults. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const concurrency = nonEmpty(env.PDF_OUTLINE_CONCURRENCY);
  const maxPages = nonEmpty(env.PDF_OUTLINE_MAX_PAGES);

  return {
    inputDir: nonEmpty(env.PDF_OUTLINE_INPUT_DIR) ?? DEFAULT_INPUT_DIR,
    outputDir: nonEmpty(env.PDF_OUTLINE_OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR,
    concurrency: concurrency ? parsePositiveInt('PDF_OUTLINE_CONCURRENCY', concurrency) : DEFAULT_BATCH_CONCURRENCY,
    maxPages: maxPages ? parsePositiveInt('PDF_OUTLINE_MAX_PAGES', maxPages) : undefined,
    debug: parseFlag(env.PDF_OUTLINE_DEBUG)
  };
}
