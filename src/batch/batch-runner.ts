import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { OutlineDocument } from '../types/outline.js';
import { resolveOutlineConfig, type OutlineConfigInput } from '../types/config.js';
import { OutlineConfigError, describeError } from '../core/errors.js';
import { serializeOutline } from '../outline/assembler.js';
import { PDFOutline } from '../pdf-outline.js';

export interface OutlineExtractor {
  extract(data: Uint8Array): Promise<OutlineDocument>;
  dispose(): Promise<void>;
}

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  concurrency?: number;
  config?: OutlineConfigInput;
  /** Called once per file; defaults to a fresh `PDFOutline`. */
  createExtractor?: (config: OutlineConfigInput) => OutlineExtractor;
  onFileDone?: (result: BatchFileResult) => void;
}

export interface BatchFileResult {
  file: string;
  outputPath?: string;
  headings?: number;
  error?: string;
  durationMs: number;
}

export interface BatchReport {
  processed: BatchFileResult[];
  failed: BatchFileResult[];
}

export const DEFAULT_BATCH_CONCURRENCY = 2;

export async function listPdfFiles(inputDir: string): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export const outputNameFor = (file: string): string => `${basename(file, extname(file))}.json`;

async function processFile(file: string, options: BatchOptions, config: OutlineConfigInput): Promise<BatchFileResult> {
  const started = Date.now();
  const extractor = options.createExtractor ? options.createExtractor(config) : new PDFOutline(config);

  try {
    const data = new Uint8Array(await readFile(join(options.inputDir, file)));
    const doc = await extractor.extract(data);
    const outputPath = join(options.outputDir, outputNameFor(file));
    await writeFile(outputPath, serializeOutline(doc), 'utf8');
    return { file, outputPath, headings: doc.outline.length, durationMs: Date.now() - started };
  } catch (error) {
    return { file, error: describeError(error), durationMs: Date.now() - started };
  } finally {
    try {
      await extractor.dispose();
    } catch (error) {
      console.warn(`BatchRunner: failed to dispose extractor for ${file}:`, error);
    }
  }
}

/**
 * Extracts outlines for every PDF in `inputDir`, writing `<name>.json` files
 * to `outputDir`. Files run concurrently up to `concurrency`; a failing file
 * is reported and skipped without stopping the others.
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new OutlineConfigError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const config = options.config ?? {};
  resolveOutlineConfig(config);

  const files = await listPdfFiles(options.inputDir);
  await mkdir(options.outputDir, { recursive: true });

  const results: BatchFileResult[] = new Array<BatchFileResult>(files.length);
  const queue = new Set<Promise<void>>();

  for (let i = 0; i < files.length; i++) {
    const index = i;
    const task: Promise<void> = processFile(files[index], options, config).then((result) => {
      results[index] = result;
      try {
        options.onFileDone?.(result);
      } catch (error) {
        console.warn(`BatchRunner: onFileDone failed for ${result.file}:`, error);
      }
    });
    const tracked = task.finally(() => {
      queue.delete(tracked);
    });
    queue.add(tracked);

    if (queue.size >= concurrency) {
      await Promise.race(queue);
    }
  }

  await Promise.all(queue);

  return {
    processed: results.filter((r) => r.error === undefined),
    failed: results.filter((r) => r.error !== undefined)
  };
}
