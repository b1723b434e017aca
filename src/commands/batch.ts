import chalk from 'chalk';
import type { Command } from 'commander';
import { runBatch, type BatchFileResult } from '../batch/batch-runner.js';
import { describeError } from '../core/errors.js';
import { loadEnvConfig, parsePositiveInt } from '../config/env.js';

interface BatchCommandOptions {
  concurrency?: number;
  debug?: boolean;
}

const formatResult = (result: BatchFileResult): string =>
  result.error === undefined
    ? chalk.green('  ✓ ') + result.file + chalk.dim(` (${result.headings ?? 0} headings, ${result.durationMs}ms)`)
    : chalk.red('  ✗ ') + result.file + chalk.dim(` ${result.error}`);

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Extract outlines for every PDF in a directory')
    .argument('[inputDir]', 'Directory of PDFs (default PDF_OUTLINE_INPUT_DIR or ./input)')
    .argument('[outputDir]', 'Directory for JSON output (default PDF_OUTLINE_OUTPUT_DIR or ./output)')
    .option('--concurrency <n>', 'Files processed at once', (raw: string) => parsePositiveInt('--concurrency', raw))
    .option('--debug', 'Log pipeline diagnostics')
    .action(async (inputDir: string | undefined, outputDir: string | undefined, opts: BatchCommandOptions) => {
      try {
        const env = loadEnvConfig();
        const input = inputDir ?? env.inputDir;
        const output = outputDir ?? env.outputDir;

        console.log(chalk.bold(`  ${input} → ${output}`));
        const report = await runBatch({
          inputDir: input,
          outputDir: output,
          concurrency: opts.concurrency ?? env.concurrency,
          config: { maxPages: env.maxPages, debug: opts.debug ?? env.debug },
          onFileDone: (result) => console.log(formatResult(result))
        });

        const total = report.processed.length + report.failed.length;
        if (total === 0) {
          console.log(chalk.yellow(`  No PDF files in ${input}`));
          return;
        }
        const summary = `  ${report.processed.length}/${total} file${total !== 1 ? 's' : ''} processed`;
        console.log(report.failed.length > 0 ? chalk.yellow(summary) : chalk.bold(summary));
        if (report.failed.length > 0) process.exitCode = 1;
      } catch (err) {
        console.error(chalk.red(`Error: ${describeError(err)}`));
        process.exitCode = 1;
      }
    });
}
