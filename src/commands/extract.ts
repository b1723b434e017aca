import { readFile, writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import type { Command } from 'commander';
import { PDFOutline } from '../pdf-outline.js';
import { serializeOutline } from '../outline/assembler.js';
import { describeError } from '../core/errors.js';
import { loadEnvConfig } from '../config/env.js';

interface ExtractOptions {
  out?: string;
  debug?: boolean;
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract the title and heading outline of one PDF')
    .argument('<file>', 'PDF file to read')
    .option('--out <path>', 'Write the JSON here instead of stdout')
    .option('--debug', 'Log pipeline diagnostics')
    .action(async (file: string, opts: ExtractOptions) => {
      let extractor: PDFOutline | null = null;
      try {
        const env = loadEnvConfig();
        extractor = new PDFOutline({ maxPages: env.maxPages, debug: opts.debug ?? env.debug });
        const data = new Uint8Array(await readFile(file));
        const json = serializeOutline(await extractor.extract(data));

        if (opts.out) {
          await writeFile(opts.out, json, 'utf8');
          console.error(chalk.green(`  Wrote ${opts.out}`));
        } else {
          process.stdout.write(json);
        }
      } catch (err) {
        console.error(chalk.red(`Error: ${describeError(err)}`));
        process.exitCode = 1;
      } finally {
        await extractor?.dispose();
      }
    });
}
