#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerExtractCommand } from './commands/extract.js';
import { registerBatchCommand } from './commands/batch.js';

const program = new Command();

program
  .name('pdf-outline')
  .description('Extract a title and H1-H3 heading outline from PDF files')
  .version('0.1.0');

registerExtractCommand(program);
registerBatchCommand(program);

await program.parseAsync(process.argv);
