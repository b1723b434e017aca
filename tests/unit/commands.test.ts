import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';
import { Command } from 'commander';
import { registerExtractCommand } from '../../src/commands/extract.js';

describe('extract command', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('reports an invalid page limit from the environment as an error line', async () => {
    vi.stubEnv('PDF_OUTLINE_MAX_PAGES', 'zero');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const program = new Command();
    registerExtractCommand(program);

    await program.parseAsync(['extract', 'missing.pdf'], { from: 'user' });

    expect(error).toHaveBeenCalledWith(chalk.red('Error: PDF_OUTLINE_MAX_PAGES must be a positive integer, got "zero"'));
    expect(process.exitCode).toBe(1);
  });
});
