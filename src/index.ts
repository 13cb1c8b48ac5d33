#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './cli/commands';
import { formatError } from './cli/formatters';

export function createProgram(): Command {
  const program = new Command();
  program.name('codeloop').description('Generate, run and review code until it does what you asked').version('0.1.0').option('--verbose', 'Show detailed output');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
}
