import { Command } from 'commander';
import { registerDevelopCommand } from './develop';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerDevelopCommand(program);
  registerConfigCommand(program);
}
