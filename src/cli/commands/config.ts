import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { promptForConfig, toEnvFile } from '../prompts';
import { ConfigValidator, formatConnectionCheck } from '../config-validator';
import { loadConfig } from '../../config/loader';
import { findMissingCredentials } from '../../config/validator';
import type { Config } from '../../config/validator';

const MASK = '********';

/** Copy of `config` with every API key replaced by a mask */
export function maskSecrets(config: Config): Config {
  const mask = (value?: string): string | undefined => (value ? MASK : value);
  return {
    ...config,
    providers: {
      ...config.providers,
      gemini: { ...config.providers.gemini, api_key: mask(config.providers.gemini.api_key) },
      openai: { ...config.providers.openai, api_key: mask(config.providers.openai.api_key) },
      anthropic: { ...config.providers.anthropic, api_key: mask(config.providers.anthropic.api_key) },
    },
    e2b: { ...config.e2b, api_key: mask(config.e2b.api_key) },
  };
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Manage configuration');

  configCommand
    .command('init')
    .description('Initialize configuration interactively')
    .action(async () => {
      console.log(chalk.blue('Initializing configuration...'));
      const answers = await promptForConfig();

      const targetPath = path.join(process.cwd(), '.env');
      if (fs.existsSync(targetPath)) {
        console.log(chalk.yellow('.env file already exists. Overwriting...'));
      }

      fs.writeFileSync(targetPath, toEnvFile(answers));
      console.log(chalk.green(`Configuration saved to ${targetPath}`));
    });

  configCommand
    .command('validate')
    .description('Validate current configuration and test connections')
    .option('-c, --config <file>', 'Path to a YAML configuration file')
    .option('--skip-connections', 'Only check the configuration, do not contact docker or the providers')
    .action(async (options: { config?: string; skipConnections?: boolean }) => {
      try {
        const config = loadConfig({}, { configPath: options.config });
        console.log(chalk.green('✓ Configuration structure is valid.'));

        const missing = findMissingCredentials(config);
        if (missing.length) {
          console.log(chalk.red('✗ Missing credentials:'));
          missing.forEach((m) => console.log(chalk.red(`  - ${m}`)));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green('✓ Credentials present for every selected provider.'));

        if (options.skipConnections) return;

        console.log(chalk.blue('Testing connections...'));
        const checks = await new ConfigValidator(config).testConnections();
        checks.forEach((check) => console.log(formatConnectionCheck(check)));
        if (checks.some((check) => check.status === 'fail')) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red('Failed to load configuration:'));
        if (error instanceof Error) {
          console.error(chalk.red(error.message));
        }
        process.exitCode = 1;
      }
    });

  configCommand
    .command('show')
    .description('Show current configuration')
    .option('-c, --config <file>', 'Path to a YAML configuration file')
    .action((options: { config?: string }) => {
      try {
        const config = loadConfig({}, { configPath: options.config });
        console.log(JSON.stringify(maskSecrets(config), null, 2));
      } catch (error) {
        console.error(chalk.red('Failed to load configuration:'));
        if (error instanceof Error) {
          console.error(chalk.red(error.message));
        }
        process.exitCode = 1;
      }
    });
}
