/**
 * CLI command: config
 *
 * Print the resolved settings for the active environment.
 */

import { Command } from 'commander';
import { withContext } from '../context.js';
import { formatSettings } from '../output.js';
import { handleError } from '../errors.js';

interface ConfigOptions {
  json?: boolean;
  envFile?: string;
}

function executeConfig(options: ConfigOptions): void {
  const isJson = options.json === true;

  try {
    withContext(
      (context) => formatSettings(context.settings, { json: isJson }),
      options.envFile !== undefined ? { envFile: options.envFile } : {}
    );
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the config command
 */
export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the resolved settings (password masked)')
    .option('--json', 'Output in JSON format')
    .option('--env-file <path>', 'Read variables from this file instead of ./.env')
    .action((options: ConfigOptions) => {
      executeConfig(options);
    });
}
