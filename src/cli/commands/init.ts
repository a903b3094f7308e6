/**
 * CLI command: init
 *
 * Create the repository directory layout and its log file.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { withContext } from '../context.js';
import { handleError } from '../errors.js';
import { ensureRepositoryLayout } from '../../config/paths.js';
import { getRepositoryLogger, withLogging } from '../../logging/logger.js';

interface InitOptions {
  quiet?: boolean;
}

function executeInit(path: string | undefined, options: InitOptions): void {
  const repoPath = resolve(path ?? process.cwd());

  try {
    withContext((context) => {
      const logger = getRepositoryLogger(
        context.logging,
        repoPath,
        options.quiet === true ? { consoleLevel: 'error' } : {}
      );
      const repoDir = withLogging(
        logger,
        'init',
        () => ensureRepositoryLayout(context.settings, repoPath),
        { repoPath }
      );
      if (options.quiet !== true) {
        console.log(`Initialized ${context.settings.appName} repository in ${repoDir}`);
      }
    });
  } catch (error) {
    handleError(error);
  }
}

/**
 * Register the init command
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init [path]')
    .description('Create the repository layout (objects, refs, logs)')
    .option('-q, --quiet', 'Only report errors')
    .action((path: string | undefined, options: InitOptions) => {
      executeInit(path, options);
    });
}
