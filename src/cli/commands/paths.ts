/**
 * CLI command: paths
 *
 * Print the repository directories derived from the settings.
 */

import { Command } from 'commander';
import { withContext } from '../context.js';
import { formatPaths } from '../output.js';
import { handleError } from '../errors.js';
import { getObjectsPath, getRefsPath, getRepoLogsPath, getRepoPath } from '../../config/paths.js';

interface PathsOptions {
  json?: boolean;
}

function executePaths(base: string | undefined, options: PathsOptions): void {
  const isJson = options.json === true;

  try {
    withContext(({ settings }) => {
      formatPaths(
        {
          repo: getRepoPath(settings, base),
          objects: getObjectsPath(settings, base),
          refs: getRefsPath(settings, base),
          logs: getRepoLogsPath(settings, base),
        },
        { json: isJson }
      );
    });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the paths command
 */
export function registerPathsCommand(program: Command): void {
  program
    .command('paths [base]')
    .description('Show repository, objects, refs and logs paths')
    .option('--json', 'Output in JSON format')
    .action((base: string | undefined, options: PathsOptions) => {
      executePaths(base, options);
    });
}
