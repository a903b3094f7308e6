/**
 * CLI error handling
 *
 * Maps errors to exit codes and prints them in plain or JSON form.
 */

import { ExitCode, GraphVcsError } from '../errors.js';

/**
 * Exit code and message for an error
 */
export function describeError(error: unknown): { exitCode: ExitCode; message: string } {
  if (error instanceof GraphVcsError) {
    return { exitCode: error.exitCode, message: error.message };
  }
  if (error instanceof Error) {
    return { exitCode: ExitCode.GENERAL_ERROR, message: error.message };
  }
  return { exitCode: ExitCode.GENERAL_ERROR, message: String(error) };
}

/**
 * Handle an error and exit the process with appropriate code
 *
 * @param error - Error to handle
 * @param json - Whether to output in JSON format
 */
export function handleError(error: unknown, json = false): never {
  const { exitCode, message } = describeError(error);

  if (json) {
    console.error(JSON.stringify({ error: { code: exitCode, message } }));
  } else {
    console.error(`Error: ${message}`);
  }

  process.exit(exitCode);
}
