/**
 * CLI context
 *
 * Resolves settings once and owns the logger registry for the command run.
 */

import { loadSettings, type ResolveSettingsOptions } from '../config/config.js';
import type { Settings } from '../config/schema.js';
import { createLoggingContext, type LoggingContext } from '../logging/logger.js';

/**
 * CLI context containing the process-wide components
 */
export interface CLIContext {
  settings: Settings;
  logging: LoggingContext;
  /** Close every log sink */
  close(): void;
}

/**
 * Create the CLI context
 */
export function createCLIContext(options: ResolveSettingsOptions = {}): CLIContext {
  const settings = loadSettings(options);
  const logging = createLoggingContext(settings);

  return {
    settings,
    logging,
    close: () => logging.registry.closeAll(),
  };
}

/**
 * Run a function with a CLI context, closing it afterwards
 */
export function withContext<T>(
  fn: (context: CLIContext) => T,
  options: ResolveSettingsOptions = {}
): T {
  const context = createCLIContext(options);
  try {
    return fn(context);
  } finally {
    context.close();
  }
}
