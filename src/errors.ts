/**
 * Error types for graphvcs
 *
 * Every error raised by the configuration and logging layers extends
 * GraphVcsError and carries the exit code the CLI terminates with.
 */

/**
 * Process exit codes
 */
export enum ExitCode {
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments */
  INVALID_ARGS = 2,
  /** Configuration missing or invalid */
  CONFIG_ERROR = 3,
}

/**
 * Base error class
 */
export class GraphVcsError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'GraphVcsError';
  }
}

/**
 * A required setting has no value after all configuration layers are applied
 */
export class MissingRequiredConfigurationError extends GraphVcsError {
  constructor(
    public readonly fields: string[],
    public readonly envVars: string[]
  ) {
    super(
      `Missing required configuration: ${fields.join(', ')} (set ${envVars.join(', ')})`,
      ExitCode.CONFIG_ERROR
    );
    this.name = 'MissingRequiredConfigurationError';
  }
}

/**
 * Settings failed schema validation
 */
export class InvalidConfigurationError extends GraphVcsError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`, ExitCode.CONFIG_ERROR);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * An explicitly requested configuration file could not be read
 */
export class ConfigFileError extends GraphVcsError {
  constructor(
    public readonly filePath: string,
    cause?: Error
  ) {
    super(
      `Failed to load configuration from ${filePath}: ${cause?.message ?? 'unknown error'}`,
      ExitCode.CONFIG_ERROR,
      cause
    );
    this.name = 'ConfigFileError';
  }
}

/**
 * Unrecognized log level name
 */
export class InvalidLevelNameError extends GraphVcsError {
  constructor(public readonly levelName: string) {
    super(`Unknown log level: ${levelName}`, ExitCode.CONFIG_ERROR);
    this.name = 'InvalidLevelNameError';
  }
}
