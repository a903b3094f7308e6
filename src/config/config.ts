/**
 * Settings resolver for graphvcs
 *
 * Builds the settings for an environment profile from the profile's
 * defaults, an optional .env file and the process environment, and
 * validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import dotenv from 'dotenv';
import {
  SettingsSchema,
  type SettingKey,
  type Settings,
  type SettingsInput,
} from './schema.js';
import { DEFAULT_ENVIRONMENT, getProfile } from './profiles.js';
import {
  ConfigFileError,
  InvalidConfigurationError,
  MissingRequiredConfigurationError,
} from '../errors.js';

/**
 * Prefix shared by every settings variable
 */
export const ENV_PREFIX = 'GRAPHVCS_';

/**
 * Unprefixed variable selecting the profile
 */
export const ENVIRONMENT_VAR = 'ENVIRONMENT';

/**
 * Map of environment variable names to settings keys
 */
export const ENV_MAPPINGS: Record<string, SettingKey> = {
  GRAPHVCS_APP_NAME: 'appName',
  GRAPHVCS_APP_VERSION: 'appVersion',
  GRAPHVCS_BASE_DIR: 'baseDir',
  GRAPHVCS_LOGS_DIR: 'logsDir',
  GRAPHVCS_REPO_DIR_NAME: 'repoDirName',
  GRAPHVCS_OBJECTS_DIR_NAME: 'objectsDirName',
  GRAPHVCS_REFS_DIR_NAME: 'refsDirName',
  // Neo4j
  GRAPHVCS_NEO4J_URI: 'neo4jUri',
  GRAPHVCS_NEO4J_USERNAME: 'neo4jUsername',
  GRAPHVCS_NEO4J_PASSWORD: 'neo4jPassword',
  // Default user
  GRAPHVCS_DEFAULT_USER_NAME: 'defaultUserName',
  GRAPHVCS_DEFAULT_USER_EMAIL: 'defaultUserEmail',
  // Logging
  GRAPHVCS_LOG_LEVEL: 'logLevel',
  GRAPHVCS_DEBUG: 'debug',
  GRAPHVCS_LOG_FORMAT: 'logFormat',
  // Storage
  GRAPHVCS_COMPRESSION_ENABLED: 'compressionEnabled',
};

const BOOLEAN_KEYS: SettingKey[] = ['debug', 'compressionEnabled'];
const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

type EnvSource = Record<string, string | undefined>;

/**
 * Name of the environment variable backing a settings key
 */
export function envVarFor(key: SettingKey): string {
  const entry = Object.entries(ENV_MAPPINGS).find(([, mapped]) => mapped === key);
  return entry?.[0] ?? `${ENV_PREFIX}${key.toUpperCase()}`;
}

/**
 * Parse a variable value to the type its key expects
 *
 * Unrecognized boolean spellings are passed through so validation rejects them.
 */
function parseEnvValue(value: string, key: SettingKey): unknown {
  if (BOOLEAN_KEYS.includes(key)) {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
  }
  return value;
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
 * Collect settings from a set of variables
 *
 * Names match case-insensitively; an exact-case name wins over other spellings.
 */
function readVariables(source: EnvSource): Partial<Record<SettingKey, unknown>> {
  const layer: Partial<Record<SettingKey, unknown>> = {};
  const folded = new Map<string, string>();
  for (const [name, value] of Object.entries(source)) {
    if (isSet(value)) {
      folded.set(name.toUpperCase(), value);
    }
  }

  for (const [envKey, key] of Object.entries(ENV_MAPPINGS)) {
    const exact = source[envKey];
    const value = isSet(exact) ? exact : folded.get(envKey);
    if (value !== undefined) {
      layer[key] = parseEnvValue(value, key);
    }
  }

  return layer;
}

/**
 * Read variables from a .env file
 *
 * The default file is optional; an explicitly named one must exist.
 */
function loadEnvFile(filePath: string, explicit: boolean): EnvSource {
  if (!explicit && !existsSync(filePath)) {
    return {};
  }

  try {
    return dotenv.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigFileError(filePath, error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Settings resolution options
 */
export interface ResolveSettingsOptions {
  /** Variables to read (default: process.env) */
  env?: EnvSource;
  /** Working directory for path defaults and the .env lookup */
  cwd?: string;
  /** Explicit .env path, or false to skip the file layer */
  envFile?: string | false;
  /** Values applied after every other layer */
  overrides?: Partial<SettingsInput>;
}

/**
 * Read the profile selector from the environment
 */
export function selectEnvironment(env: EnvSource = process.env): string {
  const value = env[ENVIRONMENT_VAR];
  return value !== undefined && value !== '' ? value : DEFAULT_ENVIRONMENT;
}

/**
 * Resolve settings for an environment profile
 *
 * Layers are applied in this order (later overrides earlier):
 * 1. Profile defaults
 * 2. .env file
 * 3. Process environment
 * 4. Explicit overrides
 *
 * Unknown environment names resolve to the development profile.
 *
 * @throws MissingRequiredConfigurationError when a required setting has no value
 * @throws InvalidConfigurationError when the merged settings fail validation
 */
export function resolveSettings(
  environmentName: string,
  options: ResolveSettingsOptions = {}
): Settings {
  const profile = getProfile(environmentName);
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  let merged: Record<string, unknown> = { ...profile.defaults(cwd) };

  if (options.envFile !== false) {
    const explicit = options.envFile !== undefined;
    const filePath = options.envFile ?? join(cwd, '.env');
    merged = { ...merged, ...readVariables(loadEnvFile(filePath, explicit)) };
  }

  merged = { ...merged, ...readVariables(env), ...options.overrides };
  merged.environment = profile.name;

  const missing = profile.required.filter((key) => merged[key] === undefined || merged[key] === '');
  if (missing.length > 0) {
    throw new MissingRequiredConfigurationError(missing, missing.map(envVarFor));
  }

  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(result.data);
}

/**
 * Resolve settings for the profile selected by ENVIRONMENT
 *
 * Intended to run once at process start; pass the result to consumers.
 */
export function loadSettings(options: ResolveSettingsOptions = {}): Settings {
  return resolveSettings(selectEnvironment(options.env), options);
}

/**
 * Copy of the settings safe to print
 */
export function redactSettings(settings: Settings): Settings {
  if (settings.neo4jPassword === undefined) {
    return settings;
  }
  return Object.freeze({ ...settings, neo4jPassword: '********' });
}
