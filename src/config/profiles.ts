/**
 * Environment profiles
 *
 * A profile is the compiled default layer of the settings. The three
 * profiles differ only in debug, log level and the Neo4j URI default.
 */

import { join } from 'node:path';
import { DEFAULT_LOG_FORMAT, type EnvironmentName, type SettingKey, type SettingsInput } from './schema.js';

export const DEFAULT_ENVIRONMENT: EnvironmentName = 'DEVELOPMENT';

const LOCAL_NEO4J_URI = 'neo4j://localhost:7687';

/**
 * Compiled defaults for one environment
 */
export interface Profile {
  name: EnvironmentName;
  /** Settings that must be supplied when the profile has no default */
  required: SettingKey[];
  /** Build the default layer relative to a working directory */
  defaults(cwd: string): Partial<SettingsInput>;
}

function baseDefaults(cwd: string): Partial<SettingsInput> {
  return {
    appName: 'graphvcs',
    appVersion: '0.1.0',
    baseDir: cwd,
    logsDir: join(cwd, '.gvcs', 'logs'),
    repoDirName: '.gvcs',
    objectsDirName: 'objects',
    refsDirName: 'refs',
    logLevel: 'info',
    debug: false,
    logFormat: DEFAULT_LOG_FORMAT,
    compressionEnabled: true,
  };
}

const DevelopmentProfile: Profile = {
  name: 'DEVELOPMENT',
  required: [],
  defaults: (cwd) => ({
    ...baseDefaults(cwd),
    debug: true,
    logLevel: 'debug',
    neo4jUri: LOCAL_NEO4J_URI,
  }),
};

const TestProfile: Profile = {
  name: 'TEST',
  required: [],
  defaults: (cwd) => ({
    ...baseDefaults(cwd),
    debug: true,
    logLevel: 'debug',
    neo4jUri: LOCAL_NEO4J_URI,
  }),
};

const ProductionProfile: Profile = {
  name: 'PRODUCTION',
  required: ['neo4jUri'],
  defaults: (cwd) => ({
    ...baseDefaults(cwd),
    logLevel: 'info',
  }),
};

export const PROFILES: Record<EnvironmentName, Profile> = {
  DEVELOPMENT: DevelopmentProfile,
  TEST: TestProfile,
  PRODUCTION: ProductionProfile,
};

/**
 * Look up a profile by environment name
 *
 * Unknown names fall back to the development profile.
 */
export function getProfile(environmentName: string): Profile {
  const match = Object.values(PROFILES).find((profile) => profile.name === environmentName);
  return match ?? DevelopmentProfile;
}
