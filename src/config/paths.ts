/**
 * Repository path utilities for graphvcs
 *
 * Every getter is a pure join over the settings; only
 * ensureRepositoryLayout touches the filesystem.
 */

import { join } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import type { Settings } from './schema.js';

/**
 * Name of the log directory inside a repository directory
 */
export const LOGS_DIR_NAME = 'logs';

type PathSettings = Pick<Settings, 'baseDir' | 'repoDirName' | 'objectsDirName' | 'refsDirName'>;

/**
 * Get the repository directory (`<base>/.gvcs`)
 *
 * @param basePath - Working tree root (default: settings.baseDir)
 */
export function getRepoPath(settings: PathSettings, basePath?: string): string {
  const base = basePath !== undefined && basePath !== '' ? basePath : settings.baseDir;
  return join(base, settings.repoDirName);
}

/**
 * Get the object store directory (`<base>/.gvcs/objects`)
 */
export function getObjectsPath(settings: PathSettings, basePath?: string): string {
  return join(getRepoPath(settings, basePath), settings.objectsDirName);
}

/**
 * Get the refs directory (`<base>/.gvcs/refs`)
 */
export function getRefsPath(settings: PathSettings, basePath?: string): string {
  return join(getRepoPath(settings, basePath), settings.refsDirName);
}

/**
 * Get the repository-local log directory (`<base>/.gvcs/logs`)
 */
export function getRepoLogsPath(settings: PathSettings, basePath?: string): string {
  return join(getRepoPath(settings, basePath), LOGS_DIR_NAME);
}

/**
 * Ensure the repository directory layout exists
 *
 * Creates the objects, refs and logs directories and any missing parents.
 * Returns the path to the repository directory.
 */
export function ensureRepositoryLayout(settings: PathSettings, basePath?: string): string {
  const dirs = [
    getObjectsPath(settings, basePath),
    getRefsPath(settings, basePath),
    getRepoLogsPath(settings, basePath),
  ];

  for (const dir of dirs) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return getRepoPath(settings, basePath);
}
