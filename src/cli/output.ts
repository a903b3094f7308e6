/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 */

import type { Settings } from '../config/schema.js';
import { redactSettings } from '../config/config.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Repository paths for display
 */
export interface PathsDisplay {
  repo: string;
  objects: string;
  refs: string;
  logs: string;
}

/**
 * Render settings with the password masked
 */
export function renderSettings(settings: Settings, options: OutputOptions = {}): string {
  const safe = redactSettings(settings);

  if (options.json === true) {
    return JSON.stringify(safe, null, 2);
  }

  const width = Math.max(...Object.keys(safe).map((key) => key.length));
  return Object.entries(safe)
    .map(([key, value]) => `${key.padEnd(width)}  ${value === undefined ? '(unset)' : String(value)}`)
    .join('\n');
}

/**
 * Render repository paths
 */
export function renderPaths(paths: PathsDisplay, options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify(paths, null, 2);
  }

  return [
    `Repository: ${paths.repo}`,
    `Objects:    ${paths.objects}`,
    `Refs:       ${paths.refs}`,
    `Logs:       ${paths.logs}`,
  ].join('\n');
}

export function formatSettings(settings: Settings, options: OutputOptions = {}): void {
  console.log(renderSettings(settings, options));
}

export function formatPaths(paths: PathsDisplay, options: OutputOptions = {}): void {
  console.log(renderPaths(paths, options));
}
