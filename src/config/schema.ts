/**
 * Configuration schema for graphvcs
 *
 * Validates settings using Zod and provides TypeScript types.
 */

import { z } from 'zod';
import { isLevelName, parseLevel } from '../logging/levels.js';

/**
 * Environment profile names
 */
export const EnvironmentNameSchema = z.enum(['DEVELOPMENT', 'TEST', 'PRODUCTION']);

/**
 * Default log line template
 *
 * Placeholders: {time}, {name}, {level}, {message}
 */
export const DEFAULT_LOG_FORMAT = '{time} - {name} - {level} - {message}';

/**
 * Log level, normalized to its pino label
 */
export const LogLevelSchema = z
  .string()
  .refine(isLevelName, (value) => ({ message: `Unknown log level: ${value}` }))
  .transform((value) => parseLevel(value));

/**
 * Complete settings schema
 */
export const SettingsSchema = z.object({
  environment: EnvironmentNameSchema,

  // Application info
  appName: z.string().min(1),
  appVersion: z.string().min(1),

  // Paths
  baseDir: z.string().min(1),
  logsDir: z.string().min(1),

  // Repository layout
  repoDirName: z.string().min(1),
  objectsDirName: z.string().min(1),
  refsDirName: z.string().min(1),

  // Neo4j
  neo4jUri: z.string().min(1).optional(),
  neo4jUsername: z.string().optional(),
  neo4jPassword: z.string().optional(),

  // Default commit identity
  defaultUserName: z.string().optional(),
  defaultUserEmail: z.string().email().optional(),

  // Logging
  logLevel: LogLevelSchema,
  debug: z.boolean(),
  logFormat: z.string().min(1),

  // Content storage
  compressionEnabled: z.boolean(),
});

/**
 * TypeScript types derived from schemas
 */
export type EnvironmentName = z.infer<typeof EnvironmentNameSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type Settings = Readonly<z.output<typeof SettingsSchema>>;
export type SettingKey = keyof SettingsInput;

