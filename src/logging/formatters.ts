/**
 * Log line formatters
 *
 * Sinks receive pino's JSON lines and render them through a template.
 */

import { z } from 'zod';
import { Chalk, type ChalkInstance } from 'chalk';
import { levelDisplayName } from './levels.js';

/**
 * Fields of a pino record the formatters use
 */
const LogRecordSchema = z.object({
  level: z.number(),
  time: z.union([z.string(), z.number()]),
  name: z.string().default(''),
  msg: z.string().default(''),
  context: z.record(z.string(), z.unknown()).optional(),
});

export type LogRecord = z.infer<typeof LogRecordSchema>;

/**
 * Parse one serialized record
 *
 * Returns null when the line is not a pino record.
 */
export function parseRecord(line: string): LogRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = LogRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Formatter interface shared by sinks
 */
export interface LineFormatter {
  format(record: LogRecord): string;
}

const PLACEHOLDER = /\{(time|name|level|message|context)\}/g;

function renderContext(context: LogRecord['context']): string {
  return context !== undefined && Object.keys(context).length > 0 ? JSON.stringify(context) : '';
}

/**
 * Renders a record through a `{time} - {name} - {level} - {message}` style template
 *
 * Record context renders as JSON at `{context}`, or after the line when the
 * template has no such placeholder.
 */
export class PlainFormatter implements LineFormatter {
  private readonly placesContext: boolean;

  constructor(private readonly template: string) {
    this.placesContext = template.includes('{context}');
  }

  format(record: LogRecord): string {
    const time = typeof record.time === 'number' ? new Date(record.time).toISOString() : record.time;
    const context = renderContext(record.context);
    const fields: Record<string, string> = {
      time,
      name: record.name,
      level: levelDisplayName(record.level),
      message: record.msg,
      context,
    };
    const line = this.template.replace(PLACEHOLDER, (match: string, key: string) => fields[key] ?? match);
    return this.placesContext || context === '' ? line : `${line} ${context}`;
  }
}

const RESET = '\u001B[0m';
const CLOSE = /\u001B\[(?:39|49)m$/;

/**
 * Plain formatter that colors the whole line by severity
 *
 * - TRACE/DEBUG: white
 * - INFO: cyan
 * - WARNING: yellow
 * - ERROR: red
 * - CRITICAL: red background
 *
 * Colored lines end with a full reset. Records at any other level are
 * left uncolored.
 */
export class ColoredFormatter extends PlainFormatter {
  private readonly colors: Map<number, (text: string) => string>;

  constructor(template: string, chalk: ChalkInstance = new Chalk({ level: 1 })) {
    super(template);
    this.colors = new Map<number, (text: string) => string>([
      [10, chalk.white],
      [20, chalk.white],
      [30, chalk.cyan],
      [40, chalk.yellow],
      [50, chalk.red],
      [60, chalk.bgRed],
    ]);
  }

  override format(record: LogRecord): string {
    const line = super.format(record);
    const color = this.colors.get(record.level);
    return color !== undefined ? color(line).replace(CLOSE, RESET) : line;
  }
}
