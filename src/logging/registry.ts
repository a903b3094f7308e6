/**
 * Named logger registry
 *
 * The registry is an ordinary object owned by the process entry point,
 * not a module-level global. Each name maps to one LoggerHandle for the
 * life of the registry.
 */

import pino, { type Logger } from 'pino';
import { levelValue, mostVerbose, type LogLevel } from './levels.js';
import type { LogSink } from './sinks.js';

/**
 * Context metadata attached to a single record
 */
export type LogContext = Record<string, unknown>;

function createPinoLogger(name: string, level: LogLevel, sinks: readonly LogSink[]): Logger {
  const streams = pino.multistream(sinks.map((sink) => ({ level: sink.level, stream: sink })));
  return pino(
    {
      level: sinks.length > 0 ? level : 'silent',
      base: { name },
      nestedKey: 'context',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    streams
  );
}

/**
 * A named logger with its sinks
 *
 * Records never reach any other handle: there is no parent to propagate to.
 * Reconfiguring replaces the underlying pino instance, so references to the
 * handle stay valid.
 */
export class LoggerHandle {
  readonly propagate = false;
  private currentSinks: readonly LogSink[] = [];
  private currentLevel: LogLevel = 'info';
  private logger: Logger;

  constructor(readonly name: string) {
    this.logger = createPinoLogger(name, this.currentLevel, []);
  }

  get level(): LogLevel {
    return this.currentLevel;
  }

  get sinks(): readonly LogSink[] {
    return this.currentSinks;
  }

  /**
   * Replace the handle's sinks and level in one step
   *
   * Previously attached sinks are closed. When no level is given the most
   * verbose sink level is used.
   */
  configure(sinks: readonly LogSink[], level?: LogLevel): void {
    const effective =
      level ?? sinks.map((sink) => sink.level).reduce<LogLevel>(mostVerbose, 'fatal');

    for (const sink of this.currentSinks) {
      sink.close();
    }

    this.currentSinks = [...sinks];
    this.currentLevel = effective;
    this.logger = createPinoLogger(this.name, effective, this.currentSinks);
  }

  /**
   * Detach and close every sink
   */
  clear(): void {
    this.configure([], this.currentLevel);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.currentSinks.length > 0 && levelValue(level) >= levelValue(this.currentLevel);
  }

  /**
   * Context is recorded under `context`, apart from the record's own fields
   */
  log(level: LogLevel, message: string, context?: LogContext): void {
    if (context !== undefined && Object.keys(context).length > 0) {
      this.logger[level](context, message);
    } else {
      this.logger[level](message);
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.log('fatal', message, context);
  }
}

/**
 * Registry of logger handles keyed by dotted name
 */
export class LoggerRegistry {
  private readonly handles = new Map<string, LoggerHandle>();

  /**
   * Get the handle for a name, creating an unconfigured one if needed
   */
  getOrCreate(name: string): LoggerHandle {
    let handle = this.handles.get(name);
    if (handle === undefined) {
      handle = new LoggerHandle(name);
      this.handles.set(name, handle);
    }
    return handle;
  }

  get(name: string): LoggerHandle | undefined {
    return this.handles.get(name);
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  names(): string[] {
    return [...this.handles.keys()].sort();
  }

  /**
   * Handles whose names sit below a dotted prefix (`graphvcs` matches
   * `graphvcs.repo` but not `graphvcs2`)
   */
  descendants(prefix: string): LoggerHandle[] {
    return this.names()
      .filter((name) => name.startsWith(`${prefix}.`))
      .map((name) => this.getOrCreate(name));
  }

  /**
   * Close every sink of every handle
   */
  closeAll(): void {
    for (const handle of this.handles.values()) {
      handle.clear();
    }
  }
}
