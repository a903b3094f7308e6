/**
 * Log sinks
 *
 * A sink is a pino destination stream with its own threshold and
 * formatter. pino.multistream routes each record to every sink whose
 * level the record meets.
 */

import {
  closeSync,
  existsSync,
  fstatSync,
  mkdirSync,
  openSync,
  renameSync,
  rmSync,
  writeSync,
} from 'node:fs';
import { dirname } from 'node:path';
import type { DestinationStream } from 'pino';
import { parseRecord, type LineFormatter } from './formatters.js';
import type { LogLevel } from './levels.js';

/**
 * Anything with a string write(), such as process.stdout
 */
export interface TextStream {
  write(chunk: string): unknown;
}

/**
 * Output destination attached to a logger handle
 */
export interface LogSink extends DestinationStream {
  readonly kind: 'console' | 'file';
  readonly level: LogLevel;
  close(): void;
}

function render(formatter: LineFormatter, line: string): string {
  const record = parseRecord(line);
  return record !== null ? formatter.format(record) : line.trimEnd();
}

/**
 * Writes formatted lines to a text stream (stdout by default)
 */
export class ConsoleSink implements LogSink {
  readonly kind = 'console';

  constructor(
    readonly level: LogLevel,
    private readonly formatter: LineFormatter,
    private readonly stream: TextStream = process.stdout
  ) {}

  write(line: string): void {
    this.stream.write(`${render(this.formatter, line)}\n`);
  }

  close(): void {
    // The stream belongs to the caller
  }
}

/**
 * Rotation limits for a file sink
 */
export interface RotationOptions {
  /** Rotate before a write would reach this size; 0 disables rotation */
  maxBytes: number;
  /** Number of rotated files kept (`<file>.1` is the newest); 0 disables rotation */
  backupCount: number;
}

/**
 * Appends formatted lines to a file, rotating it by size
 *
 * The file (and its parent directory) is created on first write.
 */
export class RotatingFileSink implements LogSink {
  readonly kind = 'file';
  private fd: number | null = null;
  private size = 0;

  constructor(
    readonly level: LogLevel,
    private readonly formatter: LineFormatter,
    readonly path: string,
    private readonly rotation: RotationOptions
  ) {}

  write(line: string): void {
    const text = `${render(this.formatter, line)}\n`;
    const bytes = Buffer.byteLength(text, 'utf-8');

    if (this.shouldRollover(bytes)) {
      this.rollover();
    }

    const fd = this.open();
    writeSync(fd, text, null, 'utf-8');
    this.size += bytes;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  private open(): number {
    if (this.fd === null) {
      mkdirSync(dirname(this.path), { recursive: true });
      this.fd = openSync(this.path, 'a');
      this.size = fstatSync(this.fd).size;
    }
    return this.fd;
  }

  private shouldRollover(bytes: number): boolean {
    if (this.rotation.maxBytes <= 0 || this.rotation.backupCount <= 0) {
      return false;
    }
    this.open();
    return this.size > 0 && this.size + bytes >= this.rotation.maxBytes;
  }

  private rollover(): void {
    this.close();

    for (let i = this.rotation.backupCount - 1; i >= 1; i--) {
      const source = `${this.path}.${i}`;
      if (existsSync(source)) {
        renameSync(source, `${this.path}.${i + 1}`);
      }
    }
    rmSync(`${this.path}.1`, { force: true });
    renameSync(this.path, `${this.path}.1`);
  }
}
