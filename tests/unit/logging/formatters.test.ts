import { describe, it, expect } from 'vitest';
import {
  ColoredFormatter,
  PlainFormatter,
  parseRecord,
  type LogRecord,
} from '../../../src/logging/formatters.js';
import { DEFAULT_LOG_FORMAT } from '../../../src/config/schema.js';

const TIME = '2026-01-02T03:04:05.000Z';

function record(level: number, msg = 'disk almost full'): LogRecord {
  return { level, time: TIME, name: 'graphvcs.core', msg };
}

describe('Formatters', () => {
  describe('PlainFormatter', () => {
    it('should render the default template', () => {
      const formatter = new PlainFormatter(DEFAULT_LOG_FORMAT);

      expect(formatter.format(record(40))).toBe(
        `${TIME} - graphvcs.core - WARNING - disk almost full`
      );
    });

    it('should leave unknown placeholders in place', () => {
      const formatter = new PlainFormatter('[{level}] {message} {thread}');

      expect(formatter.format(record(30, 'hello'))).toBe('[INFO] hello {thread}');
    });

    it('should render epoch timestamps as ISO strings', () => {
      const formatter = new PlainFormatter('{time}');

      expect(formatter.format({ level: 30, time: 0, name: '', msg: '' })).toBe(
        '1970-01-01T00:00:00.000Z'
      );
    });

    it('should append record context as JSON', () => {
      const formatter = new PlainFormatter('{level} {message}');

      expect(formatter.format({ ...record(30, 'hello'), context: { level: 'high', count: 2 } })).toBe(
        'INFO hello {"level":"high","count":2}'
      );
    });

    it('should render context at its placeholder', () => {
      const formatter = new PlainFormatter('{message} | {context} | {level}');

      expect(formatter.format({ ...record(50, 'boom'), context: { operation: 'init' } })).toBe(
        'boom | {"operation":"init"} | ERROR'
      );
    });

    it('should add nothing for empty context', () => {
      const formatter = new PlainFormatter('{level} {message}');

      expect(formatter.format({ ...record(30, 'hello'), context: {} })).toBe('INFO hello');
      expect(new PlainFormatter('{message}|{context}').format(record(30, 'hello'))).toBe('hello|');
    });
  });

  describe('ColoredFormatter', () => {
    const formatter = new ColoredFormatter('{level} {message}');

    it('should color each severity', () => {
      expect(formatter.format(record(10, 'm'))).toBe('\u001B[37mTRACE m\u001B[0m');
      expect(formatter.format(record(20, 'm'))).toBe('\u001B[37mDEBUG m\u001B[0m');
      expect(formatter.format(record(30, 'm'))).toBe('\u001B[36mINFO m\u001B[0m');
      expect(formatter.format(record(40, 'm'))).toBe('\u001B[33mWARNING m\u001B[0m');
      expect(formatter.format(record(50, 'm'))).toBe('\u001B[31mERROR m\u001B[0m');
      expect(formatter.format(record(60, 'm'))).toBe('\u001B[41mCRITICAL m\u001B[0m');
    });

    it('should end colored lines with a full reset', () => {
      const colored = new ColoredFormatter('{message}');

      expect(colored.format({ ...record(50, 'boom'), context: { code: 1 } })).toBe(
        '\u001B[31mboom {"code":1}\u001B[0m'
      );
    });

    it('should leave other levels uncolored', () => {
      expect(formatter.format(record(35, 'm'))).toBe('LEVEL35 m');
    });
  });

  describe('parseRecord', () => {
    it('should read a pino line', () => {
      const line = `${JSON.stringify({ level: 30, time: TIME, name: 'graphvcs', msg: 'ready' })}\n`;

      expect(parseRecord(line)).toEqual({ level: 30, time: TIME, name: 'graphvcs', msg: 'ready' });
    });

    it('should keep nested context', () => {
      const line = JSON.stringify({
        level: 50,
        time: TIME,
        name: 'graphvcs',
        msg: 'failed',
        context: { error: { stack: 'Error: boom' } },
      });

      expect(parseRecord(line)?.context).toEqual({ error: { stack: 'Error: boom' } });
    });

    it('should default a missing message and name', () => {
      expect(parseRecord(JSON.stringify({ level: 30, time: TIME }))).toEqual({
        level: 30,
        time: TIME,
        name: '',
        msg: '',
      });
    });

    it('should return null for other input', () => {
      expect(parseRecord('plain text')).toBeNull();
      expect(parseRecord(JSON.stringify({ message: 'no level' }))).toBeNull();
    });
  });
});
