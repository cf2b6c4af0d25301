/**
 * Logger tests
 *
 * @description Level names, entry formatting, output targets, masking of
 *              sensitive metadata and child loggers
 * @since 0.1.0
 */

import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { logger, parseLogLevel, setupLogging } from '../src/logger.js';
import { LogEntry, LogLevel, StructuredLogger } from '../src/logging/structuredLogger.js';
import { WmfdbValueError } from '../src/types.js';

const ENTRY: LogEntry = {
  timestamp: new Date(0),
  level: LogLevel.WARN,
  message: 'hello',
  category: 'test',
  pid: 42
};

describe('level names', () => {
  test.each<[string, LogLevel]>([
    ['DEBUG', LogLevel.DEBUG],
    ['INFO', LogLevel.INFO],
    ['WARN', LogLevel.WARN],
    ['WARNING', LogLevel.WARN],
    ['ERROR', LogLevel.ERROR],
    ['CRITICAL', LogLevel.FATAL],
    ['FATAL', LogLevel.FATAL]
  ])('%s maps to %s', (name, level) => {
    expect(parseLogLevel(name)).toBe(level);
  });

  test('rejects unknown and lower-case names', () => {
    expect(() => parseLogLevel('info')).toThrow(new WmfdbValueError("Invalid logging level 'info'"));
    expect(() => parseLogLevel('LOUD')).toThrow(WmfdbValueError);
  });

  test('setupLogging sets the shared threshold and format', () => {
    expect(setupLogging('DEBUG', { format: 'json' })).toBe(logger);
    expect(logger.getConfig().level).toBe(LogLevel.DEBUG);
    expect(logger.getConfig().format).toBe('json');
    expect(logger.getConfig().output).toBe('none');
  });
});

describe('StructuredLogger', () => {
  describe('formatting', () => {
    test('text entries', () => {
      const log = new StructuredLogger({ output: 'none' });
      expect(log.formatLogEntry(ENTRY)).toBe('1970-01-01T00:00:00.000Z 42 [WARN] test - hello');

      log.updateConfig({ enableTimestamp: false });
      expect(log.formatLogEntry({ ...ENTRY, metadata: { port: 3306 } })).toBe('42 [WARN] test - hello {"port":3306}');
      expect(log.formatLogEntry({ ...ENTRY, error: new Error('boom'), metadata: {} })).toBe(
        '42 [WARN] test - hello: boom'
      );
    });

    test('json entries', () => {
      const log = new StructuredLogger({ output: 'none', format: 'json' });
      const error = new WmfdbValueError('bad value');
      expect(JSON.parse(log.formatLogEntry({ ...ENTRY, error }))).toEqual({
        timestamp: '1970-01-01T00:00:00.000Z',
        level: 'warn',
        pid: 42,
        category: 'test',
        message: 'hello',
        error: { name: 'WmfdbValueError', message: 'bad value', category: 'invalid_input', severity: 'medium' }
      });
    });

    test('pretty entries without colours', () => {
      const log = new StructuredLogger({ output: 'none', format: 'pretty', enableColors: false, enableTimestamp: false });
      expect(log.formatLogEntry(ENTRY)).toBe('[WARN] \x1b[36m[test]\x1b[0m hello');
    });
  });

  describe('levels and callbacks', () => {
    let log: StructuredLogger;
    let entries: LogEntry[];

    beforeEach(() => {
      log = new StructuredLogger({ output: 'none', level: LogLevel.INFO });
      entries = [];
      log.addCallback(entry => {
        entries.push(entry);
      });
    });

    test('drops entries below the threshold', () => {
      log.debug('hidden');
      log.info('shown');
      log.fatal('also shown', 'custom');
      expect(entries.map(entry => [entry.level, entry.message, entry.category])).toEqual([
        [LogLevel.INFO, 'shown', 'wmfdb'],
        [LogLevel.FATAL, 'also shown', 'custom']
      ]);
      expect(log.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    });

    test('masks sensitive metadata at any depth', () => {
      log.warn('connecting', undefined, {
        user: 'u',
        password: 'test-secret',
        tls: { ssl_key: 'test-key', ssl_ca: '/ca.pem' },
        token: undefined
      });
      expect(entries[0].metadata).toEqual({
        user: 'u',
        password: '***',
        tls: { ssl_key: '***', ssl_ca: '/ca.pem' },
        token: undefined
      });
    });

    test('a failing callback does not stop the others', () => {
      const stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const failing = (): void => {
        throw new Error('callback failed');
      };
      log.addCallback(failing);
      log.addCallback(entry => {
        entries.push(entry);
      });
      log.error('oops');
      expect(stderrSpy).toHaveBeenCalledWith('Error in log callback: Error: callback failed\n');
      stderrSpy.mockRestore();
      expect(entries).toHaveLength(2);
    });

    test('children share configuration and callbacks', () => {
      const child = log.child('child');
      child.debug('hidden');
      log.updateConfig({ level: LogLevel.DEBUG });
      child.debug('shown');
      expect(entries.map(entry => [entry.category, entry.message])).toEqual([['child', 'shown']]);
    });
  });

  describe('output', () => {
    let tmp: string;

    beforeEach(() => {
      tmp = mkdtempSync(path.join(tmpdir(), 'wmfdb-log-'));
    });

    afterEach(() => {
      rmSync(tmp, { recursive: true, force: true });
    });

    test('console output goes to stderr', () => {
      const stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const log = new StructuredLogger({ output: 'console', enableTimestamp: false }, 'test');
      log.warn('to stderr');
      expect(stderrSpy).toHaveBeenCalledWith(`${process.pid} [WARN] test - to stderr\n`);
      stderrSpy.mockRestore();
    });

    test('file output appends lines', () => {
      const file = path.join(tmp, 'wmfdb.log');
      const log = new StructuredLogger({ output: 'file', filePath: file, enableTimestamp: false }, 'test');
      log.warn('first');
      log.error('second');
      expect(readFileSync(file, 'utf8')).toBe(
        `${process.pid} [WARN] test - first\n${process.pid} [ERROR] test - second\n`
      );
    });
  });
});
