import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Logger,
  createJsonLogger,
  createLogger,
  isLogLevel,
  setDefaultLogLevel,
  type LogEntry,
} from '../../src/utils/logger.js';

function capture(options: { level?: 'debug' | 'info' | 'warn' | 'error'; context?: string } = {}) {
  const entries: LogEntry[] = [];
  const logger = new Logger({ ...options, handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('Logger', () => {
  afterEach(() => {
    setDefaultLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should drop entries below its level', () => {
    const { logger, entries } = capture({ level: 'warn' });

    logger.info('ignored');
    logger.warn('kept');

    expect(entries.map((entry) => entry.message)).toEqual(['kept']);
  });

  it('should follow the default level when none is set', () => {
    const { logger, entries } = capture();

    logger.debug('before');
    setDefaultLogLevel('debug');
    logger.debug('after');

    expect(entries.map((entry) => entry.message)).toEqual(['after']);
  });

  it('should join child contexts', () => {
    const { logger, entries } = capture({ context: 'pipeline' });

    logger.child('runner').info('turn started');

    expect(entries[0].context).toBe('pipeline:runner');
  });

  it('should expand errors into structured data', () => {
    const { logger, entries } = capture();
    const error = new Error('boom');

    logger.error('Run failed', error);
    logger.info('Plain value', 42);

    expect(entries[0].data).toEqual({ name: 'Error', message: 'boom', stack: error.stack });
    expect(entries[1].data).toEqual({ detail: 42 });
  });

  it('should log success at info level', () => {
    const { logger, entries } = capture();

    logger.success('Session deleted', { sessionId: 's-1' });

    expect(entries[0]).toMatchObject({ level: 'info', success: true, data: { sessionId: 's-1' } });
  });

  it('should write JSON lines', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createJsonLogger({ context: 'cli' }).warn('Slow turn', { ms: 1200 });

    const [line] = spy.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({ level: 'warn', context: 'cli', message: 'Slow turn', ms: 1200 });
  });

  it('should name contexts through createLogger', () => {
    const entries: LogEntry[] = [];
    createLogger('Runner', { handler: (entry) => entries.push(entry) }).info('ready');
    expect(entries[0].context).toBe('Runner');
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
