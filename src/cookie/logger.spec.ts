import { describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

const clock = () => new Date('2024-01-01T12:34:56.000Z');

describe('createLogger', () => {
  it('[ISO時刻] [LEVEL] message 形式で出力する', () => {
    const sink = vi.fn();
    createLogger('debug', sink, clock).info('hello');
    expect(sink).toHaveBeenCalledWith('[2024-01-01T12:34:56.000Z] [INFO] hello');
  });

  it('しきい値未満のレベルは出さない', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (l) => lines.push(l), clock);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(lines).toEqual([
      '[2024-01-01T12:34:56.000Z] [WARN] w',
      '[2024-01-01T12:34:56.000Z] [ERROR] e',
    ]);
  });

  it('silent は何も出さない', () => {
    const sink = vi.fn();
    const logger = createLogger('silent', sink, clock);
    logger.error('e', new Error('boom'));
    expect(sink).not.toHaveBeenCalled();
  });

  it('error にはスタックを付ける', () => {
    const lines: string[] = [];
    const err = new Error('boom');
    err.stack = 'Error: boom\n    at test';
    createLogger('error', (l) => lines.push(l), clock).error('failed', err);
    expect(lines).toEqual(['[2024-01-01T12:34:56.000Z] [ERROR] failed\nError: boom\n    at test']);
  });

  it('既定の出力先は console.error', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('info', undefined, clock).info('to stderr');
    expect(spy).toHaveBeenCalledWith('[2024-01-01T12:34:56.000Z] [INFO] to stderr');
    spy.mockRestore();
  });
});
