import { describe, expect, it } from 'vitest';
import { parseArgs, USAGE } from './args.js';
import { InvalidArgumentError } from './errors.js';

describe('parseArgs', () => {
  it('-f <file> -d <date> を読む', () => {
    expect(parseArgs(['-f', 'cookie_log.csv', '-d', '2018-12-09'])).toEqual({
      kind: 'query',
      filePath: 'cookie_log.csv',
      date: '2018-12-09',
    });
  });

  it('--help / -h 単独はヘルプ', () => {
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('トークン数・フラグ順が違えば usage エラー', () => {
    const cases = [
      [],
      ['-f', 'a.csv'],
      ['-d', '2018-12-09', '-f', 'a.csv'],
      ['-f', 'a.csv', '-d', '2018-12-09', 'extra'],
      ['--file', 'a.csv', '-d', '2018-12-09'],
    ];
    for (const argv of cases) {
      let caught: unknown;
      try {
        parseArgs(argv);
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(InvalidArgumentError);
      expect(caught).toMatchObject({ message: USAGE, usage: true });
    }
  });

  it('日付形式が不正ならエラー（usage ではない）', () => {
    for (const date of ['2018-12-9', '2018/12/09', '2018-13-01', '2018-02-30', 'today']) {
      expect(() => parseArgs(['-f', 'a.csv', '-d', date])).toThrow(
        'Invalid date format. Please use YYYY-MM-DD.'
      );
    }
  });

  it('閏日は許可', () => {
    expect(parseArgs(['-f', 'a.csv', '-d', '2024-02-29'])).toMatchObject({ date: '2024-02-29' });
  });
});
