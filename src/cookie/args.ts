import { InvalidArgumentError } from './errors.js';
import { isCalendarDate, type CalendarDate } from './record.js';

export const USAGE = 'Usage: most-active-cookie -f <filename> -d <YYYY-MM-DD>';

export type Args =
  | { kind: 'help' }
  | { kind: 'query'; filePath: string; date: CalendarDate };

/**
 * 引数は `-f <filename> -d <YYYY-MM-DD>` の4トークン固定（順序も固定）。
 * `-h` / `--help` 単独ならヘルプ。
 */
export const parseArgs = (argv: readonly string[]): Args => {
  if (argv.length === 1 && (argv[0] === '-h' || argv[0] === '--help')) {
    return { kind: 'help' };
  }

  if (argv.length !== 4 || argv[0] !== '-f' || argv[2] !== '-d') {
    throw new InvalidArgumentError(USAGE, { usage: true });
  }

  const [, filePath, , date] = argv;
  if (!isCalendarDate(date)) {
    throw new InvalidArgumentError('Invalid date format. Please use YYYY-MM-DD.');
  }

  return { kind: 'query', filePath, date };
};
