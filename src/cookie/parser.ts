// ==============================
// cookie ログのパーサ
// ------------------------------
// 入力は `cookie,timestamp` の CSV（先頭1行はヘッダとして常にスキップ）。
// timestamp は UTC オフセット必須の ISO-8601（例: 2018-12-09T14:19:00+00:00）。
// 日付は「記載されたオフセットでの日付」に切り捨てる（UTC へは変換しない）。
// 壊れた行は warn ログを出してスキップし、失敗にはしない。

import * as fs from 'node:fs';
import * as readline from 'node:readline';
import { InvalidArgumentError, LogFileError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { isValidYmd, type CalendarDate, type LogRecord } from './record.js';

export type ParseResult = {
  records: LogRecord[];
  skipped: number; // 不正行としてスキップした件数（空行を含む）
};

const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-](\d{2}):(\d{2})(?::(\d{2}))?)$/i;

/**
 * timestamp を日付に切り捨てる。不正なら null。
 * 秒・小数秒は省略可、オフセットは `Z` か `±HH:MM[:SS]`（±18:00 まで）。
 * `T` / `Z` は大文字小文字を区別しない。
 */
export const toCalendarDate = (timestamp: string): CalendarDate | null => {
  const m = timestamp.match(TIMESTAMP_RE);
  if (!m) return null;

  const [, yRaw, moRaw, dRaw, hRaw, miRaw, sRaw, ohRaw, omRaw, osRaw] = m;
  const y = parseInt(yRaw, 10);
  const mo = parseInt(moRaw, 10);
  const d = parseInt(dRaw, 10);
  if (!isValidYmd(y, mo, d)) return null;

  // 時刻の範囲チェック
  if (parseInt(hRaw, 10) > 23) return null;
  if (parseInt(miRaw, 10) > 59) return null;
  if (sRaw !== undefined && parseInt(sRaw, 10) > 59) return null;

  // オフセットの範囲チェック（Z のときは undefined）
  if (ohRaw !== undefined) {
    const oh = parseInt(ohRaw, 10);
    const om = parseInt(omRaw, 10);
    const os = osRaw === undefined ? 0 : parseInt(osRaw, 10);
    if (om > 59 || os > 59) return null;
    if (oh > 18 || (oh === 18 && (om > 0 || os > 0))) return null;
  }

  return `${yRaw}-${moRaw}-${dRaw}`;
};

export type LineResult =
  | { ok: true; record: LogRecord }
  | { ok: false; reason: 'malformed' | 'timestamp' };

// CSV 1行をパース。壊れていれば理由を返す
export const parseLine = (line: string): LineResult => {
  const parts = line.split(',');
  // 末尾の空フィールドは無視する（`id,ts,` も有効な行）
  while (parts.length > 2 && parts[parts.length - 1] === '') parts.pop();
  if (parts.length !== 2) return { ok: false, reason: 'malformed' };

  const identifier = parts[0].trim();
  if (!identifier) return { ok: false, reason: 'malformed' };

  const date = toCalendarDate(parts[1].trim());
  if (date === null) return { ok: false, reason: 'timestamp' };

  return { ok: true, record: { identifier, date } };
};

/**
 * 複数行を受け取り、ヘッダ（先頭行）を除いてパースする。
 * 不正行（空行を含む）は warn を出してスキップ。
 */
export const parseLines = (
  lines: readonly string[],
  logger: Logger = silentLogger
): ParseResult => {
  const records: LogRecord[] = [];
  let skipped = 0;

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    const res = parseLine(line);
    if (res.ok) {
      records.push(res.record);
      continue;
    }

    skipped += 1;
    if (res.reason === 'malformed') {
      logger.warn(`Skipping malformed line: ${line}`);
    } else {
      logger.warn(`Skipping invalid timestamp in line: ${line}`);
    }
  }

  return { records, skipped };
};

const errorCode = (e: unknown): string | undefined =>
  typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string'
    ? e.code
    : undefined;

const toLogFileError = (e: unknown, filePath: string): LogFileError => {
  switch (errorCode(e)) {
    case 'ENOENT':
      return new LogFileError(`File not found: ${filePath}`, filePath, e);
    case 'EACCES':
    case 'EPERM':
      return new LogFileError(`Permission denied: unable to read file at ${filePath}`, filePath, e);
    case 'EISDIR':
      return new LogFileError(`Not a file: ${filePath}`, filePath, e);
    default:
      return new LogFileError(`I/O error while reading file: ${filePath}`, filePath, e);
  }
};

// ファイルを1行ずつ読み込み、parseLines に渡す
export async function readLog(
  filePath: string,
  logger: Logger = silentLogger
): Promise<ParseResult> {
  if (!filePath.trim()) {
    throw new InvalidArgumentError('file path must not be empty');
  }

  logger.info(`Reading log file: ${filePath}`);

  const lines: string[] = [];
  try {
    // 読み込み前に存在・権限・種別を確認（ストリームのエラーより先に原因を特定する）
    await fs.promises.access(filePath, fs.constants.R_OK);
    const stat = await fs.promises.stat(filePath);
    if (stat.isDirectory()) {
      throw Object.assign(new Error(`EISDIR: ${filePath}`), { code: 'EISDIR' });
    }

    const stream = fs.createReadStream(filePath, { encoding: 'utf8' });
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    for await (const line of rl) {
      lines.push(line);
    }
  } catch (e) {
    const err = toLogFileError(e, filePath);
    logger.error(err.message, e);
    throw err;
  }

  const result = parseLines(lines, logger);
  logger.info(`Parsed ${result.records.length} record(s), skipped ${result.skipped} line(s)`);
  return result;
}
