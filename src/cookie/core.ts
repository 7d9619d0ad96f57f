// ==============================
// 最頻 cookie 集計（コアロジック）
// ------------------------------
// 指定日付に完全一致するレコードだけを数え、最大出現回数の cookie を全て返す。
// 同数の場合は「絞り込み後に初めて現れた順」。Map の挿入順がそのまま使える。
// I/O・ログ出力はしない（呼び出し側の責務）。

import { InvalidArgumentError } from './errors.js';
import type { CalendarDate, LogRecord } from './record.js';

/**
 * 指定日付の cookie ごとの出現回数。
 * キーの並びは初出順。
 */
export const countOnDate = (
  records: readonly LogRecord[],
  targetDate: CalendarDate
): Map<string, number> => {
  const freq = new Map<string, number>();
  for (const r of records) {
    if (r.date !== targetDate) continue; // 範囲ではなく完全一致
    freq.set(r.identifier, (freq.get(r.identifier) ?? 0) + 1);
  }
  return freq;
};

export const findMostActive = (
  records: readonly LogRecord[],
  targetDate?: CalendarDate | null
): string[] => {
  // 唯一のエラー条件。空入力より先に判定する
  if (targetDate === undefined || targetDate === null) {
    throw new InvalidArgumentError('target date must be specified');
  }

  const freq = countOnDate(records, targetDate);
  if (freq.size === 0) return [];

  let max = 0;
  for (const count of freq.values()) {
    if (count > max) max = count;
  }

  // 同数は全て返す（初出順）
  const out: string[] = [];
  for (const [id, count] of freq) {
    if (count === max) out.push(id);
  }
  return out;
};
