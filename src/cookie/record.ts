export type CalendarDate = string; // 'YYYY-MM-DD'（時刻・TZなし）

export type LogRecord = {
  readonly identifier: string; // cookie ID（不透明なトークン）
  readonly date: CalendarDate; // ログ時刻を日付に切り捨てたもの
};

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

// 月の日数（閏年考慮）
export const daysInMonth = (year: number, month: number): number => {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

export const isValidYmd = (year: number, month: number, day: number): boolean =>
  month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);

/**
 * 'YYYY-MM-DD' を厳密に検証する。
 * - 桁数固定（2018-1-9 は不可）
 * - 存在しない日付（2018-02-30 など）は不可
 */
export const isCalendarDate = (value: string): value is CalendarDate => {
  const m = value.match(DATE_RE);
  if (!m) return false;
  return isValidYmd(parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10));
};
