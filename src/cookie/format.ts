import type { CalendarDate } from './record.js';

// ANSI エスケープ（緑・太字・リセット）
export const ANSI = {
  GREEN: '\x1b[32m',
  BOLD: '\x1b[1m',
  RESET: '\x1b[0m',
} as const;

export const MSG = {
  NO_ACTIVE: 'No active cookies found for the specified date.',
  EMPTY_LOG: 'The log file is empty or contains no valid entries.',
} as const;

export const DEFAULT_WIDTH = 80;

const ANSI_RE = /\x1b\[[0-9;]*m/g;

// 表示幅（ANSI コードは数えない）
export const visibleLength = (s: string): number => s.replace(ANSI_RE, '').length;

/**
 * 結果ブロックを組み立てる。
 * - 0件なら固定メッセージのみ
 * - それ以外は見出し → 空行 → 1行1件
 */
export const buildOutput = (
  ids: readonly string[],
  date: CalendarDate,
  opts: { color: boolean }
): string => {
  const lines =
    ids.length === 0 ? [MSG.NO_ACTIVE] : [`Most active cookies on ${date}:`, '', ...ids];

  if (!opts.color) return lines.join('\n');

  // 先頭行の前に開始コード、末尾行の後ろにリセット
  const last = lines.length - 1;
  return lines
    .map((line, i) => {
      let out = line;
      if (i === 0) out = ANSI.GREEN + ANSI.BOLD + out;
      if (i === last) out = out + ANSI.RESET;
      return out;
    })
    .join('\n');
};

// 各行を width の中央に寄せる（左に空白を詰めるだけ。空行はそのまま）
export const centerLines = (text: string, width: number): string =>
  text
    .split('\n')
    .map((line) => {
      if (!line) return line;
      const pad = Math.max(0, Math.floor((width - visibleLength(line)) / 2));
      return ' '.repeat(pad) + line;
    })
    .join('\n');
