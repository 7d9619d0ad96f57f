/**
 * ログ出力ユーティリティ
 * - 書式: `[ISO時刻] [LEVEL] message`
 * - 出力先は stderr（標準出力は集計結果専用）
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
};

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

const formatMessage = (level: string, message: string, now: Date): string =>
  `[${now.toISOString()}] [${level}] ${message}`;

export const createLogger = (
  level: LogLevel,
  sink: (line: string) => void = (line) => console.error(line),
  clock: () => Date = () => new Date()
): Logger => {
  const emit = (lv: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (RANK[lv] < RANK[level]) return;
    sink(formatMessage(lv.toUpperCase(), message, clock()));
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message, error) => {
      const details = error instanceof Error && error.stack ? `\n${error.stack}` : '';
      emit('error', message + details);
    },
  };
};

// テストやライブラリ利用時の既定値
export const silentLogger: Logger = createLogger('silent', () => undefined);
