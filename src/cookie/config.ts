import { DEFAULT_WIDTH } from './format.js';
import { isLogLevel, type LogLevel } from './logger.js';

export type Config = {
  terminalWidth: number; // COLUMNS（既定 80）
  logLevel: LogLevel; // LOG_LEVEL（既定 warn）
  color: boolean; // NO_COLOR が空でなければ false
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * 環境変数から設定を読む。
 * 不正値は既定値に戻し、notices に理由を積む（ロガー生成後に warn で出す）。
 */
export const loadConfig = (env: Env): { config: Config; notices: string[] } => {
  const notices: string[] = [];

  let terminalWidth = DEFAULT_WIDTH;
  const columns = env['COLUMNS']?.trim();
  if (columns) {
    const n = Number(columns);
    if (Number.isInteger(n) && n > 0) {
      terminalWidth = n;
    } else {
      notices.push(`Invalid terminal width "${columns}". Defaulting to ${DEFAULT_WIDTH}.`);
    }
  }

  let logLevel: LogLevel = DEFAULT_LOG_LEVEL;
  const levelRaw = env['LOG_LEVEL']?.trim().toLowerCase();
  if (levelRaw) {
    if (isLogLevel(levelRaw)) {
      logLevel = levelRaw;
    } else {
      notices.push(`Unknown log level "${levelRaw}". Defaulting to ${DEFAULT_LOG_LEVEL}.`);
    }
  }

  const color = !env['NO_COLOR'];

  return { config: { terminalWidth, logLevel, color }, notices };
};
