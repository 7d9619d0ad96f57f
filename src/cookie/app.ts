// ==============================
// CLI のオーケストレーション
// ------------------------------
// 引数 → ログ読込 → 集計 → 表示。process には触らず、終了コードを返す。
// 想定内の失敗（引数不正・読込失敗・有効行なし）は全て終了コード 1。

import { parseArgs, USAGE } from './args.js';
import { loadConfig, type Env } from './config.js';
import { countOnDate, findMostActive } from './core.js';
import { InvalidArgumentError, LogFileError } from './errors.js';
import { buildOutput, centerLines, MSG } from './format.js';
import { createLogger } from './logger.js';
import { readLog } from './parser.js';

export type RunDeps = {
  env: Env;
  write: (text: string) => void; // 標準出力
  log?: (line: string) => void; // 標準エラー（ロガーの出力先）
};

export const run = async (argv: readonly string[], deps: RunDeps): Promise<number> => {
  const { config, notices } = loadConfig(deps.env);
  const logger = createLogger(config.logLevel, deps.log);
  for (const n of notices) logger.warn(n);

  const println = (line: string) => deps.write(line + '\n');

  try {
    const args = parseArgs(argv);
    if (args.kind === 'help') {
      println(USAGE);
      return 0;
    }

    const { records } = await readLog(args.filePath, logger);
    if (records.length === 0) {
      logger.warn(MSG.EMPTY_LOG);
      println(`Error: ${MSG.EMPTY_LOG}`);
      return 1;
    }

    const ids = findMostActive(records, args.date);
    if (ids.length === 0) {
      logger.info(`No active cookies found for the specified date: ${args.date}`);
    } else {
      const max = countOnDate(records, args.date).get(ids[0]) ?? 0;
      logger.info(`Found ${ids.length} most active cookie(s) with frequency ${max} on ${args.date}`);
    }

    const block = buildOutput(ids, args.date, { color: config.color });
    deps.write('\n' + centerLines(block, config.terminalWidth) + '\n\n');
    return 0;
  } catch (e) {
    if (e instanceof InvalidArgumentError) {
      logger.error(e.message);
      println(e.usage ? e.message : `Error: ${e.message}`);
      return 1;
    }
    if (e instanceof LogFileError) {
      println(`Error: Unable to process the log file. ${e.message}`);
      return 1;
    }
    throw e; // 想定外は main 側で処理
  }
};
