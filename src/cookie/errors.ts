// 呼び出し側の入力不備（日付未指定・引数形式・空のファイルパス）
export class InvalidArgumentError extends Error {
  readonly usage: boolean; // true なら使い方を表示する

  constructor(message: string, options: { usage?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'InvalidArgumentError';
    this.usage = options.usage ?? false;
  }
}

// ログファイルの読み込み失敗（存在しない・権限なし等）
export class LogFileError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LogFileError';
    this.filePath = filePath;
  }
}
