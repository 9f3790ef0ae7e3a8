/**
 * Logger Interface
 *
 * ドキュメント生成パスの進捗と警告を出力する
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * コンソールへ出力するロガー
 *
 * 警告は標準エラー出力へ書く
 */
export const consoleLogger: Logger = {
  info: (message) => {
    console.log(message);
  },
  warn: (message) => {
    console.warn(`⚠️  ${message}`);
  },
};

/**
 * 何も出力しないロガー（--quiet 用）
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
