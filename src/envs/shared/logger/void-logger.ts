import type { ILogger, LogEntry } from "../../../shared/logger.js";

/**
 * 受け取ったログを破棄するロガーです。コンテキストのログを明示的に無効にしたい場合に使用します。
 */
export default class VoidLogger implements ILogger {
  public log(_entry: LogEntry): void {}
}
