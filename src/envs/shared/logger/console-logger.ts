import { type ILogger, type LogEntry, LogLevel } from "../../../shared/logger.js";

/**
 * ログを `console` に記録するロガーです。
 */
export default class ConsoleLogger implements ILogger {
  /**
   * このロガーが記録するログレベルのしきい値です。指定されたレベル以上のログのみが記録されます。
   */
  public readonly level: LogLevel;

  /**
   * `ConsoleLogger` の新しいインスタンスを構築します。
   *
   * @param level 記録するログレベルのしきい値です。指定されない場合は `LogLevel.ERROR` が使用されます。
   */
  public constructor(level: LogLevel | undefined = LogLevel.ERROR) {
    this.level = level;
  }

  public log(entry: LogEntry): void {
    if (entry.level < this.level) {
      return;
    }

    switch (entry.level) {
      case LogLevel.ERROR:
      case LogLevel.WARN: {
        const write = entry.level === LogLevel.ERROR ? console.error : console.warn;
        if ("reason" in entry) {
          write(entry.message, entry.reason);
        } else {
          write(entry.message);
        }
        break;
      }

      case LogLevel.INFO:
        console.info(entry.message);
        break;

      case LogLevel.DEBUG:
        console.debug(entry.message);
        break;

      default:
        entry satisfies never;
    }
  }
}
