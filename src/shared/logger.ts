/**
 * ログレベルの型定義です。
 */
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * ログレベルを定義する定数です。値が大きいほど重要なログです。`QUIET` は何も記録しないしきい値として使います。
 */
export const LogLevel = {
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  QUIET: 5,
} as const;

/**
 * メッセージだけを持つログの内容です。
 *
 * @template TLevel ログレベルです。
 */
type MessageEntry<TLevel extends LogLevel> = {
  /**
   * ログレベルです。
   */
  level: TLevel;

  /**
   * メッセージです。
   */
  message: string;
};

/**
 * 原因を添えられるログの内容です。
 *
 * @template TLevel ログレベルです。
 */
type ReasonEntry<TLevel extends LogLevel> = MessageEntry<TLevel> & {
  /**
   * 警告やエラーの原因です。
   */
  reason?: unknown;
};

/**
 * ログの内容を定義する型です。`WARN` と `ERROR` のみ原因を持てます。
 */
export type LogEntry =
  | MessageEntry<typeof LogLevel.DEBUG>
  | MessageEntry<typeof LogLevel.INFO>
  | ReasonEntry<typeof LogLevel.WARN>
  | ReasonEntry<typeof LogLevel.ERROR>;

/**
 * ハッシュコンテキストが使用するロガーのインターフェースです。
 * 計算の完了やコンテキストの破棄といった内部情報を通知する際に使用されます。
 */
export interface ILogger {
  /**
   * 指定されたログレベルとメッセージでログを記録します。
   *
   * @param entry ログの内容です。
   */
  log(entry: LogEntry): void;
}
