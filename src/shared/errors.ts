import getTypeName from "type-name";
import { type BaseIssue } from "valibot";

/***************************************************************************************************
 *
 * ユーティリティー
 *
 **************************************************************************************************/

/**
 * エラーに紐づくメタデータの型です。
 */
export type ErrorMeta = { readonly [key: string]: unknown };

/***************************************************************************************************
 *
 * エラークラス
 *
 **************************************************************************************************/

/**
 * このライブラリが投げるエラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ErrorBase<TMeta extends ErrorMeta | undefined = undefined> extends Error {
  /**
   * エラーに紐づくメタデータです。
   */
  public readonly meta: TMeta;

  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(undefined, options);
    this.meta = meta;
  }
}

/**************************************************************************************************/

/**
 * 型が期待値と異なる場合に投げられるエラーです。
 */
export class TypeError extends ErrorBase<{
  /**
   * 期待される型です。
   */
  expected: string;

  /**
   * 実際に受け取った値の型です。
   */
  actual: string;
}> {
  static {
    this.prototype.name = "Sha256TypeError";
  }

  /**
   * `Sha256TypeError` クラスの新しいインスタンスを初期化します。
   *
   * @param expectedType 期待される型名、または型名の配列です。
   * @param actualValue 実際に受け取った値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    expectedType: string | readonly string[],
    actualValue: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, {
      actual: getTypeName(actualValue) || `<Anonymous ${typeof actualValue}>`,
      expected: typeof expectedType === "string"
        ? expectedType
        : expectedType.slice().sort().join(" | "),
    });
    this.message = `Expected ${this.meta.expected}, but got ${this.meta.actual}`;
  }
}

/**************************************************************************************************/

/**
 * 検証エラーの問題点です。
 */
export type Issue = BaseIssue<unknown>;

/**
 * 検証エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ValidationErrorBase<TMeta extends ErrorMeta> extends ErrorBase<TMeta> {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * 入力値検証エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class InvalidInputErrorBase<TMeta extends ErrorMeta> extends ValidationErrorBase<TMeta> {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * 入力値の検証に失敗した場合に投げられるエラーです。
 */
export class InvalidInputError extends InvalidInputErrorBase<{
  /**
   * 検証エラーの問題点です。
   */
  issues: [Issue, ...Issue[]];

  /**
   * 検証した入力値です。
   */
  input: unknown;
}> {
  static {
    this.prototype.name = "Sha256InvalidInputError";
  }

  /**
   * `Sha256InvalidInputError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    this.message = issues.map(issue => issue.message).join(": ");
  }
}

/**************************************************************************************************/

/**
 * 予期しない値に遭遇した場合に投げられるエラーです。
 */
export class UnexpectedValidationError extends ValidationErrorBase<{
  /**
   * 検証エラーの問題点です。
   */
  issues: [Issue, ...Issue[]];

  /**
   * 予期しない値です。
   */
  value: unknown;
}> {
  static {
    this.prototype.name = "Sha256UnexpectedValidationError";
  }

  /**
   * `Sha256UnexpectedValidationError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param value 予期しない値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    value: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, value });
    this.message = issues.map(issue => issue.message).join(": ");
  }
}

/**************************************************************************************************/

/**
 * ハッシュコンテキストの状態に関連するエラーの基底クラスです。
 */
export class ContextErrorBase extends ErrorBase {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined) {
    super(options, undefined);
  }
}

/**************************************************************************************************/

/**
 * 計算を終えたハッシュコンテキストを、初期化せずに操作しようとした場合に投げられるエラーです。
 */
export class ContextFinishedError extends ContextErrorBase {
  static {
    this.prototype.name = "Sha256ContextFinishedError";
  }

  /**
   * `Sha256ContextFinishedError` クラスの新しいインスタンスを初期化します。
   *
   * @param options エラーのオプションです。
   */
  public constructor(options?: ErrorOptions | undefined) {
    super(options);
    this.message = "Hash context is already finished; call init() before reusing it";
  }
}

/**************************************************************************************************/
