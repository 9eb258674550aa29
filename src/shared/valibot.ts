import {
  type BaseIssue,
  type GenericSchema,
  type InferOutput,
  rawCheck,
  type RawCheckAction,
  safeParse,
} from "valibot";
import {
  type ErrorMeta,
  InvalidInputError,
  type Issue,
  UnexpectedValidationError,
  type ValidationErrorBase,
} from "./errors.js";
import isError from "./is-error.js";

/***************************************************************************************************
 *
 * 再エクスポート
 *
 **************************************************************************************************/

export {
  array,
  brand,
  instance,
  integer,
  length,
  maxLength,
  maxValue,
  minLength,
  minValue,
  number,
  object,
  pipe,
  readonly,
  safeInteger,
} from "valibot";
export type { InferInput, InferOutput } from "valibot";

/***************************************************************************************************
 *
 * check
 *
 **************************************************************************************************/

/**
 * 型付けされた入力値を検査し、`operation` が `false` を返すか例外を投げた場合に問題点を追加するアクションを作成します。
 *
 * @template TInput 入力値の型です。
 * @param operation 入力値を検査する関数です。
 * @param message 検査に失敗したときのメッセージです。
 * @returns Valibot のアクションです。
 */
export function check<TInput>(
  operation: (input: TInput) => boolean,
  message: string,
): RawCheckAction<TInput> {
  return rawCheck<TInput>(({ dataset, addIssue }) => {
    if (!dataset.typed) {
      return;
    }

    const input = dataset.value;
    try {
      if (!operation(input)) {
        addIssue({ input, message });
      }
    } catch (ex) {
      let reason: string;
      if (isError(ex)) {
        reason = `${ex.name}: ${ex.message}`;
      } else {
        try {
          reason = JSON.stringify(ex);
        } catch {
          reason = String(ex);
        }
      }

      addIssue({
        input,
        message: `${message}: ${reason}`,
      });
    }
  });
}

/***************************************************************************************************
 *
 * parse
 *
 **************************************************************************************************/

interface IParseError {
  new(issues: [Issue, ...Issue[]], input: unknown): ValidationErrorBase<ErrorMeta>;
}

/**
 * 呼び出し元から受け取った値を検証します。
 *
 * @param schema 検証に使用するスキーマです。
 * @param input 検証する値です。
 * @param Error 検証に失敗したときに投げるエラーのクラスです。
 * @returns 検証を通過した値です。
 */
export function parse<const TSchema extends GenericSchema<unknown, unknown, BaseIssue<unknown>>>(
  schema: TSchema,
  input: unknown,
  Error: IParseError = InvalidInputError,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new Error(result.issues, input);
  globalThis.Error.captureStackTrace(error, parse);
  throw error;
}

/**
 * 内部で保持する値を検証します。失敗した場合はライブラリ自身の不具合として扱います。
 *
 * @param schema 検証に使用するスキーマです。
 * @param input 検証する値です。
 * @returns 検証を通過した値です。
 */
export function expect<const TSchema extends GenericSchema<unknown, unknown, BaseIssue<unknown>>>(
  schema: TSchema,
  input: unknown,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new UnexpectedValidationError(result.issues, input);
  Error.captureStackTrace(error, expect);
  throw error;
}
