const toString = Object.prototype.toString;

/**
 * 引数に与えられた値が `Error` オブジェクトかどうかを判定します。
 * 別の realm で作成された `Error` もタグ名で判定します。
 *
 * @param value `Error` オブジェクトであるか検証する値です。
 * @returns `value` が `Error` オブジェクトであれば `true`、そうでなければ `false` です。
 */
export default function isError(value: unknown): value is Error {
  return value instanceof Error || toString.call(value) === "[object Error]";
}
