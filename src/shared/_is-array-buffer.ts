const toString = Object.prototype.toString;

/**
 * 引数に与えられた値が `ArrayBuffer` オブジェクトかどうかを判定します。
 * 別の realm で作成された `ArrayBuffer` も、タグ名で判定します。`SharedArrayBuffer` は対象外です。
 *
 * @param value `ArrayBuffer` オブジェクトであるか検証する値です。
 * @returns `value` が `ArrayBuffer` オブジェクトであれば `true`、そうでなければ `false` です。
 */
export default function isArrayBuffer(value: unknown): value is ArrayBuffer {
  return value instanceof ArrayBuffer || toString.call(value) === "[object ArrayBuffer]";
}
