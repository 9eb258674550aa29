import isArrayBuffer from "./_is-array-buffer.js";

/**
 * 引数に与えられた値が `buffer` に `ArrayBuffer` を持つ `Uint8Array` オブジェクトかどうか判定します。
 * `SharedArrayBuffer` 上のビューは対象外です。
 *
 * @param value `Uint8Array` オブジェクトであるか検証する値です。
 * @returns `value` が `Uint8Array` オブジェクトであれば `true`、そうでなければ `false` です。
 */
export default function isUint8Array(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array && isArrayBuffer(value.buffer);
}
