import type { Bytes32, HashState } from "../shared/schemas.js";
import type { Uint8ArraySource } from "../shared/to-uint8-array.js";

/**
 * 計算されたダイジェストです。ビッグエンディアンで直列化された 8 ワードの状態 (32 バイト) です。
 */
export type Digest = Bytes32;

/**
 * ハッシュ値を逐次計算するためのコンテキストのインターフェースです。
 */
export interface IHashContext {
  /**
   * `init()` 以降に追加されたデータのうち、ブロックに満たず未処理のまま保持しているバイト数です。
   */
  readonly bufferedLength: number;

  /**
   * `init()` 以降に追加されたデータの総ビット数です。
   */
  readonly bitLength: bigint;

  /**
   * `finish()` によって計算を終えているかどうかです。
   */
  readonly finished: boolean;

  /**
   * 内部状態を初期値に戻します。以前の状態はすべて破棄されます。
   */
  init(): this;

  /**
   * ハッシュ値の計算に必要な内部データを更新します。
   *
   * @param data 追加するバイト列です。
   * @param length `data` の先頭から追加するバイト数です。
   */
  append(data: Uint8ArraySource, length?: number | undefined): this;

  /**
   * `append()` で渡されたすべてのデータのダイジェストを計算します。
   *
   * @param hash ダイジェストの書き込み先です。
   */
  finish(hash?: Uint8Array | undefined): Digest;

  /**
   * 計算を途中から再開するための内部状態を返します。
   */
  save(): HashState;
}
