import { Bytes32Schema } from "../shared/schemas.js";
import type { Uint8ArraySource } from "../shared/to-uint8-array.js";
import * as v from "../shared/valibot.js";
import type { Digest } from "./_hash.js";
import Sha256Context, { type Sha256ContextOptions } from "./sha256-context.js";

/**
 * SHA-256 のハッシュ値の計算に関連するユーティリティーオブジェクトのインターフェースです。
 */
export interface ISha256 {
  /**
   * ハッシュ値を逐次計算するためのコンテキストを作成します。
   *
   * @param state `save()` で保存した内部状態です。指定した場合はその時点から計算を再開します。
   * @returns ハッシュ値を計算するためのコンテキストです。
   */
  create(state?: readonly number[] | undefined): Sha256Context;

  /**
   * 任意の長さのデータのダイジェストを計算します。
   *
   * @param data ハッシュ値を計算する対象のバイト列です。文字列は UTF-8 でエンコードされます。
   * @returns 32 バイトのダイジェストです。
   */
  hash(data: Uint8ArraySource): Digest;

  /**
   * ちょうど 32 バイトの鍵やダイジェストを再びハッシュします。
   *
   * @param key ハッシュする 32 バイトのデータです。
   * @param hash ダイジェストの書き込み先 (ちょうど 32 バイト) です。`key` と同じ配列でも構いません。
   * @returns 32 バイトのダイジェストです。
   */
  digest(key: Uint8Array, hash?: Uint8Array | undefined): Digest;

  /**
   * 32 バイトのデータをハッシュし、そのダイジェストで元のデータを上書きします。
   *
   * @param buffer ハッシュする 32 バイトのデータです。ダイジェストで上書きされます。
   * @returns 上書きされた `buffer` です。
   */
  selfDigest(buffer: Uint8Array): Digest;
}

/**
 * 指定したオプションでコンテキストを作成するユーティリティーオブジェクトを作成します。
 *
 * @param options 作成されるコンテキストのオプションです。
 * @returns SHA-256 のユーティリティーオブジェクトです。
 */
export function createSha256(options?: Sha256ContextOptions | undefined): ISha256 {
  return {
    create(state) {
      return state === undefined
        ? new Sha256Context(options)
        : Sha256Context.load(state, options);
    },

    hash(data) {
      return this.create().append(data).finish();
    },

    digest(key, hash) {
      const input = v.parse(Bytes32Schema(), key);
      const ctx = this.create().append(input);

      // `input` はすでにコンテキストのバッファーにコピーされているので、`hash` が同じ配列でも安全に書き込めます。
      return ctx.finish(hash);
    },

    selfDigest(buffer) {
      return this.digest(buffer, buffer);
    },
  };
}

/**
 * ロガーを持たない SHA-256 のユーティリティーオブジェクトです。
 */
export default createSha256();
