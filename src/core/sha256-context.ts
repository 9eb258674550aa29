import { ContextFinishedError } from "../shared/errors.js";
import { type ILogger, LogLevel } from "../shared/logger.js";
import {
  BLOCK_SIZE,
  ByteLengthSchema,
  Bytes32Schema,
  DIGEST_SIZE,
  HASH_STATE_HEADER_SIZE,
  type HashState,
  HashStateSchema,
  readUint64BE,
} from "../shared/schemas.js";
import toUint8Array, { type Uint8ArraySource } from "../shared/to-uint8-array.js";
import * as v from "../shared/valibot.js";
import compress from "./_compress.js";
import { IV } from "./_constants.js";
import type { Digest, IHashContext } from "./_hash.js";

/**
 * 長さの末尾 (8 バイト) を書き込むブロック内の位置です。
 */
const LENGTH_OFFSET = BLOCK_SIZE - 8;

/**
 * `Sha256Context` のオプションです。
 */
export type Sha256ContextOptions = {
  /**
   * ロガーです。指定されない場合は何も記録しません。
   */
  readonly logger?: ILogger | undefined;
};

/**
 * SHA-256 (FIPS 180-4) のハッシュ値を逐次計算するコンテキストです。
 * 任意の区切りで `append()` したバイト列のダイジェストは、一括で追加した場合と常に一致します。
 *
 * 1 つのコンテキストを複数の呼び出し元から同時に操作してはいけません。
 */
export default class Sha256Context implements IHashContext {
  /**
   * `save()` で保存した内部状態からコンテキストを復元します。
   *
   * @param state 保存された内部状態です。
   * @param options コンテキストのオプションです。
   * @returns 保存時点から計算を再開できるコンテキストです。
   */
  public static load(
    state: readonly number[],
    options?: Sha256ContextOptions | undefined,
  ): Sha256Context {
    const bytes = v.parse(HashStateSchema(), state);
    const ctx = new Sha256Context(options);
    for (let i = 0; i < 8; i++) {
      const o = i * 4;
      ctx.#state[i] = (bytes[o] << 24) | (bytes[o + 1] << 16) | (bytes[o + 2] << 8) | bytes[o + 3];
    }

    ctx.#bitLength = readUint64BE(bytes, DIGEST_SIZE);
    ctx.#blockLength = bytes.length - HASH_STATE_HEADER_SIZE;
    ctx.#block.set(bytes.slice(HASH_STATE_HEADER_SIZE));
    ctx.#logger?.log({
      level: LogLevel.DEBUG,
      message: `Restored a SHA-256 context at ${ctx.#bitLength / 8n} bytes`,
    });

    return ctx;
  }

  readonly #logger: ILogger | undefined;

  readonly #state = new Uint32Array(8);

  readonly #block = new Uint8Array(BLOCK_SIZE);

  readonly #view = new DataView(this.#block.buffer);

  readonly #schedule = new Uint32Array(64);

  #blockLength = 0;

  #bitLength = 0n;

  #finished = false;

  /**
   * `Sha256Context` の新しいインスタンスを構築します。構築されたコンテキストは初期化済みです。
   *
   * @param options コンテキストのオプションです。
   */
  public constructor(options?: Sha256ContextOptions | undefined) {
    this.#logger = options?.logger;
    this.init();
  }

  public get bufferedLength(): number {
    return this.#blockLength;
  }

  public get bitLength(): bigint {
    return this.#bitLength;
  }

  public get finished(): boolean {
    return this.#finished;
  }

  /**
   * 内部状態を初期ハッシュ値に戻し、未処理のバイト列とビット長を破棄します。
   * 使用済みのコンテキストに対して呼び出すと、新しく構築したコンテキストと同じ状態になります。
   *
   * @returns このコンテキストです。
   */
  public init(): this {
    if (!this.#finished && this.#bitLength > 0n) {
      this.#logger?.log({
        level: LogLevel.DEBUG,
        message: `Discarded an unfinished SHA-256 context after ${this.#bitLength / 8n} bytes`,
      });
    }

    this.#state.set(IV);
    this.#block.fill(0);
    this.#blockLength = 0;
    this.#bitLength = 0n;
    this.#finished = false;

    return this;
  }

  /**
   * バイト列を追加します。64 バイトのブロックが揃うたびに圧縮関数で処理し、端数は次の呼び出しまで保持します。
   *
   * @param data 追加するバイト列です。文字列は UTF-8 でエンコードされます。
   * @param length `data` の先頭から追加するバイト数です。省略した場合は `data` 全体を追加します。
   * @returns このコンテキストです。
   */
  public append(data: Uint8ArraySource, length?: number | undefined): this {
    this.#assertActive();

    if (length === 0) {
      return this;
    }

    const bytes = toUint8Array(data);
    const len = length === undefined
      ? bytes.length
      : v.parse(v.pipe(ByteLengthSchema(), v.maxValue(bytes.length)), length);
    if (len === 0) {
      return this;
    }

    this.#bitLength = BigInt.asUintN(64, this.#bitLength + (BigInt(len) << 3n));

    let offset = 0;
    if (this.#blockLength > 0) {
      offset = Math.min(BLOCK_SIZE - this.#blockLength, len);
      this.#block.set(bytes.subarray(0, offset), this.#blockLength);
      this.#blockLength += offset;
      if (this.#blockLength < BLOCK_SIZE) {
        return this;
      }

      compress(this.#state, this.#block, 0, this.#schedule);
      this.#blockLength = 0;
    }

    // 揃っているブロックは、バッファーにコピーせずに直接処理します。
    for (; offset + BLOCK_SIZE <= len; offset += BLOCK_SIZE) {
      compress(this.#state, bytes, offset, this.#schedule);
    }

    if (offset < len) {
      this.#block.set(bytes.subarray(offset, len));
      this.#blockLength = len - offset;
    }

    return this;
  }

  /**
   * パディングとビット長を追加して最後のブロックを処理し、ダイジェストを返します。
   * 計算を終えたコンテキストは、`init()` を呼び出すまで再利用できません。
   *
   * @param hash ダイジェストの書き込み先 (ちょうど 32 バイト) です。省略した場合は新しい配列を作成します。
   * @returns 32 バイトのダイジェストです。`hash` を指定した場合はそれ自身です。
   */
  public finish(hash?: Uint8Array | undefined): Digest {
    this.#assertActive();

    const out = hash === undefined
      ? v.expect(Bytes32Schema(), new Uint8Array(DIGEST_SIZE))
      : v.parse(Bytes32Schema(), hash);
    const block = this.#block;
    let n = this.#blockLength;
    block[n++] = 0x80;
    if (n > LENGTH_OFFSET) {
      // ビット長が収まらないので、ゼロで埋めたブロックを先に処理します。
      block.fill(0, n);
      compress(this.#state, block, 0, this.#schedule);
      n = 0;
    }

    block.fill(0, n, LENGTH_OFFSET);
    this.#view.setBigUint64(LENGTH_OFFSET, this.#bitLength, false);
    compress(this.#state, block, 0, this.#schedule);
    this.#blockLength = 0;
    this.#finished = true;

    const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
    for (let i = 0; i < 8; i++) {
      view.setUint32(i * 4, this.#state[i], false);
    }

    this.#logger?.log({
      level: LogLevel.DEBUG,
      message: `Finished a SHA-256 digest of ${this.#bitLength / 8n} bytes`,
    });

    return out;
  }

  /**
   * 計算を途中から再開するための内部状態を返します。
   * 状態ワード (32 バイト)、ビット長 (8 バイト)、未処理のバイト列の順に並んだバイト値の配列です。
   *
   * @returns ハッシュ関数の内部状態です。
   */
  public save(): HashState {
    this.#assertActive();

    const bytes = new Uint8Array(HASH_STATE_HEADER_SIZE + this.#blockLength);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < 8; i++) {
      view.setUint32(i * 4, this.#state[i], false);
    }

    view.setBigUint64(DIGEST_SIZE, this.#bitLength, false);
    bytes.set(this.#block.subarray(0, this.#blockLength), HASH_STATE_HEADER_SIZE);

    return v.expect(HashStateSchema(), Array.from(bytes));
  }

  /**
   * 同じ状態を持つ独立したコンテキストを作成します。共通の接頭辞を持つ複数のデータのハッシュ値を計算する際に使用します。
   *
   * @returns 複製されたコンテキストです。
   */
  public clone(): Sha256Context {
    this.#assertActive();

    const copy = new Sha256Context({ logger: this.#logger });
    copy.#state.set(this.#state);
    copy.#block.set(this.#block);
    copy.#blockLength = this.#blockLength;
    copy.#bitLength = this.#bitLength;

    return copy;
  }

  #assertActive(): void {
    if (this.#finished) {
      throw new ContextFinishedError();
    }
  }
}
