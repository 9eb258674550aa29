import singleton from "./_singleton.js";
import * as v from "./valibot.js";

/**
 * SHA-256 のブロックサイズ (バイト数) です。
 */
export const BLOCK_SIZE = 64;

/**
 * SHA-256 のダイジェストのサイズ (バイト数) です。
 */
export const DIGEST_SIZE = 32;

/**
 * 保存された内部状態のうち、未処理のバイト列より前にある固定長部分のサイズ (バイト数) です。
 * 8 ワードの状態 (32 バイト) と、ビット長 (8 バイト) から成ります。
 */
export const HASH_STATE_HEADER_SIZE = DIGEST_SIZE + 8;

/**
 * 8 ビット符号なし整数の Valibot スキーマです。
 */
export function Uint8Schema() {
  return singleton("schemas__uint8", () => (
    v.pipe(
      v.number(),
      v.integer(),
      v.minValue(0),
      v.maxValue(0xff),
    )
  ));
}

/**
 * 8 ビット符号なし整数です。
 */
export type Uint8 = v.InferOutput<ReturnType<typeof Uint8Schema>>;

/**
 * 32 ビット符号なし整数の Valibot スキーマです。
 */
export function Uint32Schema() {
  return singleton("schemas__uint32", () => (
    v.pipe(
      v.number(),
      v.integer(),
      v.minValue(0),
      v.maxValue(0xffff_ffff),
    )
  ));
}

/**
 * 32 ビット符号なし整数です。
 */
export type Uint32 = v.InferOutput<ReturnType<typeof Uint32Schema>>;

/**
 * ちょうど 32 バイトの `Uint8Array` の Valibot スキーマです。
 * 32 バイトの鍵やダイジェストを受け取る関数の引数と、ダイジェストの出力先の検証に使用します。
 */
export function Bytes32Schema() {
  return singleton("schemas__bytes32", () => (
    v.pipe(
      v.instance(Uint8Array),
      v.length(DIGEST_SIZE),
      v.brand("Bytes32"),
    )
  ));
}

/**
 * ちょうど 32 バイトの `Uint8Array` です。
 */
export type Bytes32Like = v.InferInput<ReturnType<typeof Bytes32Schema>>;

/**
 * ちょうど 32 バイトの `Uint8Array` です。
 */
export type Bytes32 = v.InferOutput<ReturnType<typeof Bytes32Schema>>;

/**
 * 追加するバイト数の Valibot スキーマです。上限はデータの長さに応じて呼び出し元で検証します。
 */
export function ByteLengthSchema() {
  return singleton("schemas__byte_length", () => (
    v.pipe(
      v.number(),
      v.safeInteger(),
      v.minValue(0),
    )
  ));
}

/**
 * 追加するバイト数です。
 */
export type ByteLength = v.InferOutput<ReturnType<typeof ByteLengthSchema>>;

/**
 * バイト配列の `offset` から 8 バイトを、ビッグエンディアンの 64 ビット符号なし整数として読み取ります。
 *
 * @param bytes 読み取るバイト配列です。
 * @param offset 読み取りを開始する位置です。
 * @returns 読み取った値です。
 */
export function readUint64BE(bytes: ArrayLike<number>, offset: number): bigint {
  let value = 0n;
  for (let i = 0; i < 8; i++) {
    value = (value << 8n) | BigInt(bytes[offset + i]);
  }

  return value;
}

/**
 * ハッシュ関数の内部状態の Valibot スキーマです。
 * 状態ワード (32 バイト)、ビット長 (8 バイト)、未処理のバイト列 (0~63 バイト) の順に並んだバイト値の配列を検証し、
 * ビット長と未処理のバイト数が整合していることを確認します。
 */
export function HashStateSchema() {
  return singleton("schemas__hash_state", () => (
    v.pipe(
      v.array(Uint8Schema()),
      v.minLength(HASH_STATE_HEADER_SIZE),
      v.maxLength(HASH_STATE_HEADER_SIZE + BLOCK_SIZE - 1),
      v.check(
        (state: number[]) => readUint64BE(state, DIGEST_SIZE) % 8n === 0n,
        "Bit length of the hash state must be a multiple of 8",
      ),
      v.check(
        (state: number[]) => {
          const byteLength = readUint64BE(state, DIGEST_SIZE) / 8n;
          return byteLength % BigInt(BLOCK_SIZE) === BigInt(state.length - HASH_STATE_HEADER_SIZE);
        },
        "Buffered bytes of the hash state do not match its bit length",
      ),
      v.readonly(),
      v.brand("HashState"),
    )
  ));
}

/**
 * ハッシュ関数の内部状態です。
 */
export type HashStateLike = v.InferInput<ReturnType<typeof HashStateSchema>>;

/**
 * ハッシュ関数の内部状態です。
 */
export type HashState = v.InferOutput<ReturnType<typeof HashStateSchema>>;

/**
 * SHA-256 の定数表の Valibot スキーマです。
 * 8 個の初期ハッシュ値と、64 個のラウンド定数を検証します。
 */
export function ConstantsTableSchema() {
  return singleton("schemas__constants_table", () => (
    v.object({
      iv: v.pipe(
        v.array(Uint32Schema()),
        v.length(8),
      ),
      k: v.pipe(
        v.array(Uint32Schema()),
        v.length(64),
      ),
    })
  ));
}

/**
 * SHA-256 の定数表です。
 */
export type ConstantsTable = v.InferOutput<ReturnType<typeof ConstantsTableSchema>>;
