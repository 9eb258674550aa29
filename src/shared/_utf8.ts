import singleton from "./_singleton.js";

const B = 1;
const KiB = 1024 * B;
const BUFFER_SIZE = 9 * KiB;
const SAFE_STRING_LENGTH = 3 * KiB; // `BUFFER_SIZE` の 3 分の 1 に設定します。

/**
 * UTF-8 のエンコード時に再利用される共有バッファーを取得します。
 *
 * @returns 共有の `Uint8Array` バッファーです。
 */
function buffer(): Uint8Array {
  return singleton("utf8__buffer", () => new Uint8Array(BUFFER_SIZE));
}

/**
 * UTF-8 のエンコード時に再利用される共有 `TextEncoder` のインスタンスを取得します。
 *
 * @returns 共有の `TextEncoder` インスタンスです。
 */
function encoder(): TextEncoder {
  return singleton("utf8__encoder", () => new TextEncoder());
}

/**
 * エンコード結果です。
 */
export type EncodeIntoResult = {
  /**
   * 入力で読み取られた Unicode コードの単位です。
   */
  read: number;

  /**
   * 出力に書き込まれた UTF-8 バイト数です。
   */
  written: number;
};

/**
 * UTF-8 のエンコードを行うためのユーティリティーオブジェクトです。
 * 頻繁なインスタンスの生成を避けるために、共有の `TextEncoder` を使用します。
 */
const utf8 = {
  /**
   * 引数として渡された文字列をエンコードして `Uint8Array` を返します。
   * 文字列が短い場合は事前に確保された共有バッファーを再利用することで、パフォーマンスを向上させます。
   *
   * @param input エンコードするテキストが入った文字列です。
   * @returns エンコードされた `Uint8Array` です。
   */
  encode(input: string): Uint8Array {
    if (input.length > SAFE_STRING_LENGTH) {
      // バッファーに収まらない可能性があるので、それを使わずにエンコードします。
      return encoder().encode(input);
    }

    // エンコード後の配列の長さが `.length` の 3 倍を超えることはないので、`BUFFER_SIZE` のバッファーに収まります。
    // 参考: https://developer.mozilla.org/docs/Web/API/TextEncoder/encodeInto
    const dst = buffer();
    const res = this.encodeInto(input, dst);

    return dst.slice(0, res.written); // コピーします。
  },

  /**
   * エンコードする文字列と、UTF-8 エンコード後のテキスト格納先となるバッファーを受け取り、
   * エンコードの進行状況を示すオブジェクトを返します。
   *
   * @param source エンコードするテキストが入った文字列です。
   * @param destination バッファーに収まる範囲で UTF-8 エンコードされたテキストが入ります。
   * @returns エンコード結果です。
   */
  encodeInto(source: string, destination: Uint8Array): EncodeIntoResult {
    const {
      read,
      written,
    } = encoder().encodeInto(source, destination);

    return {
      read,
      written,
    };
  },
};

export default utf8;
