import { K } from "./_constants.js";

/**
 * 64 バイトのブロックを 1 つ処理し、8 ワードの状態を更新します (SHA-256 の圧縮関数)。
 * 加算はすべて `| 0` で 32 ビットに切り詰め、2^32 を法として扱います。
 *
 * @param state 更新する 8 ワードの状態です。
 * @param block ブロックを含むバイト列です。
 * @param offset `block` 内のブロックの開始位置です。`offset + 64` 以下の長さが必要です。
 * @param w 64 ワードのメッセージスケジュールを書き込む作業領域です。
 */
export default function compress(
  state: Uint32Array,
  block: Uint8Array,
  offset: number,
  w: Uint32Array,
): void {
  for (let t = 0; t < 16; t++, offset += 4) {
    w[t] = (block[offset] << 24)
      | (block[offset + 1] << 16)
      | (block[offset + 2] << 8)
      | block[offset + 3];
  }

  for (let t = 16; t < 64; t++) {
    const x = w[t - 15];
    const y = w[t - 2];
    const s0 = ((x >>> 7) | (x << 25)) ^ ((x >>> 18) | (x << 14)) ^ (x >>> 3);
    const s1 = ((y >>> 17) | (y << 15)) ^ ((y >>> 19) | (y << 13)) ^ (y >>> 10);
    w[t] = (w[t - 16] + s0 + w[t - 7] + s1) | 0;
  }

  let a = state[0];
  let b = state[1];
  let c = state[2];
  let d = state[3];
  let e = state[4];
  let f = state[5];
  let g = state[6];
  let h = state[7];

  for (let t = 0; t < 64; t++) {
    const S1 = ((e >>> 6) | (e << 26)) ^ ((e >>> 11) | (e << 21)) ^ ((e >>> 25) | (e << 7));
    const ch = (e & f) ^ (~e & g);
    const t1 = (h + S1 + ch + K[t] + w[t]) | 0;
    const S0 = ((a >>> 2) | (a << 30)) ^ ((a >>> 13) | (a << 19)) ^ ((a >>> 22) | (a << 10));
    const maj = (a & b) ^ (a & c) ^ (b & c);
    const t2 = (S0 + maj) | 0;

    h = g;
    g = f;
    f = e;
    e = (d + t1) | 0;
    d = c;
    c = b;
    b = a;
    a = (t1 + t2) | 0;
  }

  state[0] = (state[0] + a) | 0;
  state[1] = (state[1] + b) | 0;
  state[2] = (state[2] + c) | 0;
  state[3] = (state[3] + d) | 0;
  state[4] = (state[4] + e) | 0;
  state[5] = (state[5] + f) | 0;
  state[6] = (state[6] + g) | 0;
  state[7] = (state[7] + h) | 0;
}
