import { type ConstantsTable, ConstantsTableSchema } from "../shared/schemas.js";
import * as v from "../shared/valibot.js";
import table from "./_sha256-constants.json" with { type: "json" };

// FIPS 180-4 4.2.2 と 5.3.3 の値です。1 ビットでも異なると、誤ったダイジェストがエラーなしに計算されます。
const { iv, k }: ConstantsTable = v.expect(ConstantsTableSchema(), table);

/**
 * 初期ハッシュ値です。最初の 8 個の素数の平方根の小数部の先頭 32 ビットです。
 */
export const IV: Readonly<Uint32Array> = Uint32Array.from(iv);

/**
 * ラウンド定数です。最初の 64 個の素数の立方根の小数部の先頭 32 ビットです。
 */
export const K: Readonly<Uint32Array> = Uint32Array.from(k);
