import * as valibot from "valibot";
import { describe, test } from "vitest";
import {
  BLOCK_SIZE,
  ByteLengthSchema,
  Bytes32Schema,
  ConstantsTableSchema,
  DIGEST_SIZE,
  HASH_STATE_HEADER_SIZE,
  HashStateSchema,
  readUint64BE,
  Uint32Schema,
  Uint8Schema,
} from "../../src/shared/schemas.js";

function stateOf(byteLength: number, buffered: number): number[] {
  const bits = BigInt(byteLength) * 8n;
  const header = new Array<number>(HASH_STATE_HEADER_SIZE).fill(0);
  for (let i = 0; i < 8; i++) {
    header[DIGEST_SIZE + 7 - i] = Number((bits >> BigInt(i * 8)) & 0xffn);
  }
  return [...header, ...new Array<number>(buffered).fill(0x61)];
}

test("ブロックサイズは 64 バイト、ダイジェストは 32 バイト", ({ expect }) => {
  expect(BLOCK_SIZE).toBe(64);
  expect(DIGEST_SIZE).toBe(32);
  expect(HASH_STATE_HEADER_SIZE).toBe(40);
});

describe("Uint8Schema / Uint32Schema", () => {
  test("範囲内の整数だけを受け入れる", ({ expect }) => {
    expect.soft(valibot.is(Uint8Schema(), 0)).toBe(true);
    expect.soft(valibot.is(Uint8Schema(), 255)).toBe(true);
    expect.soft(valibot.is(Uint8Schema(), 256)).toBe(false);
    expect.soft(valibot.is(Uint8Schema(), 1.5)).toBe(false);
    expect.soft(valibot.is(Uint32Schema(), 0xffff_ffff)).toBe(true);
    expect.soft(valibot.is(Uint32Schema(), 0x1_0000_0000)).toBe(false);
    expect.soft(valibot.is(Uint32Schema(), -1)).toBe(false);
  });
});

describe("Bytes32Schema", () => {
  test("ちょうど 32 バイトの Uint8Array だけを受け入れる", ({ expect }) => {
    expect.soft(valibot.is(Bytes32Schema(), new Uint8Array(32))).toBe(true);
    expect.soft(valibot.is(Bytes32Schema(), new Uint8Array(31))).toBe(false);
    expect.soft(valibot.is(Bytes32Schema(), new Array(32).fill(0))).toBe(false);
  });
});

describe("ByteLengthSchema", () => {
  test("0 以上の安全な整数だけを受け入れる", ({ expect }) => {
    expect.soft(valibot.is(ByteLengthSchema(), 0)).toBe(true);
    expect.soft(valibot.is(ByteLengthSchema(), 1024)).toBe(true);
    expect.soft(valibot.is(ByteLengthSchema(), -1)).toBe(false);
    expect.soft(valibot.is(ByteLengthSchema(), 2 ** 53)).toBe(false);
  });
});

describe("readUint64BE", () => {
  test("ビッグエンディアンの 64 ビット符号なし整数を読み取る", ({ expect }) => {
    expect(readUint64BE([9, 0, 0, 0, 0, 0, 0, 1, 0], 1)).toBe(0x0100n);
    expect(readUint64BE([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff], 0)).toBe(2n ** 64n - 1n);
  });
});

describe("HashStateSchema", () => {
  test("ビット長と未処理のバイト数が整合する状態を受け入れる", ({ expect }) => {
    expect.soft(valibot.is(HashStateSchema(), stateOf(0, 0))).toBe(true);
    expect.soft(valibot.is(HashStateSchema(), stateOf(3, 3))).toBe(true);
    expect.soft(valibot.is(HashStateSchema(), stateOf(64, 0))).toBe(true);
    expect.soft(valibot.is(HashStateSchema(), stateOf(127, 63))).toBe(true);
  });

  test("整合しない状態を拒否する", ({ expect }) => {
    expect.soft(valibot.is(HashStateSchema(), stateOf(3, 2))).toBe(false);
    expect.soft(valibot.is(HashStateSchema(), stateOf(64, 64))).toBe(false);
    expect.soft(valibot.is(HashStateSchema(), stateOf(0, 0).slice(1))).toBe(false);
  });

  test("問題点に理由のメッセージを含む", ({ expect }) => {
    const result = valibot.safeParse(HashStateSchema(), stateOf(3, 2));

    expect(result.success).toBe(false);
    expect(result.issues?.map(issue => issue.message)).toStrictEqual([
      "Buffered bytes of the hash state do not match its bit length",
    ]);
  });
});

describe("ConstantsTableSchema", () => {
  test("8 個の初期値と 64 個のラウンド定数を要求する", ({ expect }) => {
    const iv = new Array<number>(8).fill(1);
    const k = new Array<number>(64).fill(2);

    expect.soft(valibot.is(ConstantsTableSchema(), { iv, k })).toBe(true);
    expect.soft(valibot.is(ConstantsTableSchema(), { iv: iv.slice(1), k })).toBe(false);
    expect.soft(valibot.is(ConstantsTableSchema(), { iv, k: [...k, 3] })).toBe(false);
  });
});
