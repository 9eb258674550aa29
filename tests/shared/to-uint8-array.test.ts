import { test } from "vitest";
import { TypeError } from "../../src/shared/errors.js";
import toUint8Array from "../../src/shared/to-uint8-array.js";

test("文字列は UTF-8 でエンコードされる", ({ expect }) => {
  expect(Array.from(toUint8Array("aé"))).toStrictEqual([0x61, 0xC3, 0xA9]);
});

test("Uint8Array はコピーされずにそのまま返される", ({ expect }) => {
  const bytes = new Uint8Array([1, 2, 3]);

  expect(toUint8Array(bytes)).toBe(bytes);
});

test("ArrayBuffer は同じメモリーを参照するビューになる", ({ expect }) => {
  const buffer = new ArrayBuffer(4);
  const bytes = toUint8Array(buffer);
  new Uint8Array(buffer)[2] = 7;

  expect(bytes.length).toBe(4);
  expect(bytes[2]).toBe(7);
});

test("変換できない値では TypeError を投げる", ({ expect }) => {
  // 型検査をすり抜けた呼び出しを再現する。
  const attempt = () => Reflect.apply(toUint8Array, undefined, [[1, 2, 3]]);

  expect(attempt).toThrow(TypeError);
  expect(attempt).toThrow("Expected ArrayBuffer | Uint8Array | string, but got Array");
});
