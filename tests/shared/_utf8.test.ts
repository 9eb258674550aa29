import { describe, test } from "vitest";
import utf8 from "../../src/shared/_utf8.js";

describe("encode", () => {
  test("文字列を UTF-8 Uint8Array にエンコードできる", ({ expect }) => {
    const expected = new TextEncoder().encode("テスト文字列");
    const actual = utf8.encode("テスト文字列");

    expect(actual).toStrictEqual(expected);
    expect(actual instanceof Uint8Array).toBe(true);
  });

  test("空文字列をエンコードできる", ({ expect }) => {
    expect(utf8.encode("")).toStrictEqual(new Uint8Array(0));
  });

  test("共有バッファーに収まらない長さの文字列もエンコードできる", ({ expect }) => {
    const input = "あ".repeat(4096);
    const actual = utf8.encode(input);

    expect(actual.length).toBe(4096 * 3);
    expect(actual).toStrictEqual(new TextEncoder().encode(input));
  });

  test("返された配列は共有バッファーのコピーである", ({ expect }) => {
    const first = utf8.encode("abc");
    utf8.encode("xyz");

    expect(Array.from(first)).toStrictEqual([0x61, 0x62, 0x63]);
  });
});

describe("encodeInto", () => {
  test("文字列を指定された Uint8Array にエンコードできる", ({ expect }) => {
    const inputString = "Hello!";
    const destBuffer = new Uint8Array(10);
    const result = utf8.encodeInto(inputString, destBuffer);
    const expectedEncoded = new TextEncoder().encode(inputString);

    expect(destBuffer.slice(0, result.written)).toStrictEqual(expectedEncoded);
    expect(result.read).toBe(inputString.length);
    expect(result.written).toBe(expectedEncoded.length);
  });

  test("バッファーが小さい場合、部分的にエンコードし正しい結果を返す", ({ expect }) => {
    const inputString = "長い文字列をエンコードする。";
    const destBuffer = new Uint8Array(5); // 小さすぎるバッファー
    const result = utf8.encodeInto(inputString, destBuffer);

    // 部分的にエンコードされた結果を検証する。
    const partialExpected = new Uint8Array([233, 149, 183, 0, 0]);
    //                                      ~~~~~~~~~~~~~
    //                                            長

    expect(destBuffer).toStrictEqual(partialExpected);
    expect(result.written).toBe(3); // エンコードできる分だけ書き込まれている。
    expect(result.read).toBeLessThan(inputString.length); // 全ては読み込まれていない。
  });
});
