import { describe, test } from "vitest";
import { InvalidInputError, UnexpectedValidationError } from "../../src/shared/errors.js";
import * as v from "../../src/shared/valibot.js";

describe("check", () => {
  test("operation が false を返すとメッセージ付きの問題点を追加する", ({ expect }) => {
    const schema = v.pipe(v.number(), v.check((n: number) => n % 2 === 0, "Must be even"));

    expect(v.parse(schema, 4)).toBe(4);
    expect(() => v.parse(schema, 3)).toThrow("Must be even");
  });

  test("operation が例外を投げると理由をメッセージに含める", ({ expect }) => {
    const schema = v.pipe(
      v.number(),
      v.check((_: number) => {
        throw new RangeError("範囲外");
      }, "Check failed"),
    );

    expect(() => v.parse(schema, 1)).toThrow("Check failed: RangeError: 範囲外");
  });

  test("型が合わない入力では operation を呼び出さない", ({ expect }) => {
    let called = false;
    const schema = v.pipe(
      v.number(),
      v.check((_: number) => {
        called = true;
        return true;
      }, "Never"),
    );

    expect(() => v.parse(schema, "1")).toThrow(InvalidInputError);
    expect(called).toBe(false);
  });
});

describe("parse", () => {
  test("検証に失敗すると InvalidInputError を投げる", ({ expect }) => {
    expect(() => v.parse(v.number(), "x")).toThrow(InvalidInputError);
  });

  test("エラーのクラスを指定できる", ({ expect }) => {
    expect(() => v.parse(v.number(), "x", UnexpectedValidationError)).toThrow(
      UnexpectedValidationError,
    );
  });
});

describe("expect", () => {
  test("検証に失敗すると UnexpectedValidationError を投げる", ({ expect }) => {
    expect(() => v.expect(v.number(), "x")).toThrow(UnexpectedValidationError);
  });

  test("検証に成功すると出力値を返す", ({ expect }) => {
    expect(v.expect(v.pipe(v.number(), v.integer()), 3)).toBe(3);
  });
});
