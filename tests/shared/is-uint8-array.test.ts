import { test } from "vitest";
import isUint8Array from "../../src/shared/is-uint8-array.js";

test("Uint8Array には true を返す", ({ expect }) => {
  expect(isUint8Array(new Uint8Array(4))).toBe(true);
  expect(isUint8Array(new Uint8Array(new ArrayBuffer(8), 2, 4))).toBe(true);
});

test("ほかの TypedArray や ArrayBuffer には false を返す", ({ expect }) => {
  expect.soft(isUint8Array(new Uint16Array(4))).toBe(false);
  expect.soft(isUint8Array(new ArrayBuffer(4))).toBe(false);
  expect.soft(isUint8Array([0, 1, 2])).toBe(false);
});

test.skipIf(typeof SharedArrayBuffer === "undefined")(
  "SharedArrayBuffer 上の Uint8Array には false を返す",
  ({ expect }) => {
    expect(isUint8Array(new Uint8Array(new SharedArrayBuffer(8)))).toBe(false);
  },
);
