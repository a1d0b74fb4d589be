import { ScalarOverflowError, ScalarRangeError } from "./errors";
import type { F32, I32, ScalarDomain, U32 } from "./types";

const F32_MAX = 3.4028234663852886e38;

export const f32: F32 = {
  kind: "f32",
  zero: 0,
  minValue: -F32_MAX,
  maxValue: F32_MAX,
  coerce: (value) => Math.fround(value),
  add: (a, b) => Math.fround(a + b),
  sub: (a, b) => Math.fround(a - b),
  // A NaN operand is ignored.
  min: (a, b) => (Number.isNaN(a) ? b : Number.isNaN(b) ? a : Math.min(a, b)),
  max: (a, b) => (Number.isNaN(a) ? b : Number.isNaN(b) ? a : Math.max(a, b)),
};

function integerDomain<K extends "u32" | "i32">(
  kind: K,
  minValue: number,
  maxValue: number,
): ScalarDomain<K> {
  const inRange = (value: number) =>
    value >= domain.minValue && value <= domain.maxValue;

  // Overflow always throws; there is no wrapping mode.
  const checked = (operation: "add" | "sub", a: number, b: number) => {
    const result = operation === "add" ? a + b : a - b;
    if (!inRange(result)) {
      throw new ScalarOverflowError(kind, operation, [a, b]);
    }
    return result;
  };

  const domain: ScalarDomain<K> = {
    kind,
    zero: 0,
    minValue,
    maxValue,
    coerce(value) {
      if (!Number.isInteger(value) || !inRange(value)) {
        throw new ScalarRangeError(kind, value);
      }
      // Normalize -0.
      return value + 0;
    },
    add: (a, b) => checked("add", a, b),
    sub: (a, b) => checked("sub", a, b),
    min: (a, b) => Math.min(a, b),
    max: (a, b) => Math.max(a, b),
  };
  return domain;
}

export const u32: U32 = integerDomain("u32", 0, 0xffff_ffff);

export const i32: I32 = integerDomain("i32", -0x8000_0000, 0x7fff_ffff);
