import type { Axis, ScalarKind } from "./types";

export class ScalarRangeError extends RangeError {
  constructor(
    public readonly kind: ScalarKind,
    public readonly value: number,
  ) {
    super(`${value} is not a valid ${kind} value`);
    this.name = "ScalarRangeError";
  }
}

export class ScalarOverflowError extends RangeError {
  constructor(
    public readonly kind: ScalarKind,
    public readonly operation: "add" | "sub",
    public readonly operands: readonly [number, number],
  ) {
    const [a, b] = operands;
    const op = operation === "add" ? "+" : "-";
    super(`${kind} overflow: ${a} ${op} ${b}`);
    this.name = "ScalarOverflowError";
  }
}

/**
 * Reported by the validating constructors when the top left corner lies
 * beyond the bottom right one.
 */
export class InvertedRectError extends Error {
  constructor(
    public readonly axis: Axis,
    public readonly start: number,
    public readonly end: number,
  ) {
    super(`inverted rectangle on ${axis}: ${start} > ${end}`);
    this.name = "InvertedRectError";
  }
}
