export type ScalarKind = "f32" | "u32" | "i32";

/**
 * The operations a rectangle needs from its coordinate type.
 */
export interface ScalarDomain<K extends ScalarKind = ScalarKind> {
  readonly kind: K;
  readonly zero: number;
  /**
   * Smallest and largest representable values.
   */
  readonly minValue: number;
  readonly maxValue: number;
  /**
   * Turns an arbitrary number into a value of this domain, or throws
   * `ScalarRangeError` when it has no representation.
   */
  coerce(value: number): number;
  add(a: number, b: number): number;
  sub(a: number, b: number): number;
  min(a: number, b: number): number;
  max(a: number, b: number): number;
}

export type F32 = ScalarDomain<"f32">;
export type U32 = ScalarDomain<"u32">;
export type I32 = ScalarDomain<"i32">;

export type Tuple2 = readonly [x: number, y: number];

export type Axis = "x" | "y";
