import { describe, expect, it } from "vitest";
import {
  ScalarOverflowError,
  ScalarRangeError,
  Vector2,
  i32,
  ivec2,
  u32,
  uvec2,
  vec2,
} from "../src/index";

describe("Vector2", () => {
  it("adds and subtracts per component", () => {
    expect(vec2(1, 2).add(vec2(3, 4)).toArray()).toEqual([4, 6]);
    expect(ivec2(1, 2).sub(ivec2(3, 4)).toArray()).toEqual([-2, -2]);
  });

  it("takes the component-wise min and max", () => {
    const a = ivec2(1, 5);
    const b = ivec2(3, 2);
    expect(a.min(b).toArray()).toEqual([1, 2]);
    expect(a.max(b).toArray()).toEqual([3, 5]);
  });

  it("compares by value", () => {
    expect(uvec2(2, 3).equal(uvec2(2, 3))).toBe(true);
    expect(uvec2(2, 3).equal(uvec2(3, 2))).toBe(false);
    expect(Vector2.zero(u32).equal(uvec2(0, 0))).toBe(true);
  });

  it("builds from tuples and passes vectors through", () => {
    const v = ivec2(7, 8);
    expect(Vector2.from(i32, v)).toBe(v);
    expect(Vector2.from(i32, [1, -2]).toArray()).toEqual([1, -2]);
  });

  it("validates coordinates against the domain", () => {
    expect(() => uvec2(-1, 0)).toThrow(ScalarRangeError);
    expect(() => ivec2(0, 0.25)).toThrow(ScalarRangeError);
    expect(vec2(0.25, -3).toArray()).toEqual([0.25, -3]);
  });

  it("surfaces unsigned underflow", () => {
    expect(() => uvec2(1, 1).sub(uvec2(2, 0))).toThrow(ScalarOverflowError);
  });

  it("formats as a coordinate pair", () => {
    expect(ivec2(3, -4).toString()).toBe("(3, -4)");
  });
});
