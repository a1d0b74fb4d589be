import { f32, i32, u32 } from "./scalar";
import type { F32, I32, ScalarDomain, Tuple2, U32 } from "./types";

/**
 * Anything a vector of domain `D` can be built from.
 */
export type VectorLike<D extends ScalarDomain> = Vector2<D> | Tuple2;

export class Vector2<D extends ScalarDomain = ScalarDomain> {
  public readonly x: number;
  public readonly y: number;

  constructor(
    public readonly domain: D,
    x: number,
    y: number,
  ) {
    this.x = domain.coerce(x);
    this.y = domain.coerce(y);
  }

  static zero<D extends ScalarDomain>(domain: D) {
    return new Vector2(domain, domain.zero, domain.zero);
  }

  static from<D extends ScalarDomain>(domain: D, value: VectorLike<D>) {
    if (value instanceof Vector2) return value;
    return new Vector2(domain, value[0], value[1]);
  }

  add(other: Vector2<D>) {
    const d = this.domain;
    return new Vector2(d, d.add(this.x, other.x), d.add(this.y, other.y));
  }

  sub(other: Vector2<D>) {
    const d = this.domain;
    return new Vector2(d, d.sub(this.x, other.x), d.sub(this.y, other.y));
  }

  min(other: Vector2<D>) {
    const d = this.domain;
    return new Vector2(d, d.min(this.x, other.x), d.min(this.y, other.y));
  }

  max(other: Vector2<D>) {
    const d = this.domain;
    return new Vector2(d, d.max(this.x, other.x), d.max(this.y, other.y));
  }

  equal(other: Vector2<D>) {
    return this.x === other.x && this.y === other.y;
  }

  toArray(): [number, number] {
    return [this.x, this.y];
  }

  toString() {
    return `(${this.x}, ${this.y})`;
  }
}

export type Vec2 = Vector2<F32>;
export type UVec2 = Vector2<U32>;
export type IVec2 = Vector2<I32>;

export function vec2(x: number, y: number): Vec2 {
  return new Vector2(f32, x, y);
}

export function uvec2(x: number, y: number): UVec2 {
  return new Vector2(u32, x, y);
}

export function ivec2(x: number, y: number): IVec2 {
  return new Vector2(i32, x, y);
}
