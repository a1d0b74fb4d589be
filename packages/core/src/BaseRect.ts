import { InvertedRectError } from "./errors";
import type { VectorLike } from "./Vector2";
import { Vector2 } from "./Vector2";
import type { ScalarDomain } from "./types";

export type ValidatedRect<R> =
  | { ok: true; value: R }
  | { ok: false; error: InvertedRectError };

/**
 * Checks the corner ordering that the plain constructors take on trust.
 * Equal coordinates are fine.
 */
export function checkCorners<D extends ScalarDomain>(
  topLeft: Vector2<D>,
  bottomRight: Vector2<D>,
): InvertedRectError | undefined {
  if (topLeft.x > bottomRight.x) {
    return new InvertedRectError("x", topLeft.x, bottomRight.x);
  }
  if (topLeft.y > bottomRight.y) {
    return new InvertedRectError("y", topLeft.y, bottomRight.y);
  }
  return undefined;
}

/**
 * An axis-aligned rectangle stored as its top left and bottom right
 * vertices, with y growing downward.
 *
 * The corners are not validated: a top left vertex below or to the right of
 * the bottom right one is a caller error. Such a rectangle reports a
 * negative size in the signed domains and throws `ScalarOverflowError` from
 * `width`/`height` in the unsigned one.
 */
export abstract class BaseRect<
  D extends ScalarDomain,
  R extends BaseRect<D, R>,
> {
  constructor(
    public readonly topLeft: Vector2<D>,
    public readonly bottomRight: Vector2<D>,
  ) {}

  protected abstract create(topLeft: Vector2<D>, bottomRight: Vector2<D>): R;

  get domain(): D {
    return this.topLeft.domain;
  }

  get width() {
    return this.domain.sub(this.bottomRight.x, this.topLeft.x);
  }

  get height() {
    return this.domain.sub(this.bottomRight.y, this.topLeft.y);
  }

  get size() {
    return new Vector2(this.domain, this.width, this.height);
  }

  get topRight() {
    return new Vector2(this.domain, this.bottomRight.x, this.topLeft.y);
  }

  get bottomLeft() {
    return new Vector2(this.domain, this.topLeft.x, this.bottomRight.y);
  }

  /**
   * Clockwise, starting at the top left vertex.
   */
  get corners(): [Vector2<D>, Vector2<D>, Vector2<D>, Vector2<D>] {
    return [this.topLeft, this.topRight, this.bottomRight, this.bottomLeft];
  }

  /**
   * `true` when the rectangle is collapsed on either axis. An inverted
   * rectangle is neither zero-area nor positive-area.
   */
  isZeroArea() {
    return (
      this.topLeft.x === this.bottomRight.x ||
      this.topLeft.y === this.bottomRight.y
    );
  }

  isPositiveArea() {
    return (
      this.topLeft.x < this.bottomRight.x && this.topLeft.y < this.bottomRight.y
    );
  }

  /**
   * Inclusive of the top and left edges, exclusive of the bottom and right
   * ones, so adjacent rectangles never share a point.
   */
  contains(point: Vector2<D>) {
    return (
      point.x >= this.topLeft.x &&
      point.y >= this.topLeft.y &&
      point.x < this.bottomRight.x &&
      point.y < this.bottomRight.y
    );
  }

  /**
   * The area common to both rectangles, or `undefined` when there is none.
   * Rectangles that only touch along an edge do not intersect.
   */
  intersect(other: R): R | undefined {
    const result = this.create(
      this.topLeft.max(other.topLeft),
      this.bottomRight.min(other.bottomRight),
    );
    return result.isPositiveArea() ? result : undefined;
  }

  withOffset(offset: VectorLike<D>) {
    const delta = Vector2.from(this.domain, offset);
    return this.create(this.topLeft.add(delta), this.bottomRight.add(delta));
  }

  /**
   * Same as `withOffset` with the offset negated, which the unsigned domain
   * cannot express.
   */
  withNegativeOffset(offset: VectorLike<D>) {
    const delta = Vector2.from(this.domain, offset);
    return this.create(this.topLeft.sub(delta), this.bottomRight.sub(delta));
  }

  clone() {
    return this.create(this.topLeft, this.bottomRight);
  }

  equal(other: R) {
    return (
      this.topLeft.equal(other.topLeft) &&
      this.bottomRight.equal(other.bottomRight)
    );
  }

  toString() {
    return `${this.constructor.name}(${this.topLeft}, ${this.bottomRight})`;
  }
}
