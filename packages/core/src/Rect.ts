import type { ValidatedRect } from "./BaseRect";
import { BaseRect, checkCorners } from "./BaseRect";
import type { Vec2 } from "./Vector2";
import { vec2 } from "./Vector2";
import type { F32, Tuple2 } from "./types";

/**
 * Rectangle with 32-bit float coordinates.
 */
export class Rect extends BaseRect<F32, Rect> {
  static readonly ZERO = new Rect(vec2(0, 0), vec2(0, 0));

  static fromTuples(topLeft: Tuple2, bottomRight: Tuple2) {
    return new Rect(vec2(...topLeft), vec2(...bottomRight));
  }

  static validated(topLeft: Vec2, bottomRight: Vec2): ValidatedRect<Rect> {
    const error = checkCorners(topLeft, bottomRight);
    return error
      ? { ok: false, error }
      : { ok: true, value: new Rect(topLeft, bottomRight) };
  }

  protected create(topLeft: Vec2, bottomRight: Vec2) {
    return new Rect(topLeft, bottomRight);
  }
}
