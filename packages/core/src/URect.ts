import type { ValidatedRect } from "./BaseRect";
import { BaseRect, checkCorners } from "./BaseRect";
import type { UVec2 } from "./Vector2";
import { uvec2 } from "./Vector2";
import type { U32, Tuple2 } from "./types";

/**
 * Rectangle with unsigned 32-bit integer coordinates. Width and height throw
 * `ScalarOverflowError` when the corners are inverted.
 */
export class URect extends BaseRect<U32, URect> {
  static readonly ZERO = new URect(uvec2(0, 0), uvec2(0, 0));

  static fromTuples(topLeft: Tuple2, bottomRight: Tuple2) {
    return new URect(uvec2(...topLeft), uvec2(...bottomRight));
  }

  static validated(topLeft: UVec2, bottomRight: UVec2): ValidatedRect<URect> {
    const error = checkCorners(topLeft, bottomRight);
    return error
      ? { ok: false, error }
      : { ok: true, value: new URect(topLeft, bottomRight) };
  }

  protected create(topLeft: UVec2, bottomRight: UVec2) {
    return new URect(topLeft, bottomRight);
  }
}
