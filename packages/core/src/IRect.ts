import type { ValidatedRect } from "./BaseRect";
import { BaseRect, checkCorners } from "./BaseRect";
import type { IVec2 } from "./Vector2";
import { ivec2 } from "./Vector2";
import type { I32, Tuple2 } from "./types";

export class IRect extends BaseRect<I32, IRect> {
  static readonly ZERO = new IRect(ivec2(0, 0), ivec2(0, 0));

  static fromTuples(topLeft: Tuple2, bottomRight: Tuple2) {
    return new IRect(ivec2(...topLeft), ivec2(...bottomRight));
  }

  static validated(topLeft: IVec2, bottomRight: IVec2): ValidatedRect<IRect> {
    const error = checkCorners(topLeft, bottomRight);
    return error
      ? { ok: false, error }
      : { ok: true, value: new IRect(topLeft, bottomRight) };
  }

  protected create(topLeft: IVec2, bottomRight: IVec2) {
    return new IRect(topLeft, bottomRight);
  }
}
