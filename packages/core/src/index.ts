export type { ValidatedRect } from "./BaseRect";
export { BaseRect, checkCorners } from "./BaseRect";
export { IRect } from "./IRect";
export { Rect } from "./Rect";
export { URect } from "./URect";
export type { IVec2, UVec2, Vec2, VectorLike } from "./Vector2";
export { Vector2, ivec2, uvec2, vec2 } from "./Vector2";
export {
  InvertedRectError,
  ScalarOverflowError,
  ScalarRangeError,
} from "./errors";
export { f32, i32, u32 } from "./scalar";
export type {
  Axis,
  F32,
  I32,
  ScalarDomain,
  ScalarKind,
  Tuple2,
  U32,
} from "./types";
