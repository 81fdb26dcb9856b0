export { Affine } from "./affine.js";
export type {
  Bounds,
  Circle,
  Point,
  Rectangle,
  RoundedRectangle,
  Shape,
  ShapeKind
} from "./shapes.js";
export {
  centeredRectangle,
  circle,
  point,
  rectangle,
  roundedRectangle,
  shapeBounds,
  shapeContains
} from "./shapes.js";
export { clamp, nearlyEqual } from "./scalar.js";
