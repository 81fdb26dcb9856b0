import type { Point } from "./shapes.js";
import { nearlyEqual } from "./scalar.js";

/**
 * 2x3 affine matrix. A point maps as
 * `(a * x + c * y + e, b * x + d * y + f)`.
 */
export interface Affine {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly e: number;
  readonly f: number;
}

function make(a: number, b: number, c: number, d: number, e: number, f: number): Affine {
  return Object.freeze({ a, b, c, d, e, f });
}

const IDENTITY = make(1, 0, 0, 1, 0, 0);

export const Affine = {
  identity: (): Affine => IDENTITY,

  translate: (dx: number, dy: number): Affine => make(1, 0, 0, 1, dx, dy),

  scale: (s: number): Affine => make(s, 0, 0, s, 0, 0),

  scaleXY: (sx: number, sy: number): Affine => make(sx, 0, 0, sy, 0, 0),

  rotate: (radians: number): Affine => {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return make(cos, sin, -sin, cos, 0, 0);
  },

  fromCoefficients: (coefficients: readonly [number, number, number, number, number, number]): Affine =>
    make(...coefficients),

  coefficients: (m: Affine): [number, number, number, number, number, number] => [m.a, m.b, m.c, m.d, m.e, m.f],

  /**
   * Matrix product `outer * inner`: `inner` is applied first, then `outer`.
   * Used as `compose(parent, child)` so points travel child -> parent -> global.
   */
  compose: (outer: Affine, inner: Affine): Affine =>
    make(
      outer.a * inner.a + outer.c * inner.b,
      outer.b * inner.a + outer.d * inner.b,
      outer.a * inner.c + outer.c * inner.d,
      outer.b * inner.c + outer.d * inner.d,
      outer.a * inner.e + outer.c * inner.f + outer.e,
      outer.b * inner.e + outer.d * inner.f + outer.f
    ),

  apply: (m: Affine, p: Point): Point => ({
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f
  }),

  determinant: (m: Affine): number => m.a * m.d - m.b * m.c,

  invert: (m: Affine): Affine => {
    const det = m.a * m.d - m.b * m.c;
    if (nearlyEqual(det, 0)) {
      throw new Error("Transform is not invertible");
    }

    const invDet = 1 / det;
    const a = m.d * invDet;
    const b = -m.b * invDet;
    const c = -m.c * invDet;
    const d = m.a * invDet;
    const e = -(a * m.e + c * m.f);
    const f = -(b * m.e + d * m.f);
    return make(a, b, c, d, e, f);
  },

  isIdentity: (m: Affine): boolean =>
    m.a === 1 && m.b === 0 && m.c === 0 && m.d === 1 && m.e === 0 && m.f === 0,

  equals: (x: Affine, y: Affine, epsilon = 0): boolean =>
    Math.abs(x.a - y.a) <= epsilon &&
    Math.abs(x.b - y.b) <= epsilon &&
    Math.abs(x.c - y.c) <= epsilon &&
    Math.abs(x.d - y.d) <= epsilon &&
    Math.abs(x.e - y.e) <= epsilon &&
    Math.abs(x.f - y.f) <= epsilon
};
