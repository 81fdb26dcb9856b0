import { Affine, type Point, type Shape } from "@vecscene/geometry";
import type { Brush, ColorStop, Extend, Gradient, GradientKind } from "../brushes.js";
import { RGBA } from "../color.js";
import { CodecError } from "../errors.js";
import type { Cap, Join, Style } from "../styles.js";

export type Vec6 = [number, number, number, number, number, number];
export type ColorJSON = [number, number, number, number];
export type PointJSON = { x: number; y: number };

export type ShapeJSON =
  | { kind: "circle"; center: PointJSON; radius: number }
  | { kind: "rectangle"; a: PointJSON; b: PointJSON }
  | { kind: "roundedRectangle"; a: PointJSON; b: PointJSON; radius: number };

export type GradientKindJSON =
  | { kind: "linear"; start: PointJSON; end: PointJSON }
  | { kind: "radial"; startCenter: PointJSON; startRadius: number; endCenter: PointJSON; endRadius: number }
  | { kind: "sweep"; center: PointJSON; startAngle: number; endAngle: number };

export type GradientJSON = {
  extend: Extend;
  kind: GradientKindJSON;
  stops: { offset: number; color: ColorJSON }[];
};

export type StyleJSON =
  | { kind: "fill"; fillRule: "nonZero" | "evenOdd" }
  | {
      kind: "stroke";
      width: number;
      join: Join;
      miterLimit: number;
      startCap: Cap;
      endCap: Cap;
      dashPattern: [number, number, number, number][];
      dashOffset: number;
    };

export type BrushJSON = { kind: "solid"; color: ColorJSON } | { kind: "gradient"; gradient: GradientJSON };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function record(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new CodecError(path, "expected an object");
  return value;
}

function num(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) throw new CodecError(path, "expected a finite number");
  return value;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new CodecError(path, `expected one of ${allowed.join(", ")}`);
  return match;
}

function numbers(value: unknown, length: number, path: string): number[] {
  if (!Array.isArray(value) || value.length !== length) {
    throw new CodecError(path, `expected an array of ${length} numbers`);
  }
  return value.map((entry: unknown, i) => num(entry, `${path}[${i}]`));
}

const EXTENDS = ["pad", "repeat", "reflect"] as const;
const JOINS = ["bevel", "miter", "round"] as const;
const CAPS = ["butt", "square", "round"] as const;

export function encodeAffine(m: Affine): Vec6 {
  return Affine.coefficients(m);
}

export function decodeAffine(value: unknown, path = "affine"): Affine {
  const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = numbers(value, 6, path);
  return Affine.fromCoefficients([a, b, c, d, e, f]);
}

export function encodeColor(color: RGBA): ColorJSON {
  return [color.r, color.g, color.b, color.a];
}

export function decodeColor(value: unknown, path = "color"): RGBA {
  const [r = 0, g = 0, b = 0, a = 1] = numbers(value, 4, path);
  return RGBA.create(r, g, b, a);
}

function decodePoint(value: unknown, path: string): Point {
  const source = record(value, path);
  return { x: num(source.x, `${path}.x`), y: num(source.y, `${path}.y`) };
}

export function encodeShape(shape: Shape): ShapeJSON {
  switch (shape.kind) {
    case "circle":
      return { kind: "circle", center: { ...shape.center }, radius: shape.radius };
    case "rectangle":
      return { kind: "rectangle", a: { ...shape.a }, b: { ...shape.b } };
    case "roundedRectangle":
      return { kind: "roundedRectangle", a: { ...shape.a }, b: { ...shape.b }, radius: shape.radius };
  }
}

export function decodeShape(value: unknown, path = "shape"): Shape {
  const source = record(value, path);
  const kind = oneOf(source.kind, ["circle", "rectangle", "roundedRectangle"] as const, `${path}.kind`);
  switch (kind) {
    case "circle":
      return {
        kind,
        center: decodePoint(source.center, `${path}.center`),
        radius: num(source.radius, `${path}.radius`)
      };
    case "rectangle":
      return { kind, a: decodePoint(source.a, `${path}.a`), b: decodePoint(source.b, `${path}.b`) };
    case "roundedRectangle":
      return {
        kind,
        a: decodePoint(source.a, `${path}.a`),
        b: decodePoint(source.b, `${path}.b`),
        radius: num(source.radius, `${path}.radius`)
      };
  }
}

function encodeGradientKind(kind: GradientKind): GradientKindJSON {
  switch (kind.kind) {
    case "linear":
      return { kind: "linear", start: { ...kind.start }, end: { ...kind.end } };
    case "radial":
      return {
        kind: "radial",
        startCenter: { ...kind.startCenter },
        startRadius: kind.startRadius,
        endCenter: { ...kind.endCenter },
        endRadius: kind.endRadius
      };
    case "sweep":
      return { kind: "sweep", center: { ...kind.center }, startAngle: kind.startAngle, endAngle: kind.endAngle };
  }
}

function decodeGradientKind(value: unknown, path: string): GradientKind {
  const source = record(value, path);
  const kind = oneOf(source.kind, ["linear", "radial", "sweep"] as const, `${path}.kind`);
  switch (kind) {
    case "linear":
      return { kind, start: decodePoint(source.start, `${path}.start`), end: decodePoint(source.end, `${path}.end`) };
    case "radial":
      return {
        kind,
        startCenter: decodePoint(source.startCenter, `${path}.startCenter`),
        startRadius: num(source.startRadius, `${path}.startRadius`),
        endCenter: decodePoint(source.endCenter, `${path}.endCenter`),
        endRadius: num(source.endRadius, `${path}.endRadius`)
      };
    case "sweep":
      return {
        kind,
        center: decodePoint(source.center, `${path}.center`),
        startAngle: num(source.startAngle, `${path}.startAngle`),
        endAngle: num(source.endAngle, `${path}.endAngle`)
      };
  }
}

/** Stops keep their order and offsets exactly; nothing is sorted. */
export function encodeGradient(gradient: Gradient): GradientJSON {
  return {
    extend: gradient.extend,
    kind: encodeGradientKind(gradient.kind),
    stops: gradient.stops.map((stop) => ({ offset: stop.offset, color: encodeColor(stop.color) }))
  };
}

export function decodeGradient(value: unknown, path = "gradient"): Gradient {
  const source = record(value, path);
  const rawStops = source.stops;
  if (!Array.isArray(rawStops)) throw new CodecError(`${path}.stops`, "expected an array");
  const stops: ColorStop[] = rawStops.map((entry: unknown, i) => {
    const stop = record(entry, `${path}.stops[${i}]`);
    return {
      offset: num(stop.offset, `${path}.stops[${i}].offset`),
      color: decodeColor(stop.color, `${path}.stops[${i}].color`)
    };
  });
  return {
    extend: oneOf(source.extend, EXTENDS, `${path}.extend`),
    kind: decodeGradientKind(source.kind, `${path}.kind`),
    stops
  };
}

export function encodeStyle(style: Style): StyleJSON {
  if (style.kind === "fill") return { kind: "fill", fillRule: style.fillRule };
  const s = style.stroke;
  return {
    kind: "stroke",
    width: s.width,
    join: s.join,
    miterLimit: s.miterLimit,
    startCap: s.startCap,
    endCap: s.endCap,
    dashPattern: s.dashPattern.map((group): [number, number, number, number] => [group[0], group[1], group[2], group[3]]),
    dashOffset: s.dashOffset
  };
}

export function decodeStyle(value: unknown, path = "style"): Style {
  const source = record(value, path);
  const kind = oneOf(source.kind, ["fill", "stroke"] as const, `${path}.kind`);
  if (kind === "fill") {
    return { kind, fillRule: oneOf(source.fillRule, ["nonZero", "evenOdd"] as const, `${path}.fillRule`) };
  }
  const rawDashes = source.dashPattern;
  if (!Array.isArray(rawDashes)) throw new CodecError(`${path}.dashPattern`, "expected an array");
  return {
    kind,
    stroke: {
      width: num(source.width, `${path}.width`),
      join: oneOf(source.join, JOINS, `${path}.join`),
      miterLimit: num(source.miterLimit, `${path}.miterLimit`),
      startCap: oneOf(source.startCap, CAPS, `${path}.startCap`),
      endCap: oneOf(source.endCap, CAPS, `${path}.endCap`),
      dashPattern: rawDashes.map((entry: unknown, i) => {
        const [a = 0, b = 0, c = 0, d = 0] = numbers(entry, 4, `${path}.dashPattern[${i}]`);
        return [a, b, c, d] as const;
      }),
      dashOffset: num(source.dashOffset, `${path}.dashOffset`)
    }
  };
}

/** Texture brushes reference pixel data and are not serializable. */
export function encodeBrush(brush: Brush): BrushJSON {
  switch (brush.kind) {
    case "solid":
      return { kind: "solid", color: encodeColor(brush.color) };
    case "gradient":
      return { kind: "gradient", gradient: encodeGradient(brush.gradient) };
    case "texture":
      throw new CodecError("brush", "texture brushes cannot be serialized");
  }
}

export function decodeBrush(value: unknown, path = "brush"): Brush {
  const source = record(value, path);
  const kind = oneOf(source.kind, ["solid", "gradient"] as const, `${path}.kind`);
  if (kind === "solid") return { kind, color: decodeColor(source.color, `${path}.color`) };
  return { kind, gradient: decodeGradient(source.gradient, `${path}.gradient`) };
}
