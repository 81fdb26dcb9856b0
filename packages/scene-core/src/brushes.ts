import { Affine, type Point } from "@vecscene/geometry";
import { uuid } from "@vecscene/utils";
import type { RGBA } from "./color.js";
import { SceneError } from "./errors.js";
import type { ImageFitMode } from "./styles.js";

/** Sampling policy outside a gradient's range or an image's extent. */
export type Extend = "pad" | "repeat" | "reflect";

export type ColorStop = {
  /** Normalized position along the gradient. */
  offset: number;
  color: RGBA;
};

export type GradientKind =
  | { kind: "linear"; start: Point; end: Point }
  | {
      kind: "radial";
      startCenter: Point;
      startRadius: number;
      endCenter: Point;
      endRadius: number;
    }
  /** Angles in radians, counter-clockwise from the x axis. */
  | { kind: "sweep"; center: Point; startAngle: number; endAngle: number };

export type Gradient = {
  extend: Extend;
  kind: GradientKind;
  stops: ColorStop[];
};

export const Gradient = {
  /**
   * One stop per color at offsets `i / (n - 1)`, in input order.
   * Needs at least two colors.
   */
  newEquidistant: (extend: Extend, kind: GradientKind, colors: readonly RGBA[]): Gradient => {
    if (colors.length < 2) {
      throw new SceneError(
        "degenerate-gradient",
        `An equidistant gradient needs at least 2 colors, got ${colors.length}`
      );
    }
    const last = colors.length - 1;
    return {
      extend,
      kind,
      stops: colors.map((color, i) => ({ offset: i / last, color }))
    };
  },

  linear: (start: Point, end: Point): GradientKind => ({ kind: "linear", start, end }),

  radial: (startCenter: Point, startRadius: number, endCenter: Point, endRadius: number): GradientKind => ({
    kind: "radial",
    startCenter,
    startRadius,
    endCenter,
    endRadius
  }),

  sweep: (center: Point, startAngle: number, endAngle: number): GradientKind => ({
    kind: "sweep",
    center,
    startAngle,
    endAngle
  })
};

export type StopIssue = {
  index: number;
  reason: "out-of-range" | "decreasing" | "not-finite";
};

/** Reports stops that are out of [0, 1] or that step backwards. */
export function validateStops(stops: readonly ColorStop[]): StopIssue[] {
  const issues: StopIssue[] = [];
  let previous = Number.NEGATIVE_INFINITY;
  stops.forEach((stop, index) => {
    if (!Number.isFinite(stop.offset)) {
      issues.push({ index, reason: "not-finite" });
      return;
    }
    if (stop.offset < 0 || stop.offset > 1) issues.push({ index, reason: "out-of-range" });
    if (stop.offset < previous) issues.push({ index, reason: "decreasing" });
    previous = stop.offset;
  });
  return issues;
}

/**
 * Decoded RGBA8 pixels. The byte buffer is shared, never copied, between
 * copies of the value; `id` is the identity backends key their caches on.
 */
export interface Image {
  readonly id: string;
  readonly data: Uint8Array;
  readonly width: number;
  readonly height: number;
}

export function createImage(data: Uint8Array, width: number, height: number): Image {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new SceneError("invalid-image", `Image size must be positive integers, got ${width}x${height}`);
  }
  const expected = width * height * 4;
  if (data.length !== expected) {
    throw new SceneError(
      "invalid-image",
      `Image data for ${width}x${height} must hold ${expected} bytes, got ${data.length}`
    );
  }
  return Object.freeze({ id: uuid(), data, width, height });
}

export type SolidBrush = { kind: "solid"; color: RGBA };
export type GradientBrush = { kind: "gradient"; gradient: Gradient };
export type TextureBrush = {
  kind: "texture";
  image: Image;
  /**
   * How the image was meant to fit its target. Descriptive only: `resolveBrush`
   * does not read it, since the target rectangle is not known here. Placement
   * comes from the brush transform, which `Geom.image` derives from this mode.
   */
  fitMode: ImageFitMode;
  edgeMode: Extend;
  /** Shift of the image inside brush space, in image pixels. */
  offset: Point;
};

export type Brush = SolidBrush | GradientBrush | TextureBrush;

export const Brush = {
  solid: (color: RGBA): SolidBrush => ({ kind: "solid", color }),
  gradient: (gradient: Gradient): GradientBrush => ({ kind: "gradient", gradient }),
  /** Image pixels map 1:1 onto brush space; pass a brush transform to place them. */
  texture: (
    image: Image,
    fitMode: ImageFitMode = { kind: "fill" },
    edgeMode: Extend = "pad",
    offset: Point = { x: 0, y: 0 }
  ): TextureBrush => ({ kind: "texture", image, fitMode, edgeMode, offset })
};

export type SolidPaint = { kind: "solid"; color: RGBA };
export type GradientPaint = { kind: "gradient"; gradient: Gradient };
export type ImagePaint = { kind: "image"; image: Image; extend: Extend };

/** Brush lowered for a backend: a texture offset is folded into the brush transform. */
export type Paint = SolidPaint | GradientPaint | ImagePaint;

export type ResolvedBrush = {
  paint: Paint;
  brushTransform?: Affine;
};

export function resolveBrush(brush: Brush, brushTransform?: Affine): ResolvedBrush {
  switch (brush.kind) {
    case "solid":
      return { paint: { kind: "solid", color: brush.color }, brushTransform };
    case "gradient":
      return { paint: { kind: "gradient", gradient: brush.gradient }, brushTransform };
    case "texture": {
      const paint: ImagePaint = { kind: "image", image: brush.image, extend: brush.edgeMode };
      const { x, y } = brush.offset;
      if (x === 0 && y === 0) return { paint, brushTransform };
      const shift = Affine.translate(x, y);
      return {
        paint,
        brushTransform: brushTransform ? Affine.compose(brushTransform, shift) : shift
      };
    }
  }
}
