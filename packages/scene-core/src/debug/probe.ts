import { Affine, nearlyEqual, shapeBounds, type Point, type Shape } from "@vecscene/geometry";
import type { DisplayList, DrawCommand } from "../backend/drawCommands.js";
import type { ColorStop, Extend, Gradient, Image, Paint } from "../brushes.js";
import { RGBA } from "../color.js";
import type { CompositeMode, MixMode } from "../styles.js";

/** Premultiplied color. */
export type Pixel = { r: number; g: number; b: number; a: number };

type Frame = {
  pixel: Pixel;
  mixMode: MixMode;
  compositeMode: CompositeMode;
  alpha: number;
  insideClip: boolean;
};

const CLEAR: Pixel = { r: 0, g: 0, b: 0, a: 0 };

function premultiply(color: RGBA): Pixel {
  return { r: color.r * color.a, g: color.g * color.a, b: color.b * color.a, a: color.a };
}

function unpremultiply(pixel: Pixel): RGBA {
  if (pixel.a <= 0) return RGBA.TRANSPARENT;
  return RGBA.create(pixel.r / pixel.a, pixel.g / pixel.a, pixel.b / pixel.a, pixel.a);
}

function toLocal(transform: Affine, p: Point): Point | null {
  if (nearlyEqual(Affine.determinant(transform), 0)) return null;
  return Affine.apply(Affine.invert(transform), p);
}

/** Signed distance to the outline, negative inside. */
function signedDistance(shape: Shape, p: Point): number {
  if (shape.kind === "circle") {
    return Math.hypot(p.x - shape.center.x, p.y - shape.center.y) - Math.abs(shape.radius);
  }
  const b = shapeBounds(shape);
  const halfW = (b.maxX - b.minX) / 2;
  const halfH = (b.maxY - b.minY) / 2;
  const r = shape.kind === "roundedRectangle" ? Math.max(0, Math.min(shape.radius, halfW, halfH)) : 0;
  const qx = Math.abs(p.x - (b.minX + halfW)) - (halfW - r);
  const qy = Math.abs(p.y - (b.minY + halfH)) - (halfH - r);
  const outside = Math.hypot(Math.max(qx, 0), Math.max(qy, 0));
  const inside = Math.min(Math.max(qx, qy), 0);
  return outside + inside - r;
}

function applyExtend(t: number, extend: Extend): number {
  switch (extend) {
    case "pad":
      return Math.min(1, Math.max(0, t));
    case "repeat":
      return t - Math.floor(t);
    case "reflect": {
      const m = t - 2 * Math.floor(t / 2);
      return m > 1 ? 2 - m : m;
    }
  }
}

function colorAt(stops: readonly ColorStop[], t: number): RGBA {
  const first = stops[0];
  if (!first) return RGBA.TRANSPARENT;
  if (t <= first.offset) return first.color;
  for (let i = 1; i < stops.length; i++) {
    const prev = stops[i - 1];
    const next = stops[i];
    if (!prev || !next) continue;
    if (t <= next.offset) {
      const span = next.offset - prev.offset;
      return span <= 0 ? next.color : RGBA.lerp(prev.color, next.color, (t - prev.offset) / span);
    }
  }
  return stops[stops.length - 1]?.color ?? first.color;
}

function gradientParameter(gradient: Gradient, q: Point): number {
  const kind = gradient.kind;
  switch (kind.kind) {
    case "linear": {
      const dx = kind.end.x - kind.start.x;
      const dy = kind.end.y - kind.start.y;
      const lenSq = dx * dx + dy * dy;
      if (lenSq === 0) return 0;
      return ((q.x - kind.start.x) * dx + (q.y - kind.start.y) * dy) / lenSq;
    }
    case "radial": {
      if (kind.startCenter.x !== kind.endCenter.x || kind.startCenter.y !== kind.endCenter.y) {
        throw new Error("probe: two-point radial gradients are not supported");
      }
      const span = kind.endRadius - kind.startRadius;
      const d = Math.hypot(q.x - kind.startCenter.x, q.y - kind.startCenter.y);
      return span === 0 ? 0 : (d - kind.startRadius) / span;
    }
    case "sweep": {
      let angle = Math.atan2(q.y - kind.center.y, q.x - kind.center.x);
      if (angle < 0) angle += Math.PI * 2;
      const span = kind.endAngle - kind.startAngle;
      return span === 0 ? 0 : (angle - kind.startAngle) / span;
    }
  }
}

function extendIndex(i: number, size: number, extend: Extend): number {
  switch (extend) {
    case "pad":
      return Math.min(size - 1, Math.max(0, i));
    case "repeat":
      return ((i % size) + size) % size;
    case "reflect": {
      const period = size * 2;
      const m = ((i % period) + period) % period;
      return m < size ? m : period - 1 - m;
    }
  }
}

function imageAt(image: Image, extend: Extend, q: Point): RGBA {
  const x = extendIndex(Math.floor(q.x), image.width, extend);
  const y = extendIndex(Math.floor(q.y), image.height, extend);
  const offset = (y * image.width + x) * 4;
  const byte = (i: number) => (image.data[offset + i] ?? 0) / 255;
  return RGBA.create(byte(0), byte(1), byte(2), byte(3));
}

function paintAt(paint: Paint, brushTransform: Affine | undefined, local: Point): RGBA | null {
  if (paint.kind === "solid") return paint.color;
  const q = brushTransform ? toLocal(brushTransform, local) : local;
  if (!q) return null;
  if (paint.kind === "gradient") {
    const t = applyExtend(gradientParameter(paint.gradient, q), paint.gradient.extend);
    return colorAt(paint.gradient.stops, t);
  }
  return imageAt(paint.image, paint.extend, q);
}

function blendChannel(mixMode: MixMode, backdrop: number, source: number): number {
  return mixMode === "multiply" ? backdrop * source : source;
}

function porterDuff(mode: CompositeMode, as: number, ab: number): [number, number] {
  switch (mode) {
    case "sourceOver":
      return [1, 1 - as];
    case "destinationOver":
      return [1 - ab, 1];
    case "sourceIn":
      return [ab, 0];
    case "destinationIn":
      return [0, as];
    case "sourceOut":
      return [1 - ab, 0];
    case "destinationOut":
      return [0, 1 - as];
    case "sourceAtop":
      return [ab, 1 - as];
    case "destinationAtop":
      return [1 - ab, as];
    case "lighter":
      return [1, 1];
    case "copy":
      return [1, 0];
    case "xor":
      return [1 - ab, 1 - as];
  }
}

/**
 * Separable blend followed by Porter-Duff compositing, both as specified by
 * W3C Compositing and Blending Level 1.
 */
export function compositePixel(
  backdrop: Pixel,
  source: RGBA,
  mixMode: MixMode,
  compositeMode: CompositeMode
): Pixel {
  const as = source.a;
  const ab = backdrop.a;
  const cb = unpremultiply(backdrop);
  const mixed = (channel: "r" | "g" | "b") =>
    (1 - ab) * source[channel] + ab * blendChannel(mixMode, cb[channel], source[channel]);
  const [fa, fb] = porterDuff(compositeMode, as, ab);
  const out = {
    r: as * fa * mixed("r") + fb * backdrop.r,
    g: as * fa * mixed("g") + fb * backdrop.g,
    b: as * fa * mixed("b") + fb * backdrop.b,
    a: as * fa + ab * fb
  };
  return {
    r: Math.min(1, out.r),
    g: Math.min(1, out.g),
    b: Math.min(1, out.b),
    a: Math.min(1, out.a)
  };
}

function coverage(command: DrawCommand, p: Point): Point | null {
  if (command.kind !== "fill" && command.kind !== "stroke") return null;
  const local = toLocal(command.transform, p);
  if (!local) return null;
  const d = signedDistance(command.shape, local);
  if (command.kind === "fill") return d <= 0 ? local : null;
  return Math.abs(d) <= command.stroke.width / 2 ? local : null;
}

export type ProbeOptions = {
  /** Color under everything. Defaults to transparent. */
  background?: RGBA;
};

/**
 * Evaluates the final color of a display list at one device-space point,
 * treating coverage as all-or-nothing. Glyph runs are skipped because glyph
 * outlines live in the font collaborator.
 */
export function probeDisplayList(list: DisplayList, p: Point, options: ProbeOptions = {}): RGBA {
  const root: Frame = {
    pixel: premultiply(options.background ?? RGBA.TRANSPARENT),
    mixMode: "normal",
    compositeMode: "sourceOver",
    alpha: 1,
    insideClip: true
  };
  const stack: Frame[] = [root];
  const top = (): Frame => stack[stack.length - 1] ?? root;

  for (const command of list.commands) {
    switch (command.kind) {
      case "pushLayer": {
        const local = toLocal(command.clipTransform, p);
        stack.push({
          pixel: CLEAR,
          mixMode: command.mixMode,
          compositeMode: command.compositeMode,
          alpha: command.alpha,
          insideClip: local !== null && signedDistance(command.clip, local) <= 0
        });
        break;
      }
      case "popLayer": {
        const layer = stack.pop();
        if (!layer || stack.length === 0) throw new Error("probe: unbalanced popLayer");
        const parent = top();
        if (!layer.insideClip) break;
        const color = unpremultiply(layer.pixel);
        parent.pixel = compositePixel(
          parent.pixel,
          RGBA.withAlpha(color, color.a * layer.alpha),
          layer.mixMode,
          layer.compositeMode
        );
        break;
      }
      case "fill":
      case "stroke": {
        const local = coverage(command, p);
        if (!local) break;
        const color = paintAt(command.paint, command.brushTransform, local);
        if (!color) break;
        const frame = top();
        frame.pixel = compositePixel(frame.pixel, color, "normal", "sourceOver");
        break;
      }
      case "glyphs":
        break;
    }
  }

  return unpremultiply(root.pixel);
}
