import { clamp, shapeBounds, type Shape } from "@vecscene/geometry";
import {
  RGBA,
  flattenDashes,
  type CompositeMode,
  type FontStyle,
  type FontVariations,
  type Gradient,
  type MixMode,
  type StrokeParams
} from "@vecscene/scene-core";

/** Starts a new path holding `shape` in the current transform. */
export function traceShape(ctx: CanvasRenderingContext2D, shape: Shape): void {
  ctx.beginPath();
  switch (shape.kind) {
    case "circle":
      ctx.arc(shape.center.x, shape.center.y, Math.abs(shape.radius), 0, Math.PI * 2, false);
      return;
    case "rectangle": {
      const b = shapeBounds(shape);
      ctx.rect(b.minX, b.minY, b.maxX - b.minX, b.maxY - b.minY);
      return;
    }
    case "roundedRectangle": {
      const b = shapeBounds(shape);
      const w = b.maxX - b.minX;
      const h = b.maxY - b.minY;
      ctx.roundRect(b.minX, b.minY, w, h, clamp(shape.radius, 0, Math.min(w, h) / 2));
      return;
    }
  }
}

const COMPOSITE_OPERATIONS: Record<CompositeMode, GlobalCompositeOperation> = {
  sourceOver: "source-over",
  destinationOver: "destination-over",
  sourceIn: "source-in",
  destinationIn: "destination-in",
  sourceOut: "source-out",
  destinationOut: "destination-out",
  sourceAtop: "source-atop",
  destinationAtop: "destination-atop",
  lighter: "lighter",
  copy: "copy",
  xor: "xor"
};

/**
 * Canvas applies one operation per draw, so a layer's mix and composite
 * collapse into one. Multiply over source-in is the alpha-mask pairing and
 * keeps the backdrop where the mask has alpha.
 */
export function compositeOperation(mixMode: MixMode, compositeMode: CompositeMode): GlobalCompositeOperation {
  if (mixMode === "multiply") {
    if (compositeMode === "sourceOver") return "multiply";
    if (compositeMode === "sourceIn") return "destination-in";
  }
  return COMPOSITE_OPERATIONS[compositeMode];
}

function gradientShell(ctx: CanvasRenderingContext2D, gradient: Gradient): { shell: CanvasGradient; span: number } {
  const kind = gradient.kind;
  switch (kind.kind) {
    case "linear":
      return { shell: ctx.createLinearGradient(kind.start.x, kind.start.y, kind.end.x, kind.end.y), span: 1 };
    case "radial":
      return {
        shell: ctx.createRadialGradient(
          kind.startCenter.x,
          kind.startCenter.y,
          kind.startRadius,
          kind.endCenter.x,
          kind.endCenter.y,
          kind.endRadius
        ),
        span: 1
      };
    case "sweep":
      // Conic gradients always run a full turn from the start angle.
      return {
        shell: ctx.createConicGradient(kind.startAngle, kind.center.x, kind.center.y),
        span: (kind.endAngle - kind.startAngle) / (Math.PI * 2)
      };
  }
}

/** Canvas gradients only pad; `repeat` and `reflect` render as `pad`. */
export function createGradient(ctx: CanvasRenderingContext2D, gradient: Gradient): CanvasGradient {
  const { shell, span } = gradientShell(ctx, gradient);
  for (const stop of gradient.stops) {
    if (!Number.isFinite(stop.offset)) continue;
    shell.addColorStop(clamp(stop.offset * span, 0, 1), RGBA.toCss(stop.color));
  }
  return shell;
}

/**
 * Canvas has a single cap style, so the start cap wins. `scale` undoes a brush
 * transform that is active while stroking.
 */
export function applyStroke(ctx: CanvasRenderingContext2D, stroke: StrokeParams, scale = 1): void {
  ctx.lineWidth = stroke.width / scale;
  ctx.lineJoin = stroke.join;
  ctx.miterLimit = stroke.miterLimit;
  ctx.lineCap = stroke.startCap;
  ctx.setLineDash(flattenDashes(stroke.dashPattern).map((length) => length / scale));
  ctx.lineDashOffset = stroke.dashOffset / scale;
}

export function cssFont(family: string, size: number, style: FontStyle, variations: FontVariations): string {
  const weight = Math.round(variations.wght ?? 400);
  const slant = style === "italic" ? "italic " : "";
  return `${slant}${weight} ${size}px "${family}"`;
}
