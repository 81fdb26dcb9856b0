import { Topics } from "@vecscene/event-bus";
import { Affine, clamp } from "@vecscene/geometry";
import {
  RGBA,
  TextureCache,
  type DisplayList,
  type DrawCommand,
  type FillCommand,
  type GlyphRunCommand,
  type Image,
  type Paint,
  type PushLayerCommand,
  type StrokeCommand
} from "@vecscene/scene-core";
import type { IRenderer2D } from "./IRenderer2D.js";
import { applyStroke, compositeOperation, createGradient, cssFont, traceShape } from "./paint.js";
import type {
  RendererDiagnostics,
  RendererError,
  RendererOptions,
  SceneDrawData
} from "./types.js";

type Frame =
  | { kind: "root"; ctx: CanvasRenderingContext2D }
  | { kind: "clip"; ctx: CanvasRenderingContext2D }
  | { kind: "layer"; ctx: CanvasRenderingContext2D; canvas: HTMLCanvasElement; command: PushLayerCommand };

type FrameStats = {
  drawCalls: number;
  layers: number;
};

type CanvasPaint = string | CanvasGradient | CanvasPattern;

function nowMs(): number {
  return typeof performance !== "undefined" && typeof performance.now === "function"
    ? performance.now()
    : Date.now();
}

function getDevicePixelRatio(options: RendererOptions | undefined): number {
  if (options?.devicePixelRatio != null) return Math.max(1, options.devicePixelRatio);
  const dpr =
    typeof window !== "undefined" && typeof window.devicePixelRatio === "number"
      ? window.devicePixelRatio
      : 1;
  return Math.max(1, dpr);
}

function isSceneDrawData(scene: DisplayList | SceneDrawData): scene is SceneDrawData {
  return "displayList" in scene;
}

/**
 * Replays a scene display list onto a 2D canvas. Non-clip layers render into
 * pooled offscreen canvases and are composited back through their clip.
 */
export class Canvas2DRenderer implements IRenderer2D {
  private canvas: HTMLCanvasElement | null = null;
  private ctx: CanvasRenderingContext2D | null = null;
  private options: RendererOptions = {};
  private dpr = 1;
  private width = 0;
  private height = 0;

  private displayList: DisplayList = { commands: [] };
  private background: RGBA | undefined;

  private needsRender = false;
  private cancelFrame: (() => void) | null = null;
  private running = false;

  private layerPool: HTMLCanvasElement[] = [];
  private readonly textures = new TextureCache<HTMLCanvasElement | null>((image) => this.uploadTexture(image));

  private diagnostics: RendererDiagnostics = {
    lastFrameMs: 0,
    lastCommandCount: 0,
    lastDrawCalls: 0,
    lastLayerCount: 0,
    lastRenderedAt: 0
  };

  init(canvas: HTMLCanvasElement, options?: RendererOptions): void {
    this.canvas = canvas;
    this.options = options ?? {};
    this.dpr = getDevicePixelRatio(this.options);

    const ctx = canvas.getContext("2d");
    if (!ctx) {
      this.reportError({ message: "Canvas2D context not available" });
      this.ctx = null;
      return;
    }
    this.ctx = ctx;
    this.resize(canvas.clientWidth || canvas.width, canvas.clientHeight || canvas.height);
  }

  updateScene(scene: DisplayList | SceneDrawData): void {
    const data: SceneDrawData = isSceneDrawData(scene) ? scene : { displayList: scene };
    this.displayList = data.displayList;
    this.background = data.background ?? data.displayList.background;
    this.needsRender = true;
  }

  render(): void {
    const ctx = this.ctx;
    if (!ctx) return;

    const start = nowMs();
    const stats: FrameStats = { drawCalls: 0, layers: 0 };

    this.clear(ctx);
    this.replay(ctx, this.displayList.commands, stats);

    this.diagnostics = {
      lastFrameMs: nowMs() - start,
      lastCommandCount: this.displayList.commands.length,
      lastDrawCalls: stats.drawCalls,
      lastLayerCount: stats.layers,
      lastRenderedAt: Date.now()
    };
    this.needsRender = false;
    this.options.bus?.publish(Topics.RENDER_STATS, {
      lastFrameMs: this.diagnostics.lastFrameMs,
      lastCommandCount: this.diagnostics.lastCommandCount,
      lastDrawCalls: this.diagnostics.lastDrawCalls,
      lastLayerCount: this.diagnostics.lastLayerCount
    });
  }

  startLoop(): void {
    if (this.running) return;
    this.running = true;
    const loop = (): void => {
      if (!this.running) return;
      if (this.needsRender) this.render();
      this.cancelFrame = this.requestFrame(loop);
    };
    this.cancelFrame = this.requestFrame(loop);
  }

  stopLoop(): void {
    this.running = false;
    this.cancelFrame?.();
    this.cancelFrame = null;
  }

  resize(width: number, height: number): void {
    if (!this.canvas || !this.ctx) return;

    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    this.width = w;
    this.height = h;

    this.canvas.style.width = `${w}px`;
    this.canvas.style.height = `${h}px`;

    const pixelW = Math.max(1, Math.floor(w * this.dpr));
    const pixelH = Math.max(1, Math.floor(h * this.dpr));
    if (this.canvas.width !== pixelW) this.canvas.width = pixelW;
    if (this.canvas.height !== pixelH) this.canvas.height = pixelH;

    this.ctx.setTransform(this.dpr, 0, 0, this.dpr, 0, 0);
    this.needsRender = true;
  }

  destroy(): void {
    this.stopLoop();
    this.canvas = null;
    this.ctx = null;
    this.displayList = { commands: [] };
    this.layerPool = [];
    this.textures.clear();
    this.needsRender = false;
  }

  getDiagnostics(): RendererDiagnostics {
    return this.diagnostics;
  }

  /** Schedules `cb` for the next frame and returns its cancel function. */
  private requestFrame(cb: () => void): () => void {
    if (typeof requestAnimationFrame === "function") {
      const id = requestAnimationFrame(() => cb());
      return () => cancelAnimationFrame(id);
    }
    const id = setTimeout(cb, 16);
    return () => clearTimeout(id);
  }

  private reportCommandError(command: DrawCommand, index: number, cause: unknown): void {
    this.reportError({
      message: `${command.kind} command failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      commandIndex: index,
      cause
    });
  }

  private reportError(error: RendererError): void {
    this.options.onError?.(error);
    this.options.bus?.publish(Topics.RENDER_ERROR, { message: error.message, commandIndex: error.commandIndex });
  }

  private clear(ctx: CanvasRenderingContext2D): void {
    ctx.setTransform(this.dpr, 0, 0, this.dpr, 0, 0);
    ctx.globalAlpha = 1;
    ctx.globalCompositeOperation = "source-over";
    ctx.clearRect(0, 0, this.width, this.height);

    const bg = this.background ? RGBA.toCss(this.background) : this.options.backgroundColor;
    if (!bg) return;
    ctx.save();
    ctx.fillStyle = bg;
    ctx.fillRect(0, 0, this.width, this.height);
    ctx.restore();
  }

  private setTransform(ctx: CanvasRenderingContext2D, t: Affine): void {
    const dpr = this.dpr;
    ctx.setTransform(dpr * t.a, dpr * t.b, dpr * t.c, dpr * t.d, dpr * t.e, dpr * t.f);
  }

  private replay(root: CanvasRenderingContext2D, commands: readonly DrawCommand[], stats: FrameStats): void {
    const rootFrame: Frame = { kind: "root", ctx: root };
    const stack: Frame[] = [rootFrame];
    const top = (): Frame => stack[stack.length - 1] ?? rootFrame;

    commands.forEach((command, index) => {
      try {
        switch (command.kind) {
          case "fill":
            stats.drawCalls += this.fill(top().ctx, command);
            break;
          case "stroke":
            stats.drawCalls += this.stroke(top().ctx, command);
            break;
          case "glyphs":
            stats.drawCalls += this.drawGlyphs(top().ctx, command);
            break;
          case "pushLayer":
            stack.push(this.pushLayer(top().ctx, command, index));
            stats.layers++;
            break;
          case "popLayer": {
            if (stack.length <= 1) throw new Error("popLayer without a matching pushLayer");
            const frame = stack.pop();
            if (frame) stats.drawCalls += this.popLayer(top().ctx, frame);
            break;
          }
        }
      } catch (cause) {
        this.reportCommandError(command, index, cause);
      }
    });

    while (stack.length > 1) {
      const frame = stack.pop();
      if (frame) stats.drawCalls += this.popLayer(top().ctx, frame);
    }
  }

  private paintStyle(ctx: CanvasRenderingContext2D, paint: Paint): CanvasPaint | null {
    switch (paint.kind) {
      case "solid":
        return RGBA.toCss(paint.color);
      case "gradient":
        return createGradient(ctx, paint.gradient);
      case "image": {
        const texture = this.textures.getOrCreate(paint.image);
        if (!texture) throw new Error(`Image ${paint.image.id} could not be uploaded`);
        // Canvas patterns cannot clamp to the edge texel; pad leaves the outside empty.
        return ctx.createPattern(texture, paint.extend === "pad" ? "no-repeat" : "repeat");
      }
    }
  }

  private fill(ctx: CanvasRenderingContext2D, command: FillCommand): number {
    ctx.save();
    try {
      this.setTransform(ctx, command.transform);
      traceShape(ctx, command.shape);
      const b = command.brushTransform;
      if (b) ctx.transform(b.a, b.b, b.c, b.d, b.e, b.f);
      const style = this.paintStyle(ctx, command.paint);
      if (!style) return 0;
      ctx.fillStyle = style;
      ctx.fill(command.fillRule === "evenOdd" ? "evenodd" : "nonzero");
      return 1;
    } finally {
      ctx.restore();
    }
  }

  private stroke(ctx: CanvasRenderingContext2D, command: StrokeCommand): number {
    ctx.save();
    try {
      this.setTransform(ctx, command.transform);
      traceShape(ctx, command.shape);
      const b = command.brushTransform;
      let scale = 1;
      if (b) {
        ctx.transform(b.a, b.b, b.c, b.d, b.e, b.f);
        scale = Math.sqrt(Math.abs(Affine.determinant(b))) || 1;
      }
      const style = this.paintStyle(ctx, command.paint);
      if (!style) return 0;
      applyStroke(ctx, command.stroke, scale);
      ctx.strokeStyle = style;
      ctx.stroke();
      return 1;
    } finally {
      ctx.restore();
    }
  }

  private drawGlyphs(ctx: CanvasRenderingContext2D, command: GlyphRunCommand): number {
    const { font, fontSize, variations, glyphTransform } = command;
    // Glyph positions mark the top of the line; fillText wants the baseline.
    const ascent = font.lineMetrics(fontSize, variations).ascent;

    ctx.save();
    try {
      this.setTransform(ctx, command.transform);
      const style = this.paintStyle(ctx, command.paint);
      if (!style) return 0;
      ctx.fillStyle = style;
      ctx.font = cssFont(font.family, fontSize, command.fontStyle, variations);
      ctx.textAlign = "left";
      ctx.textBaseline = "alphabetic";

      for (const glyph of command.glyphs) {
        if (glyphTransform) {
          ctx.save();
          ctx.translate(glyph.x, glyph.y + ascent);
          ctx.transform(glyphTransform.a, glyphTransform.b, glyphTransform.c, glyphTransform.d, glyphTransform.e, glyphTransform.f);
          ctx.fillText(glyph.char, 0, 0);
          ctx.restore();
        } else {
          ctx.fillText(glyph.char, glyph.x, glyph.y + ascent);
        }
      }
      return command.glyphs.length;
    } finally {
      ctx.restore();
    }
  }

  /**
   * Always returns a frame, so the stack stays paired with the command
   * stream. Failures are reported and the layer degrades to a clip frame whose
   * `restore()` balances its `save()`.
   */
  private pushLayer(ctx: CanvasRenderingContext2D, command: PushLayerCommand, index: number): Frame {
    if (command.mixMode !== "clip") {
      try {
        const layer = this.openLayer(command);
        if (layer) return layer;
        this.reportError({ message: "No offscreen canvas for layer; drawing it unblended", commandIndex: index });
      } catch (cause) {
        this.reportCommandError(command, index, cause);
      }
    }

    ctx.save();
    try {
      this.setTransform(ctx, command.clipTransform);
      traceShape(ctx, command.clip);
      ctx.clip();
    } catch (cause) {
      this.reportCommandError(command, index, cause);
    }
    return { kind: "clip", ctx };
  }

  private openLayer(command: PushLayerCommand): Frame | null {
    const canvas = this.acquireLayerCanvas();
    if (!canvas) return null;
    const layerCtx = canvas.getContext("2d");
    if (!layerCtx) {
      this.layerPool.push(canvas);
      return null;
    }
    layerCtx.setTransform(1, 0, 0, 1, 0, 0);
    layerCtx.globalAlpha = 1;
    layerCtx.globalCompositeOperation = "source-over";
    layerCtx.clearRect(0, 0, canvas.width, canvas.height);
    return { kind: "layer", ctx: layerCtx, canvas, command };
  }

  private popLayer(parent: CanvasRenderingContext2D, frame: Frame): number {
    switch (frame.kind) {
      case "root":
        return 0;
      case "clip":
        frame.ctx.restore();
        return 0;
      case "layer": {
        const { command, canvas } = frame;
        parent.save();
        try {
          this.setTransform(parent, command.clipTransform);
          traceShape(parent, command.clip);
          parent.clip();
          parent.setTransform(1, 0, 0, 1, 0, 0);
          parent.globalAlpha = clamp(command.alpha, 0, 1);
          parent.globalCompositeOperation = compositeOperation(command.mixMode, command.compositeMode);
          parent.drawImage(canvas, 0, 0);
        } finally {
          parent.restore();
          this.layerPool.push(canvas);
        }
        return 1;
      }
    }
  }

  private createCanvas(): HTMLCanvasElement | null {
    if (this.options.createLayerCanvas) return this.options.createLayerCanvas();
    return typeof document !== "undefined" ? document.createElement("canvas") : null;
  }

  private acquireLayerCanvas(): HTMLCanvasElement | null {
    const canvas = this.layerPool.pop() ?? this.createCanvas();
    if (!canvas) return null;
    const pixelW = Math.max(1, Math.floor(this.width * this.dpr));
    const pixelH = Math.max(1, Math.floor(this.height * this.dpr));
    if (canvas.width !== pixelW) canvas.width = pixelW;
    if (canvas.height !== pixelH) canvas.height = pixelH;
    return canvas;
  }

  private uploadTexture(image: Image): HTMLCanvasElement | null {
    const canvas = this.createCanvas();
    const ctx = canvas?.getContext("2d");
    if (!canvas || !ctx) return null;
    canvas.width = image.width;
    canvas.height = image.height;
    const pixels = ctx.createImageData(image.width, image.height);
    pixels.data.set(image.data);
    ctx.putImageData(pixels, 0, 0);
    return canvas;
  }
}
