import type { EventBus } from "@vecscene/event-bus";
import { Topics } from "@vecscene/event-bus";
import { Affine, type Shape } from "@vecscene/geometry";
import { nextId } from "@vecscene/utils";
import type { DisplayList } from "../backend/drawCommands.js";
import { DisplayListBackend } from "../backend/DisplayListBackend.js";
import type { SceneBackend } from "../backend/types.js";
import { RGBA } from "../color.js";
import { SceneError } from "../errors.js";
import type { CompositeMode, MixMode } from "../styles.js";
import type { Drawable } from "./drawable.js";

/** Where scene coordinate (0, 0) sits on the canvas. */
export type SceneOrigin = "center" | "top-left" | Affine;

export type SceneOptions<TFrame> = {
  backend: SceneBackend<TFrame>;
  width: number;
  height: number;
  /** Defaults to black. */
  background?: RGBA;
  /** Defaults to `"center"`. */
  origin?: SceneOrigin;
  /** Receives frame, layer and warning events. */
  bus?: EventBus;
};

export type LayerOptions = {
  mixMode: MixMode;
  compositeMode: CompositeMode;
  clip: Shape;
  /** Defaults to identity. */
  clipTransform?: Affine;
  /** Per-layer transforms are not supported; passing one throws. */
  layerTransform?: Affine;
  /** Defaults to 1. */
  alpha?: number;
};

export function originTransform(origin: SceneOrigin, width: number, height: number): Affine {
  if (origin === "center") return Affine.translate(width / 2, height / 2);
  if (origin === "top-left") return Affine.identity();
  return origin;
}

/**
 * One frame under construction. Drawing is immediate: every `draw` lowers the
 * drawable through the backend using the global transform current at that call.
 */
export class Scene<TFrame = DisplayList> {
  readonly id = nextId("scene");
  readonly backgroundColor: RGBA;
  readonly width: number;
  readonly height: number;
  readonly backend: SceneBackend<TFrame>;
  globalTransform: Affine;

  private readonly bus: EventBus | undefined;
  private depth = 0;
  private maxDepth = 0;
  private layerCount = 0;
  private drawCount = 0;
  private finished = false;

  constructor(options: SceneOptions<TFrame>) {
    this.backend = options.backend;
    this.width = options.width;
    this.height = options.height;
    this.backgroundColor = options.background ?? RGBA.BLACK;
    this.globalTransform = originTransform(options.origin ?? "center", options.width, options.height);
    this.bus = options.bus;
    this.bus?.publish(Topics.SCENE_FRAME_BEGIN, { sceneId: this.id, width: this.width, height: this.height });
  }

  /** Scene recording into a `DisplayList`. */
  static create(
    background: RGBA,
    width: number,
    height: number,
    options?: { origin?: SceneOrigin; bus?: EventBus }
  ): Scene<DisplayList> {
    return new Scene({ backend: new DisplayListBackend(), background, width, height, ...options });
  }

  get layerDepth(): number {
    return this.depth;
  }

  draw(drawable: Drawable<TFrame>): void {
    this.assertOpen();
    drawable.draw(this);
    this.drawCount++;
  }

  /**
   * Runs `fn` with `transform` applied beneath the current global transform,
   * so coordinates inside are child-space.
   */
  withTransform(transform: Affine, fn: (scene: this) => void): void {
    const saved = this.globalTransform;
    this.globalTransform = Affine.compose(saved, transform);
    try {
      fn(this);
    } finally {
      this.globalTransform = saved;
    }
  }

  startLayer(options: LayerOptions): void {
    this.assertOpen();
    if (options.layerTransform !== undefined) {
      throw new SceneError("unsupported-layer-transform", "Layer transforms are not supported by this scene");
    }
    const alpha = options.alpha ?? 1;
    this.backend.pushLayer({
      mixMode: options.mixMode,
      compositeMode: options.compositeMode,
      alpha,
      clip: options.clip,
      clipTransform: Affine.compose(this.globalTransform, options.clipTransform ?? Affine.identity())
    });
    this.depth++;
    this.layerCount++;
    this.maxDepth = Math.max(this.maxDepth, this.depth);
    this.bus?.publish(Topics.SCENE_LAYER_PUSH, {
      sceneId: this.id,
      depth: this.depth,
      mixMode: options.mixMode,
      compositeMode: options.compositeMode,
      alpha
    });
  }

  endLayer(): void {
    this.assertOpen();
    if (this.depth === 0) {
      throw new SceneError("layer-underflow", "endLayer() called with no layer pushed");
    }
    this.backend.popLayer();
    this.depth--;
    this.bus?.publish(Topics.SCENE_LAYER_POP, { sceneId: this.id, depth: this.depth });
  }

  /**
   * Draws `content` visible only where `mask` has coverage: a normal layer
   * holds the content, and a multiply/source-in layer over it keeps content
   * in proportion to the mask's alpha.
   */
  drawAlphaMask(
    content: (scene: this) => void,
    mask: (scene: this) => void,
    clip: Shape,
    clipTransform: Affine = Affine.identity()
  ): void {
    this.startLayer({ mixMode: "normal", compositeMode: "sourceOver", clip, clipTransform });
    content(this);
    this.startLayer({ mixMode: "multiply", compositeMode: "sourceIn", clip, clipTransform });
    mask(this);
    this.endLayer();
    this.endLayer();
  }

  /** Publishes a non-fatal diagnostic. */
  warn(code: string, message: string): void {
    this.bus?.publish(Topics.SCENE_WARNING, { sceneId: this.id, code, message });
  }

  /** Completes the frame and returns the backend's frame, background included. */
  finish(): TFrame {
    this.assertOpen();
    if (this.depth !== 0) {
      throw new SceneError(
        "unbalanced-layers",
        `Scene finished with ${this.depth} layer(s) still pushed`
      );
    }
    this.finished = true;
    const frame = this.backend.finish(this.backgroundColor);
    this.bus?.publish(Topics.SCENE_FRAME_END, {
      sceneId: this.id,
      drawCount: this.drawCount,
      layerCount: this.layerCount,
      maxLayerDepth: this.maxDepth
    });
    return frame;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new SceneError("scene-finished", "Scene has already been finished");
    }
  }
}
