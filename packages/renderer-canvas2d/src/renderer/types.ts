import type { EventBus } from "@vecscene/event-bus";
import type { DisplayList, RGBA } from "@vecscene/scene-core";

export type RendererError = {
  message: string;
  commandIndex?: number;
  cause?: unknown;
};

export type RendererDiagnostics = {
  lastFrameMs: number;
  lastCommandCount: number;
  lastDrawCalls: number;
  lastLayerCount: number;
  lastRenderedAt: number;
};

export type RendererOptions = {
  /** CSS color painted under every frame unless the scene brings its own. */
  backgroundColor?: string;
  devicePixelRatio?: number;
  /**
   * Supplies offscreen canvases for layers and textures. Defaults to
   * `document.createElement("canvas")` where a DOM exists.
   */
  createLayerCanvas?: () => HTMLCanvasElement | null;
  onError?: (error: RendererError) => void;
  /** Receives `render:stats` after each frame and `render:error` per failure. */
  bus?: EventBus;
};

export type SceneDrawData = {
  displayList: DisplayList;
  /** Overrides the display list's own background. */
  background?: RGBA;
};
