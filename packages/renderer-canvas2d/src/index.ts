export { Canvas2DRenderer } from "./renderer/Canvas2DRenderer.js";
export type { IRenderer2D } from "./renderer/IRenderer2D.js";
export type {
  RendererDiagnostics,
  RendererError,
  RendererOptions,
  SceneDrawData
} from "./renderer/types.js";
export { compositeOperation, cssFont } from "./renderer/paint.js";
