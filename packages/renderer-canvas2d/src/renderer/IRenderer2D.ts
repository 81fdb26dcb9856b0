import type { DisplayList } from "@vecscene/scene-core";
import type { RendererDiagnostics, RendererOptions, SceneDrawData } from "./types.js";

export interface IRenderer2D {
  init(canvas: HTMLCanvasElement, options?: RendererOptions): void;
  updateScene(scene: DisplayList | SceneDrawData): void;
  render(): void;
  startLoop(): void;
  stopLoop(): void;
  resize(width: number, height: number): void;
  destroy(): void;
  getDiagnostics(): RendererDiagnostics;
}
