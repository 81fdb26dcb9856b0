import type { DisplayList } from "../backend/drawCommands.js";
import type { Scene } from "./Scene.js";

/**
 * Anything that can lower itself into a scene. Implementations read the
 * scene's current global transform and emit primitives on its backend.
 */
export interface Drawable<TFrame = DisplayList> {
  draw(scene: Scene<TFrame>): void;
}
