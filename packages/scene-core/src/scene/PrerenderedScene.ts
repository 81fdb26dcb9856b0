import { Affine } from "@vecscene/geometry";
import type { Drawable } from "./drawable.js";
import type { Scene } from "./Scene.js";

/** A finished frame embedded into another scene as a single drawable. */
export class PrerenderedScene<TFrame> implements Drawable<TFrame> {
  readonly frame: TFrame;
  transform: Affine;

  constructor(frame: TFrame, transform: Affine = Affine.identity()) {
    this.frame = frame;
    this.transform = transform;
  }

  draw(scene: Scene<TFrame>): void {
    scene.backend.append(this.frame, Affine.compose(scene.globalTransform, this.transform));
  }
}
