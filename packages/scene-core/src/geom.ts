import { Affine, centeredRectangle, type Rectangle, type Shape } from "@vecscene/geometry";
import { Brush, resolveBrush, validateStops, type Image } from "./brushes.js";
import { SceneError } from "./errors.js";
import type { Scene } from "./scene/Scene.js";
import type { Drawable } from "./scene/drawable.js";
import { fill, type ImageFitMode, type Style } from "./styles.js";

export type GeomInit<S extends Shape> = {
  shape: S;
  brush: Brush;
  /** Defaults to a non-zero fill. */
  style?: Style;
  /** Object transform, shape space to parent space. Defaults to identity. */
  transform?: Affine;
  /** Brush space to shape space. Independent of `transform`. */
  brushTransform?: Affine;
};

function fitTransform(image: Image, fitMode: ImageFitMode, topLeftX: number, topLeftY: number, width: number, height: number): Affine | undefined {
  switch (fitMode.kind) {
    case "original":
      return undefined;
    case "fill":
      return Affine.compose(
        Affine.translate(topLeftX, topLeftY),
        Affine.scaleXY(width / image.width, height / image.height)
      );
    case "exact":
      return Affine.compose(
        Affine.translate(topLeftX, topLeftY),
        Affine.scaleXY(fitMode.width / image.width, fitMode.height / image.height)
      );
  }
}

/** A shape filled or stroked with a brush. */
export class Geom<S extends Shape = Shape> implements Drawable<unknown> {
  style: Style;
  shape: S;
  brush: Brush;
  transform: Affine;
  brushTransform: Affine | undefined;

  constructor(init: GeomInit<S>) {
    this.shape = init.shape;
    this.brush = init.brush;
    this.style = init.style ?? fill("nonZero");
    this.transform = init.transform ?? Affine.identity();
    this.brushTransform = init.brushTransform;
  }

  /**
   * Rectangle of `width` x `height` centred at (`x`, `y`) showing `image`.
   * Under `fill` the image is scaled to the rectangle and then moved so its
   * origin sits on the rectangle's top-left corner.
   */
  static image(
    image: Image,
    x: number,
    y: number,
    width: number,
    height: number,
    transform: Affine = Affine.identity(),
    fitMode: ImageFitMode = { kind: "fill" }
  ): Geom<Rectangle> {
    const shape = centeredRectangle({ x, y }, width, height);
    return new Geom({
      shape,
      brush: Brush.texture(image, fitMode),
      style: fill("nonZero"),
      transform,
      brushTransform: fitTransform(image, fitMode, x - width / 2, y - height / 2, width, height)
    });
  }

  draw<TFrame>(scene: Scene<TFrame>): void {
    const transform = Affine.compose(scene.globalTransform, this.transform);
    const { paint, brushTransform } = resolveBrush(this.brush, this.brushTransform);

    if (paint.kind === "gradient") {
      const issues = validateStops(paint.gradient.stops);
      if (issues.length > 0) {
        const detail = issues.map((issue) => `#${issue.index} ${issue.reason}`).join(", ");
        scene.warn("gradient-stops", `Gradient stops are not monotonic in [0, 1]: ${detail}`);
      }
    }

    switch (this.style.kind) {
      case "fill":
        scene.backend.fill({
          fillRule: this.style.fillRule,
          shape: this.shape,
          paint,
          transform,
          brushTransform
        });
        return;
      case "stroke":
        if (paint.kind === "image") {
          throw new SceneError("unsupported-stroke-texture", "Image brushes can only be used to fill");
        }
        scene.backend.stroke({
          stroke: this.style.stroke,
          shape: this.shape,
          paint,
          transform,
          brushTransform
        });
        return;
    }
  }
}
