import { Affine, circle, point } from "@vecscene/geometry";
import {
  Brush,
  FitMode,
  FormattedText,
  Geom,
  Gradient,
  RGBA,
  Scene,
  fill,
  type DisplayList,
  type Font,
  type Image,
  type ImageFitMode
} from "@vecscene/scene-core";
import type { EventBus } from "@vecscene/event-bus";
import type { FitModeOption } from "@vecscene/ui-shell";

export type FrameInput = {
  width: number;
  height: number;
  /** Frame counter; the grating moves one unit per tick. */
  tick: number;
  font: Font;
  image: Image;
  fitMode: FitModeOption;
  masked: boolean;
  bus?: EventBus;
};

const RAMP_SIZE = 256;
const FIELD_RADIUS = 2000;
const GAUSSIAN_SIGMA = 0.3;

/** One half period of a sine, black to white and back. */
export const SINE_GRATING_COLORS: readonly RGBA[] = Array.from({ length: RAMP_SIZE }, (_, i) =>
  RGBA.gray(Math.sin((i / RAMP_SIZE) * Math.PI))
);

/** White with a gaussian alpha falloff, used as the mask. */
export const GAUSSIAN_COLORS: readonly RGBA[] = Array.from({ length: RAMP_SIZE }, (_, i) => {
  const x = i / RAMP_SIZE;
  return RGBA.withAlpha(RGBA.WHITE, Math.exp(-(x * x) / (2 * GAUSSIAN_SIGMA * GAUSSIAN_SIGMA)));
});

export function imageFitMode(option: FitModeOption): ImageFitMode {
  switch (option) {
    case "original":
      return FitMode.original();
    case "exact":
      return FitMode.exact(128, 128);
    case "fill":
      return FitMode.fill();
  }
}

export function buildFrame(input: FrameInput): DisplayList {
  const scene = Scene.create(RGBA.BLUE, input.width, input.height, { bus: input.bus });
  const field = circle(point(0, 0), FIELD_RADIUS);

  const grating = new Geom({
    shape: field,
    style: fill("nonZero"),
    brush: Brush.gradient(
      Gradient.newEquidistant("repeat", Gradient.linear(point(0, 0), point(100, 0)), SINE_GRATING_COLORS)
    ),
    brushTransform: Affine.translate(input.tick, 0)
  });

  if (input.masked) {
    const gaussian = new Geom({
      shape: field,
      brush: Brush.gradient(
        Gradient.newEquidistant(
          "pad",
          Gradient.radial(point(0, 0), 0, point(0, 0), FIELD_RADIUS),
          GAUSSIAN_COLORS
        )
      )
    });
    scene.drawAlphaMask(
      (s) => s.draw(grating),
      (s) => s.draw(gaussian),
      field
    );
  } else {
    scene.draw(grating);
  }

  scene.draw(new Geom({ shape: circle(point(0, 0), 10), brush: Brush.solid(RGBA.RED) }));

  scene.draw(
    new FormattedText({
      text: "vecscene",
      font: input.font,
      size: 100,
      color: RGBA.YELLOW,
      weight: 100,
      alignment: "center",
      verticalAlignment: "middle"
    })
  );

  scene.draw(Geom.image(input.image, 200, 200, 500, 500, Affine.identity(), imageFitMode(input.fitMode)));

  return scene.finish();
}
