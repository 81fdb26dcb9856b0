import { Affine } from "@vecscene/geometry";
import type { RGBA } from "../color.js";
import type { Scene } from "../scene/Scene.js";
import type { Drawable } from "../scene/drawable.js";
import type { Font, FontStyle, FontVariations } from "./font.js";
import { alignmentOffset, layoutText, type Alignment, type VerticalAlignment } from "./layout.js";

export type FormattedTextInit = {
  text: string;
  font: Font;
  size: number;
  color: RGBA;
  x?: number;
  y?: number;
  /** Sent to the font as the `wght` axis. Defaults to 400. */
  weight?: number;
  /** Extra variation axes; `wght` here overrides `weight`. */
  variations?: FontVariations;
  style?: FontStyle;
  alignment?: Alignment;
  verticalAlignment?: VerticalAlignment;
  transform?: Affine;
  glyphTransform?: Affine;
};

export class FormattedText implements Drawable<unknown> {
  x: number;
  y: number;
  text: string;
  size: number;
  color: RGBA;
  weight: number;
  font: Font;
  style: FontStyle;
  alignment: Alignment;
  verticalAlignment: VerticalAlignment;
  variations: FontVariations;
  transform: Affine;
  glyphTransform: Affine | undefined;

  constructor(init: FormattedTextInit) {
    this.text = init.text;
    this.font = init.font;
    this.size = init.size;
    this.color = init.color;
    this.x = init.x ?? 0;
    this.y = init.y ?? 0;
    this.weight = init.weight ?? 400;
    this.variations = init.variations ?? {};
    this.style = init.style ?? "normal";
    this.alignment = init.alignment ?? "left";
    this.verticalAlignment = init.verticalAlignment ?? "top";
    this.transform = init.transform ?? Affine.identity();
    this.glyphTransform = init.glyphTransform;
  }

  draw<TFrame>(scene: Scene<TFrame>): void {
    const variations: FontVariations = { wght: this.weight, ...this.variations };
    const layout = layoutText(this.text, this.font, this.size, variations, { x: this.x, y: this.y });
    const offset = alignmentOffset(this.alignment, this.verticalAlignment, layout.width, layout.height);

    // Alignment needs the full extent, so the correction is applied after layout.
    const transform = Affine.compose(
      Affine.compose(scene.globalTransform, this.transform),
      Affine.translate(offset.x, offset.y)
    );

    scene.backend.drawGlyphs({
      font: this.font,
      fontSize: this.size,
      fontStyle: this.style,
      variations,
      glyphs: layout.glyphs,
      transform,
      glyphTransform: this.glyphTransform,
      paint: { kind: "solid", color: this.color },
      hint: false
    });
  }
}
