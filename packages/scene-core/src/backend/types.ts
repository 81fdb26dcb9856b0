import type { Affine, Shape } from "@vecscene/geometry";
import type { Paint } from "../brushes.js";
import type { RGBA } from "../color.js";
import type { CompositeMode, FillRule, MixMode, StrokeParams } from "../styles.js";
import type { Font, FontStyle, FontVariations } from "../text/font.js";

export type FillPrimitive = {
  fillRule: FillRule;
  shape: Shape;
  paint: Paint;
  /** Shape space to device space (global already applied). */
  transform: Affine;
  /** Brush space to shape space. */
  brushTransform?: Affine;
};

export type StrokePrimitive = {
  stroke: StrokeParams;
  shape: Shape;
  paint: Paint;
  transform: Affine;
  brushTransform?: Affine;
};

export type LayerBracket = {
  mixMode: MixMode;
  compositeMode: CompositeMode;
  alpha: number;
  clip: Shape;
  /** Clip space to device space (global already applied). */
  clipTransform: Affine;
};

export type PositionedGlyph = {
  id: number;
  x: number;
  y: number;
  /** Source character, for backends that draw text rather than outlines. */
  char: string;
};

export type GlyphRun = {
  font: Font;
  fontSize: number;
  fontStyle: FontStyle;
  variations: FontVariations;
  glyphs: PositionedGlyph[];
  /** Run space to device space, alignment correction included. */
  transform: Affine;
  glyphTransform?: Affine;
  paint: Paint;
  hint: boolean;
};

/**
 * What a rendering backend implements to receive a lowered scene. Calls arrive
 * in drawing order; `pushLayer`/`popLayer` brackets nest arbitrarily and are
 * always balanced by the time `finish` is called.
 */
export interface SceneBackend<TFrame> {
  fill(primitive: FillPrimitive): void;
  stroke(primitive: StrokePrimitive): void;
  pushLayer(layer: LayerBracket): void;
  popLayer(): void;
  drawGlyphs(run: GlyphRun): void;
  /** Embeds a previously finished frame under `transform`. */
  append(frame: TFrame, transform: Affine): void;
  /** Closes the frame; `background` is the scene's base colour. */
  finish(background: RGBA): TFrame;
}
