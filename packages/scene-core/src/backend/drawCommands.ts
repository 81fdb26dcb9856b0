import type { RGBA } from "../color.js";
import type { FillPrimitive, GlyphRun, LayerBracket, StrokePrimitive } from "./types.js";

export type FillCommand = FillPrimitive & { kind: "fill" };

export type StrokeCommand = StrokePrimitive & { kind: "stroke" };

export type PushLayerCommand = LayerBracket & { kind: "pushLayer" };

export type PopLayerCommand = { kind: "popLayer" };

export type GlyphRunCommand = GlyphRun & { kind: "glyphs" };

export type DrawCommand =
  | FillCommand
  | StrokeCommand
  | PushLayerCommand
  | PopLayerCommand
  | GlyphRunCommand;

export type DrawCommandKind = DrawCommand["kind"];

/** Finished, fully resolved command stream of one frame. */
export type DisplayList = {
  readonly commands: readonly DrawCommand[];
  /** Base colour the frame is drawn over; renderers clear to it. */
  readonly background?: RGBA;
};
