export { RGBA } from "./color.js";
export { CodecError, FontError, SceneError, type SceneErrorCode } from "./errors.js";

export type {
  Cap,
  CompositeMode,
  Dashes,
  FillRule,
  FillStyle,
  ImageFitMode,
  Join,
  MixMode,
  StrokeParams,
  StrokeStyle,
  Style
} from "./styles.js";
export { DEFAULT_STROKE, FitMode, fill, flattenDashes, stroke } from "./styles.js";

export type {
  ColorStop,
  Extend,
  GradientBrush,
  GradientKind,
  GradientPaint,
  Image,
  ImagePaint,
  Paint,
  ResolvedBrush,
  SolidBrush,
  SolidPaint,
  StopIssue,
  TextureBrush
} from "./brushes.js";
export { Brush, Gradient, createImage, resolveBrush, validateStops } from "./brushes.js";

export { Geom, type GeomInit } from "./geom.js";

export type { Font, FontStyle, FontVariations, LineMetrics } from "./text/font.js";
export { GlyphTableFont, NOTDEF_GLYPH, lineHeight } from "./text/font.js";
export type { Alignment, TextLayout, VerticalAlignment } from "./text/layout.js";
export { alignmentOffset, layoutText } from "./text/layout.js";
export { FormattedText, type FormattedTextInit } from "./text/FormattedText.js";

export type { Drawable } from "./scene/drawable.js";
export { Scene, originTransform, type LayerOptions, type SceneOptions, type SceneOrigin } from "./scene/Scene.js";
export { PrerenderedScene } from "./scene/PrerenderedScene.js";

export type {
  FillPrimitive,
  GlyphRun,
  LayerBracket,
  PositionedGlyph,
  SceneBackend,
  StrokePrimitive
} from "./backend/types.js";
export type {
  DisplayList,
  DrawCommand,
  DrawCommandKind,
  FillCommand,
  GlyphRunCommand,
  PopLayerCommand,
  PushLayerCommand,
  StrokeCommand
} from "./backend/drawCommands.js";
export { DisplayListBackend } from "./backend/DisplayListBackend.js";

export { TextureCache } from "./resources/TextureCache.js";

export * from "./codec/valueCodec.js";

export { compositePixel, probeDisplayList, type Pixel, type ProbeOptions } from "./debug/probe.js";
