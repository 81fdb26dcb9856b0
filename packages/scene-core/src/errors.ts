export type SceneErrorCode =
  | "degenerate-gradient"
  | "unsupported-layer-transform"
  | "layer-underflow"
  | "unbalanced-layers"
  | "unsupported-stroke-texture"
  | "invalid-image"
  | "scene-finished";

/** Caller contract violation while building a scene. Not recoverable mid-frame. */
export class SceneError extends Error {
  readonly code: SceneErrorCode;

  constructor(code: SceneErrorCode, message: string) {
    super(message);
    this.name = "SceneError";
    this.code = code;
  }
}

/** The font resource could not answer a metrics query. */
export class FontError extends Error {
  readonly fontId: string;

  constructor(fontId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FontError";
    this.fontId = fontId;
  }
}

/** A serialized value did not have the expected shape. */
export class CodecError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "CodecError";
    this.path = path;
  }
}
