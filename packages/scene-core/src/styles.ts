export type FillRule = "nonZero" | "evenOdd";

export type Join = "bevel" | "miter" | "round";

export type Cap = "butt" | "square" | "round";

/** Dash pattern entries, each a group of four lengths (on, off, on, off). */
export type Dashes = ReadonlyArray<readonly [number, number, number, number]>;

export type StrokeParams = {
  width: number;
  join: Join;
  miterLimit: number;
  startCap: Cap;
  endCap: Cap;
  dashPattern: Dashes;
  dashOffset: number;
};

export type FillStyle = { kind: "fill"; fillRule: FillRule };
export type StrokeStyle = { kind: "stroke"; stroke: StrokeParams };

export type Style = FillStyle | StrokeStyle;

export type MixMode = "normal" | "clip" | "multiply";

export type CompositeMode =
  | "sourceOver"
  | "destinationOver"
  | "sourceIn"
  | "destinationIn"
  | "sourceOut"
  | "destinationOut"
  | "sourceAtop"
  | "destinationAtop"
  | "lighter"
  | "copy"
  | "xor";

export type ImageFitMode =
  /** Image pixels map 1:1 onto brush space. */
  | { kind: "original" }
  /** Stretch the image over the target rectangle. */
  | { kind: "fill" }
  /** Scale the image to an explicit size, anchored at the rectangle's top-left. */
  | { kind: "exact"; width: number; height: number };

export const DEFAULT_STROKE: StrokeParams = {
  width: 1,
  join: "round",
  miterLimit: 4,
  startCap: "round",
  endCap: "round",
  dashPattern: [],
  dashOffset: 0
};

export function fill(fillRule: FillRule = "nonZero"): FillStyle {
  return { kind: "fill", fillRule };
}

export function stroke(width: number, params?: Partial<Omit<StrokeParams, "width">>): StrokeStyle {
  return { kind: "stroke", stroke: { ...DEFAULT_STROKE, ...params, width } };
}

/** Flattens the grouped dash pattern into a single on/off list. */
export function flattenDashes(pattern: Dashes): number[] {
  return pattern.flatMap((group) => [...group]);
}

export const FitMode = {
  original: (): ImageFitMode => ({ kind: "original" }),
  fill: (): ImageFitMode => ({ kind: "fill" }),
  exact: (width: number, height: number): ImageFitMode => ({ kind: "exact", width, height })
};
