import type { Point } from "@vecscene/geometry";
import type { PositionedGlyph } from "../backend/types.js";
import { NOTDEF_GLYPH, lineHeight, type Font, type FontVariations } from "./font.js";

export type Alignment = "left" | "center" | "right";

export type VerticalAlignment = "top" | "middle" | "bottom";

export type TextLayout = {
  glyphs: PositionedGlyph[];
  width: number;
  height: number;
  lineHeight: number;
};

/**
 * Places one glyph per character starting at `origin`. A newline moves the pen
 * to x = 0 on the next line and emits nothing; unmapped characters use the
 * notdef glyph.
 */
export function layoutText(
  text: string,
  font: Font,
  size: number,
  variations: FontVariations,
  origin: Point
): TextLayout {
  const lh = lineHeight(font.lineMetrics(size, variations));
  let penX = origin.x;
  let penY = origin.y;
  const glyphs: PositionedGlyph[] = [];

  for (const char of text) {
    if (char === "\n") {
      penX = 0;
      penY += lh;
      continue;
    }
    const id = font.glyphId(char) ?? NOTDEF_GLYPH;
    glyphs.push({ id, x: penX, y: penY, char });
    penX += font.advanceWidth(id, size, variations) ?? 0;
  }

  return { glyphs, width: penX, height: penY + lh, lineHeight: lh };
}

/** Translation that moves a laid-out block from its pen origin to the requested anchor. */
export function alignmentOffset(
  alignment: Alignment,
  verticalAlignment: VerticalAlignment,
  width: number,
  height: number
): Point {
  const x = alignment === "left" ? 0 : alignment === "center" ? -width / 2 : -width;
  const y = verticalAlignment === "top" ? 0 : verticalAlignment === "middle" ? height / 2 : height;
  return { x, y };
}
