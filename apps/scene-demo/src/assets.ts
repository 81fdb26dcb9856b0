import { GlyphTableFont, createImage, type Image } from "@vecscene/scene-core";

const UNITS_PER_EM = 1000;
const FIRST_PRINTABLE = 0x20;
const LAST_PRINTABLE = 0x7e;

/**
 * Glyph table measured from the browser's own rendering of `family`, so the
 * demo needs no font file.
 */
export function measureFont(ctx: CanvasRenderingContext2D, family: string): GlyphTableFont {
  ctx.save();
  ctx.font = `${UNITS_PER_EM}px "${family}"`;
  const glyphs: { char: string; advance: number }[] = [];
  for (let code = FIRST_PRINTABLE; code <= LAST_PRINTABLE; code++) {
    const char = String.fromCharCode(code);
    glyphs.push({ char, advance: ctx.measureText(char).width });
  }
  const metrics = ctx.measureText("Hg");
  ctx.restore();

  return GlyphTableFont.fromJSON({
    family,
    unitsPerEm: UNITS_PER_EM,
    ascent: metrics.fontBoundingBoxAscent,
    descent: -metrics.fontBoundingBoxDescent,
    lineGap: 0,
    notdefAdvance: UNITS_PER_EM / 2,
    glyphs
  });
}

/** `size` x `size` RGBA image: a hue ramp under an 8-cell checker. */
export function generateImage(size = 64): Image {
  const data = new Uint8Array(size * size * 4);
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const i = (y * size + x) * 4;
      const checker = (Math.floor((x * 8) / size) + Math.floor((y * 8) / size)) % 2 === 0;
      const shade = checker ? 255 : 160;
      data[i] = Math.round((x / (size - 1)) * shade);
      data[i + 1] = Math.round((y / (size - 1)) * shade);
      data[i + 2] = shade;
      data[i + 3] = 255;
    }
  }
  return createImage(data, size, size);
}
