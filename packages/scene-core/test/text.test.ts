import test from "node:test";
import assert from "node:assert/strict";
import { Affine } from "@vecscene/geometry";
import { RGBA } from "../src/color.js";
import { FontError } from "../src/errors.js";
import { Scene } from "../src/scene/Scene.js";
import { GlyphTableFont, NOTDEF_GLYPH } from "../src/text/font.js";
import { FormattedText } from "../src/text/FormattedText.js";
import { alignmentOffset, layoutText } from "../src/text/layout.js";

// At size 20: A advances 10, B advances 12, line height 20.
const font = GlyphTableFont.fromJSON({
  family: "Test Sans",
  unitsPerEm: 1000,
  ascent: 800,
  descent: -200,
  lineGap: 0,
  notdefAdvance: 300,
  glyphs: [
    { char: "A", advance: 500 },
    { char: "B", advance: 600 }
  ]
});

test("GlyphTableFont scales metrics to the requested size", () => {
  assert.equal(font.family, "Test Sans");
  assert.equal(font.glyphId("A"), 1);
  assert.equal(font.glyphId("B"), 2);
  assert.equal(font.glyphId("Z"), undefined);
  assert.equal(font.advanceWidth(1, 20, {}), 10);
  assert.equal(font.advanceWidth(NOTDEF_GLYPH, 20, {}), 6);
  assert.equal(font.advanceWidth(99, 20, {}), undefined);
  assert.deepEqual(font.lineMetrics(20, {}), { ascent: 16, descent: -4, leading: 0 });
});

test("layoutText advances the pen glyph by glyph", () => {
  const layout = layoutText("AB", font, 20, {}, { x: 0, y: 5 });
  assert.deepEqual(layout.glyphs, [
    { id: 1, x: 0, y: 5, char: "A" },
    { id: 2, x: 10, y: 5, char: "B" }
  ]);
  assert.equal(layout.width, 22);
  assert.equal(layout.height, 25);
  assert.equal(layout.lineHeight, 20);
});

test("layoutText starts a new line at x = 0 after a newline", () => {
  const layout = layoutText("A\nB", font, 20, {}, { x: 7, y: 0 });
  assert.deepEqual(layout.glyphs, [
    { id: 1, x: 7, y: 0, char: "A" },
    { id: 2, x: 0, y: 20, char: "B" }
  ]);
  assert.equal(layout.width, 12);
  assert.equal(layout.height, 40);
});

test("layoutText maps unknown characters to the notdef glyph", () => {
  const layout = layoutText("A?", font, 20, {}, { x: 0, y: 0 });
  assert.deepEqual(layout.glyphs[1], { id: NOTDEF_GLYPH, x: 10, y: 0, char: "?" });
  assert.equal(layout.width, 16);
});

test("layoutText of an empty string is a single empty line", () => {
  const layout = layoutText("", font, 20, {}, { x: 0, y: 0 });
  assert.deepEqual(layout.glyphs, []);
  assert.equal(layout.width, 0);
  assert.equal(layout.height, 20);
});

test("alignmentOffset moves the block to its anchor", () => {
  assert.deepEqual(alignmentOffset("center", "top", 22, 25), { x: -11, y: 0 });
  assert.deepEqual(alignmentOffset("right", "bottom", 12, 40), { x: -12, y: 40 });
  assert.deepEqual(alignmentOffset("left", "middle", 5, 10), { x: 0, y: 5 });
});

test("FormattedText draws one glyph run with the alignment folded into its transform", () => {
  const scene = Scene.create(RGBA.BLACK, 200, 100);
  scene.draw(
    new FormattedText({
      text: "AB",
      font,
      size: 20,
      color: RGBA.YELLOW,
      y: 5,
      weight: 700,
      alignment: "center",
      verticalAlignment: "middle"
    })
  );
  const [command] = scene.finish().commands;
  assert.ok(command && command.kind === "glyphs");
  assert.deepEqual(Affine.coefficients(command.transform), [1, 0, 0, 1, 89, 62.5]);
  assert.deepEqual(
    command.glyphs.map((glyph) => [glyph.x, glyph.y]),
    [
      [0, 5],
      [10, 5]
    ]
  );
  assert.deepEqual(command.variations, { wght: 700 });
  assert.deepEqual(command.paint, { kind: "solid", color: RGBA.YELLOW });
  assert.equal(command.font, font);
  assert.equal(command.fontSize, 20);
  assert.equal(command.fontStyle, "normal");
  assert.equal(command.hint, false);
});

test("FormattedText lets an explicit wght variation override the weight", () => {
  const scene = Scene.create(RGBA.BLACK, 10, 10, { origin: "top-left" });
  scene.draw(
    new FormattedText({ text: "A", font, size: 20, color: RGBA.WHITE, weight: 700, variations: { wght: 650, wdth: 90 } })
  );
  const [command] = scene.finish().commands;
  assert.ok(command && command.kind === "glyphs");
  assert.deepEqual(command.variations, { wght: 650, wdth: 90 });
});

test("FormattedText applies its own transform under the global transform", () => {
  const scene = Scene.create(RGBA.BLACK, 10, 10, { origin: "top-left" });
  scene.withTransform(Affine.translate(100, 0), (s) =>
    s.draw(new FormattedText({ text: "AB", font, size: 20, color: RGBA.WHITE, transform: Affine.scale(2), alignment: "right" }))
  );
  const [command] = scene.finish().commands;
  assert.ok(command && command.kind === "glyphs");
  assert.deepEqual(Affine.coefficients(command.transform), [2, 0, 0, 2, 56, 0]);
});

test("an unreadable font fails when it is first drawn", () => {
  const broken = new GlyphTableFont(new TextEncoder().encode("not a font"), "Broken");

  const scene = Scene.create(RGBA.BLACK, 10, 10);
  assert.throws(
    () => scene.draw(new FormattedText({ text: "A", font: broken, size: 12, color: RGBA.WHITE })),
    (err: unknown) =>
      err instanceof FontError && err.fontId === broken.id && err.message.startsWith("Failed to load font: ")
  );
});

test("GlyphTableFont reports its table family before and after the first metric query", () => {
  const fresh = GlyphTableFont.fromJSON({ family: "Test Sans", unitsPerEm: 1000, ascent: 800, descent: -200, glyphs: [] });
  const seen = [fresh.family];
  fresh.lineMetrics(20, {});
  seen.push(fresh.family);
  assert.deepEqual(seen, ["Test Sans", "Test Sans"]);
});

test("GlyphTableFont falls back to the constructor family when the table names none", () => {
  const table = { unitsPerEm: 1000, ascent: 800, descent: -200, glyphs: [] };
  const unnamed = new GlyphTableFont(new TextEncoder().encode(JSON.stringify(table)), "Fallback Serif");
  assert.equal(unnamed.family, "Fallback Serif");
});

test("reading the family of an unreadable font throws FontError", () => {
  const broken = new GlyphTableFont(new TextEncoder().encode("not a font"), "Broken");
  assert.throws(() => broken.family, { name: "FontError" });
});

test("a glyph table without unitsPerEm is rejected", () => {
  const missing = GlyphTableFont.fromJSON({ ascent: 800, descent: -200, glyphs: [] });
  assert.throws(() => missing.lineMetrics(12, {}), {
    name: "FontError",
    message: 'Failed to load font: "unitsPerEm" must be a finite number'
  });
});
