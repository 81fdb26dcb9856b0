import test from "node:test";
import assert from "node:assert/strict";
import { Topics, createEventBus } from "@vecscene/event-bus";
import { Affine } from "@vecscene/geometry";
import { GlyphTableFont, RGBA, createImage } from "@vecscene/scene-core";
import { GAUSSIAN_COLORS, SINE_GRATING_COLORS, buildFrame, type FrameInput } from "../src/frame.js";

// Only notdef glyphs: every character advances 30 at size 100, line height 100.
const font = GlyphTableFont.fromJSON({
  family: "Test Sans",
  unitsPerEm: 1000,
  ascent: 800,
  descent: -200,
  notdefAdvance: 300,
  glyphs: [{ char: "A", advance: 500 }]
});
const image = createImage(new Uint8Array(64 * 64 * 4), 64, 64);

function input(overrides: Partial<FrameInput> = {}): FrameInput {
  return { width: 200, height: 100, tick: 3, font, image, fitMode: "fill", masked: true, ...overrides };
}

test("grating and mask ramps span the sine and gaussian curves", () => {
  assert.equal(SINE_GRATING_COLORS.length, 256);
  assert.equal(SINE_GRATING_COLORS[0]?.r, 0);
  assert.equal(SINE_GRATING_COLORS[128]?.r, 1);
  assert.equal(GAUSSIAN_COLORS[0]?.a, 1);
  assert.equal(GAUSSIAN_COLORS[0]?.r, 1);
});

test("masked frame draws the grating inside an alpha-mask layer pair", () => {
  const list = buildFrame(input());
  assert.deepEqual(
    list.commands.map((command) => command.kind),
    ["pushLayer", "fill", "pushLayer", "fill", "popLayer", "popLayer", "fill", "glyphs", "fill"]
  );

  const [content, grating, mask] = list.commands;
  assert.ok(content && content.kind === "pushLayer");
  assert.equal(content.mixMode, "normal");
  assert.deepEqual(Affine.coefficients(content.clipTransform), [1, 0, 0, 1, 100, 50]);
  assert.ok(mask && mask.kind === "pushLayer");
  assert.deepEqual([mask.mixMode, mask.compositeMode], ["multiply", "sourceIn"]);

  assert.ok(grating && grating.kind === "fill" && grating.paint.kind === "gradient");
  assert.equal(grating.paint.gradient.extend, "repeat");
  assert.ok(grating.brushTransform);
  assert.deepEqual(Affine.coefficients(grating.brushTransform), [1, 0, 0, 1, 3, 0]);
});

test("frames are drawn over a blue background", () => {
  assert.equal(buildFrame(input()).background, RGBA.BLUE);
});

test("unmasked frame draws the grating directly", () => {
  const list = buildFrame(input({ masked: false }));
  assert.deepEqual(
    list.commands.map((command) => command.kind),
    ["fill", "fill", "glyphs", "fill"]
  );
});

test("text is centred on the scene origin", () => {
  const glyphs = buildFrame(input({ masked: false })).commands[2];
  assert.ok(glyphs && glyphs.kind === "glyphs");
  assert.equal(glyphs.glyphs.length, 8);
  assert.deepEqual(glyphs.variations, { wght: 100 });
  assert.deepEqual(glyphs.paint, { kind: "solid", color: RGBA.YELLOW });
  // width 240, height 100: offset (-120, +50) under the centre origin
  assert.deepEqual(Affine.coefficients(glyphs.transform), [1, 0, 0, 1, -20, 100]);
});

test("image brush follows the selected fit mode", () => {
  const brushOf = (fitMode: FrameInput["fitMode"]) => {
    const command = buildFrame(input({ masked: false, fitMode })).commands[3];
    assert.ok(command && command.kind === "fill" && command.paint.kind === "image");
    return command.brushTransform ? Affine.coefficients(command.brushTransform) : undefined;
  };

  assert.deepEqual(brushOf("fill"), [7.8125, 0, 0, 7.8125, -50, -50]);
  assert.deepEqual(brushOf("exact"), [2, 0, 0, 2, -50, -50]);
  assert.equal(brushOf("original"), undefined);
});

test("frames report to the bus", () => {
  const bus = createEventBus();
  const ends: number[] = [];
  bus.subscribe(Topics.SCENE_FRAME_END, (payload) => ends.push(payload.drawCount));
  buildFrame(input({ bus }));
  assert.deepEqual(ends, [5]);
});
