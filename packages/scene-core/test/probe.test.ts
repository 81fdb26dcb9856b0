import test from "node:test";
import assert from "node:assert/strict";
import { Affine, circle, rectangle } from "@vecscene/geometry";
import { Brush, Gradient, createImage, type Extend } from "../src/brushes.js";
import { RGBA } from "../src/color.js";
import { compositePixel, probeDisplayList } from "../src/debug/probe.js";
import { Geom } from "../src/geom.js";
import { Scene } from "../src/scene/Scene.js";

const center = { x: 50, y: 50 };
const disc = (color: RGBA) => new Geom({ shape: circle(center, 40), brush: Brush.solid(color) });

function maskedScene(mask: RGBA) {
  const scene = Scene.create(RGBA.BLUE, 100, 100, { origin: "top-left" });
  scene.drawAlphaMask(
    (s) => s.draw(disc(RGBA.RED)),
    (s) => s.draw(disc(mask)),
    circle(center, 45)
  );
  return scene.finish();
}

test("an opaque mask shows the content", () => {
  const list = maskedScene(RGBA.WHITE);
  assert.deepEqual(probeDisplayList(list, center, { background: RGBA.BLUE }), RGBA.RED);
});

test("a transparent mask hides the content", () => {
  const list = maskedScene(RGBA.TRANSPARENT);
  assert.deepEqual(probeDisplayList(list, center, { background: RGBA.BLUE }), RGBA.BLUE);
});

test("a half-transparent mask blends the content over the backdrop", () => {
  const list = maskedScene(RGBA.withAlpha(RGBA.WHITE, 0.5));
  assert.deepEqual(probeDisplayList(list, center, { background: RGBA.BLUE }), RGBA.create(0.5, 0, 0.5, 1));
});

test("outside the mask's coverage the backdrop shows through", () => {
  const list = maskedScene(RGBA.WHITE);
  assert.deepEqual(probeDisplayList(list, { x: 50, y: 7 }, { background: RGBA.BLUE }), RGBA.BLUE);
});

test("layer alpha scales the layer as it is composited", () => {
  const scene = Scene.create(RGBA.BLACK, 100, 100, { origin: "top-left" });
  scene.startLayer({ mixMode: "normal", compositeMode: "sourceOver", clip: circle(center, 45), alpha: 0.5 });
  scene.draw(disc(RGBA.WHITE));
  scene.endLayer();
  const list = scene.finish();
  assert.deepEqual(probeDisplayList(list, center, { background: RGBA.BLACK }), RGBA.gray(0.5));
});

test("layer content outside the clip is discarded", () => {
  const scene = Scene.create(RGBA.BLACK, 100, 100, { origin: "top-left" });
  scene.startLayer({ mixMode: "normal", compositeMode: "sourceOver", clip: circle({ x: 0, y: 0 }, 10) });
  scene.draw(disc(RGBA.WHITE));
  scene.endLayer();
  const list = scene.finish();
  assert.deepEqual(probeDisplayList(list, center, { background: RGBA.BLACK }), RGBA.BLACK);
});

function gradientBar(extend: Extend, brushTransform?: Affine) {
  const scene = Scene.create(RGBA.BLACK, 100, 10, { origin: "top-left" });
  const gradient = Gradient.newEquidistant(extend, Gradient.linear({ x: 0, y: 0 }, { x: 100, y: 0 }), [
    RGBA.BLACK,
    RGBA.WHITE
  ]);
  scene.draw(
    new Geom({ shape: rectangle({ x: 0, y: 0 }, { x: 100, y: 10 }), brush: Brush.gradient(gradient), brushTransform })
  );
  return scene.finish();
}

test("linear gradients interpolate between stops", () => {
  assert.deepEqual(probeDisplayList(gradientBar("pad"), { x: 25, y: 5 }), RGBA.gray(0.25));
});

test("the brush transform moves the gradient without moving the shape", () => {
  const shifted = Affine.translate(50, 0);
  assert.deepEqual(probeDisplayList(gradientBar("pad", shifted), { x: 25, y: 5 }), RGBA.BLACK);
  assert.deepEqual(probeDisplayList(gradientBar("repeat", shifted), { x: 25, y: 5 }), RGBA.gray(0.75));
});

test("an image under fill covers the rectangle corner to corner", () => {
  const image = createImage(
    new Uint8Array([
      255, 0, 0, 255,
      0, 255, 0, 255,
      0, 0, 255, 255,
      255, 255, 255, 255
    ]),
    2,
    2
  );
  const scene = Scene.create(RGBA.BLACK, 100, 100, { origin: "top-left" });
  scene.draw(Geom.image(image, 0, 0, 100, 100));
  const list = scene.finish();

  assert.deepEqual(probeDisplayList(list, { x: -25, y: -25 }), RGBA.RED);
  assert.deepEqual(probeDisplayList(list, { x: 25, y: -25 }), RGBA.GREEN);
  assert.deepEqual(probeDisplayList(list, { x: -25, y: 25 }), RGBA.BLUE);
  assert.deepEqual(probeDisplayList(list, { x: 25, y: 25 }), RGBA.WHITE);
  assert.deepEqual(probeDisplayList(list, { x: 75, y: 0 }), RGBA.TRANSPARENT);
});

test("compositePixel multiplies colors under the multiply mix", () => {
  const backdrop = { r: 0.5, g: 1, b: 1, a: 1 };
  assert.deepEqual(compositePixel(backdrop, RGBA.create(1, 0.5, 0, 1), "multiply", "sourceOver"), {
    r: 0.5,
    g: 0.5,
    b: 0,
    a: 1
  });
});

test("compositePixel follows Porter-Duff for the non-default operators", () => {
  const backdrop = { r: 0, g: 0, b: 1, a: 1 };
  assert.deepEqual(compositePixel(backdrop, RGBA.RED, "normal", "destinationOver"), backdrop);
  assert.deepEqual(compositePixel(backdrop, RGBA.RED, "normal", "copy"), { r: 1, g: 0, b: 0, a: 1 });
  assert.deepEqual(compositePixel(backdrop, RGBA.RED, "normal", "xor"), { r: 0, g: 0, b: 0, a: 0 });
  assert.deepEqual(compositePixel(backdrop, RGBA.RED, "normal", "destinationOut"), { r: 0, g: 0, b: 0, a: 0 });
});
