import test from "node:test";
import assert from "node:assert/strict";
import { RGBA } from "../src/color.js";

test("RGBA.fromHex reads short, long and alpha forms", () => {
  assert.deepEqual(RGBA.fromHex("#f00"), RGBA.create(1, 0, 0, 1));
  assert.deepEqual(RGBA.fromHex("#0000ff"), RGBA.create(0, 0, 1, 1));
  assert.deepEqual(RGBA.fromHex("#ffffff00"), RGBA.create(1, 1, 1, 0));
  assert.throws(() => RGBA.fromHex("red"), /Invalid hex color/);
});

test("RGBA.toCss clamps channels to bytes", () => {
  assert.equal(RGBA.toCss(RGBA.create(1, 0.5, 0, 0.25)), "rgba(255, 128, 0, 0.25)");
  assert.equal(RGBA.toCss(RGBA.create(2, -1, 0, 3)), "rgba(255, 0, 0, 1)");
});

test("RGBA.lerp interpolates every channel", () => {
  assert.deepEqual(RGBA.lerp(RGBA.BLACK, RGBA.create(1, 1, 1, 0), 0.25), RGBA.create(0.25, 0.25, 0.25, 0.75));
});
