import test from "node:test";
import assert from "node:assert/strict";
import {
  centeredRectangle,
  circle,
  rectangle,
  roundedRectangle,
  shapeBounds,
  shapeContains
} from "../src/shapes.js";

test("centeredRectangle spans width and height around the center", () => {
  const r = centeredRectangle({ x: 10, y: 20 }, 40, 10);
  assert.deepEqual(r, { kind: "rectangle", a: { x: -10, y: 15 }, b: { x: 30, y: 25 } });
});

test("shapeBounds normalizes rectangle corners", () => {
  const r = rectangle({ x: 5, y: 9 }, { x: -5, y: 1 });
  assert.deepEqual(shapeBounds(r), { minX: -5, minY: 1, maxX: 5, maxY: 9 });
});

test("shapeBounds of a circle", () => {
  assert.deepEqual(shapeBounds(circle({ x: 1, y: 2 }, 3)), { minX: -2, minY: -1, maxX: 4, maxY: 5 });
});

test("shapeContains: circle edge and outside", () => {
  const c = circle({ x: 0, y: 0 }, 5);
  assert.equal(shapeContains(c, { x: 3, y: 4 }), true);
  assert.equal(shapeContains(c, { x: 4, y: 4 }), false);
});

test("shapeContains: rounded rectangle cuts its corners", () => {
  const r = roundedRectangle({ x: 0, y: 0 }, { x: 10, y: 10 }, 4);
  assert.equal(shapeContains(r, { x: 5, y: 5 }), true);
  assert.equal(shapeContains(r, { x: 0.5, y: 0.5 }), false);
  assert.equal(shapeContains(r, { x: 0, y: 5 }), true);
  assert.equal(shapeContains(r, { x: 11, y: 5 }), false);
});
