import test from "node:test";
import assert from "node:assert/strict";
import { Affine, circle } from "@vecscene/geometry";
import { DisplayListBackend } from "../src/backend/DisplayListBackend.js";
import { RGBA } from "../src/color.js";

const shape = circle({ x: 0, y: 0 }, 1);
const paint = { kind: "solid", color: RGBA.WHITE } as const;

test("DisplayListBackend records primitives in call order", () => {
  const backend = new DisplayListBackend();
  backend.pushLayer({
    mixMode: "normal",
    compositeMode: "sourceOver",
    alpha: 1,
    clip: shape,
    clipTransform: Affine.identity()
  });
  backend.fill({ fillRule: "evenOdd", shape, paint, transform: Affine.identity() });
  backend.popLayer();

  const list = backend.finish();
  assert.deepEqual(
    list.commands.map((command) => command.kind),
    ["pushLayer", "fill", "popLayer"]
  );
  assert.deepEqual(backend.finish().commands, []);
});

test("DisplayListBackend.append composes the outer transform above each command", () => {
  const source = new DisplayListBackend();
  source.fill({ fillRule: "nonZero", shape, paint, transform: Affine.scale(2) });
  const frame = source.finish();

  const target = new DisplayListBackend();
  target.append(frame, Affine.translate(10, 0));
  const [command] = target.finish().commands;
  assert.ok(command && command.kind === "fill");
  assert.deepEqual(Affine.coefficients(command.transform), [2, 0, 0, 2, 10, 0]);
  const [original] = frame.commands;
  assert.ok(original && original.kind === "fill");
  assert.deepEqual(Affine.coefficients(original.transform), [2, 0, 0, 2, 0, 0]);
});
