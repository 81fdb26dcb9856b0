import test from "node:test";
import assert from "node:assert/strict";
import { Affine, roundedRectangle } from "@vecscene/geometry";
import { Brush, Gradient, createImage } from "../src/brushes.js";
import {
  decodeAffine,
  decodeBrush,
  decodeColor,
  decodeGradient,
  decodeShape,
  decodeStyle,
  encodeAffine,
  encodeBrush,
  encodeGradient,
  encodeShape,
  encodeStyle
} from "../src/codec/valueCodec.js";
import { RGBA } from "../src/color.js";
import { CodecError } from "../src/errors.js";
import { fill, stroke } from "../src/styles.js";

const throughJson = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

test("gradients survive a JSON round trip with stop order intact", () => {
  const gradient: Gradient = {
    extend: "reflect",
    kind: Gradient.radial({ x: 1, y: 2 }, 0, { x: 1, y: 2 }, 30),
    stops: [
      { offset: 0.7, color: RGBA.RED },
      { offset: 0.2, color: RGBA.create(0, 0, 1, 0.5) }
    ]
  };
  const decoded = decodeGradient(throughJson(encodeGradient(gradient)));
  assert.deepEqual(decoded, gradient);
  assert.deepEqual(
    decoded.stops.map((stop) => stop.offset),
    [0.7, 0.2]
  );
});

test("styles survive a JSON round trip", () => {
  const dashed = stroke(3, { join: "bevel", dashPattern: [[4, 2, 1, 2]], dashOffset: 1 });
  assert.deepEqual(decodeStyle(throughJson(encodeStyle(dashed))), dashed);
  assert.deepEqual(decodeStyle(throughJson(encodeStyle(fill("evenOdd")))), fill("evenOdd"));
});

test("shapes and transforms survive a JSON round trip", () => {
  const shape = roundedRectangle({ x: -5, y: -5 }, { x: 5, y: 5 }, 2);
  assert.deepEqual(decodeShape(throughJson(encodeShape(shape))), shape);

  const m = Affine.fromCoefficients([2, 0, 0, 2, 5, 6]);
  assert.deepEqual(encodeAffine(m), [2, 0, 0, 2, 5, 6]);
  assert.ok(Affine.equals(decodeAffine(throughJson(encodeAffine(m))), m));
});

test("solid and gradient brushes survive a JSON round trip", () => {
  const solid = Brush.solid(RGBA.create(0.25, 0.5, 0.75, 1));
  assert.deepEqual(decodeBrush(throughJson(encodeBrush(solid))), solid);

  const gradient = Brush.gradient(
    Gradient.newEquidistant("pad", Gradient.sweep({ x: 0, y: 0 }, 0, Math.PI), [RGBA.RED, RGBA.GREEN, RGBA.BLUE])
  );
  assert.deepEqual(decodeBrush(throughJson(encodeBrush(gradient))), gradient);
});

test("texture brushes cannot be encoded", () => {
  const image = createImage(new Uint8Array(4), 1, 1);
  assert.throws(() => encodeBrush(Brush.texture(image)), CodecError);
});

test("decoding reports the path of the first bad field", () => {
  const badStop = {
    extend: "pad",
    kind: { kind: "linear", start: { x: 0, y: 0 }, end: { x: 1, y: 0 } },
    stops: [{ offset: "half", color: [0, 0, 0, 1] }]
  };
  assert.throws(() => decodeGradient(badStop), {
    name: "CodecError",
    message: "gradient.stops[0].offset: expected a finite number"
  });

  assert.throws(() => decodeGradient({ ...badStop, stops: [], extend: "mirror" }), {
    name: "CodecError",
    message: "gradient.extend: expected one of pad, repeat, reflect"
  });

  assert.throws(() => decodeColor([1, 0, 0]), {
    name: "CodecError",
    message: "color: expected an array of 4 numbers"
  });
});
