import test from "node:test";
import assert from "node:assert/strict";
import { nextId, uuid } from "../src/index.js";

test("uuid() returns a v4 formatted string", () => {
  assert.match(uuid(), /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
});

test("uuid() does not repeat", () => {
  assert.notEqual(uuid(), uuid());
});

test("nextId() keeps the prefix and never repeats", () => {
  const a = nextId("scene");
  const b = nextId("scene");
  assert.match(a, /^scene-\d+$/);
  assert.notEqual(a, b);
});
