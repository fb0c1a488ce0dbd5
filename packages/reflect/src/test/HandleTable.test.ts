import { expect, test } from "vitest";
import { HandleTable } from "../HandleTable.js";
import { recordingResolver } from "./TestResolver.js";

test("resolve uniforms and attributes", () => {
  const resolver = recordingResolver();
  const table = HandleTable.resolve(resolver, ["mvp", "light.color"], ["pos"]);
  expect(resolver.calls).toEqual([
    "attribute pos",
    "uniform mvp",
    "uniform light.color",
  ]);
  expect(table.attribute("pos")).eq(1);
  expect(table.uniform("mvp")).eq(2);
  expect(table.uniform("light.color")).eq(3);
});

test("unknown paths return 0", () => {
  const table = HandleTable.resolve(recordingResolver(), ["mvp"], []);
  expect(table.uniform("missing")).eq(0);
  expect(table.attribute("mvp")).eq(0);
});

test("repeated paths resolve once", () => {
  const resolver = recordingResolver();
  const table = HandleTable.resolve(resolver, ["mvp", "color", "mvp"], []);
  expect(resolver.calls).toEqual(["uniform mvp", "uniform color"]);
  expect(table.uniformPaths()).toEqual(["mvp", "color"]);
  expect(table.uniform("mvp")).eq(1);
});
