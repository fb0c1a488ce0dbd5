import { expect, test } from "vitest";
import { BuiltinTypes } from "../BuiltinTypes.js";

test("exact builtin types", () => {
  const types = new BuiltinTypes();
  expect(types.isBuiltin("float")).true;
  expect(types.isBuiltin("atomic_uint")).true;
  expect(types.isBuiltin("floaty")).false;
  expect(types.isBuiltin("Light")).false;
});

test("fragment builtin types", () => {
  const types = new BuiltinTypes();
  expect(types.isBuiltin("ivec3")).true;
  expect(types.isBuiltin("dmat4x3")).true;
  expect(types.isBuiltin("sampler2DShadow")).true;
  expect(types.isBuiltin("uimage2D")).true;
});

test("register types", () => {
  const types = new BuiltinTypes();
  types.register("Light");
  types.register("buf", true);
  expect(types.isBuiltin("Light")).true;
  expect(types.isBuiltin("mybuffer")).true;
});

test("reset drops registered types", () => {
  const types = new BuiltinTypes({ builtins: ["Light"] });
  expect(types.isBuiltin("Light")).true;
  types.reset();
  expect(types.isBuiltin("Light")).false;
  expect(types.isBuiltin("float")).true;
});

test("precision qualifiers", () => {
  const types = new BuiltinTypes({ precisions: ["precise"] });
  expect(types.isPrecision("highp")).true;
  expect(types.isPrecision("precise")).true;
  expect(types.isPrecision("float")).false;
});
