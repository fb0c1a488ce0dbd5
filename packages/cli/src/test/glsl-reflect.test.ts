import { withLogCatch } from "glsl-reflect/test-util";
import { fileURLToPath } from "url";
import { expect, test, vi } from "vitest";
import { cli } from "../cli.js";

const lightVert = fixture("light.vert");
const toneFrag = fixture("tone.frag");

const lightPaths = [
  "uniform mvp",
  "uniform light.position",
  "uniform light.material.diffuse",
  "uniform light.material.shininess",
  "attribute position",
  "attribute uv",
];

test("list uniforms and attributes", () => {
  const { code, lines } = cliLines([lightVert]);
  expect(code).eq(0);
  expect(lines).toEqual(lightPaths);
});

test("list structs without attributes", () => {
  const { lines } = cliLines([lightVert, "--structs", "--no-attributes"]);
  expect(lines).toEqual([
    "struct Material: diffuse shininess",
    "struct Light: position material.diffuse material.shininess",
    "uniform mvp",
    "uniform light.position",
    "uniform light.material.diffuse",
    "uniform light.material.shininess",
  ]);
});

test("two files with a registered builtin", () => {
  const { lines } = cliLines([lightVert, toneFrag, "--builtin", "Handle"]);
  expect(lines).toEqual([
    `${lightVert}:`,
    ...lightPaths,
    `${toneFrag}:`,
    "uniform tex",
    "uniform exposure",
    "uniform lut",
  ]);
});

test("unknown type is reported and skipped", () => {
  const { result, logged } = withLogCatch(() => cliLines([toneFrag]));
  expect(result.lines).toEqual(["uniform tex", "uniform exposure"]);
  expect(logged.split("\n")[0]).eq("uniform 'Handle': unknown type, skipping");
});

test("json output", () => {
  const { lines } = cliLines([lightVert, "--json"]);
  const json: unknown = JSON.parse(lines.join("\n"));
  expect(json).toEqual({
    [lightVert]: {
      uniforms: [
        "mvp",
        "light.position",
        "light.material.diffuse",
        "light.material.shininess",
      ],
      attributes: ["position", "uv"],
    },
  });
});

test("unreadable file", () => {
  const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  try {
    const { code, lines } = cliLines(["./no-such-shader.vert"]);
    expect(code).eq(1);
    expect(lines).toEqual([]);
    expect(errSpy.mock.calls[0][0]).eq("unable to read ./no-such-shader.vert:");
  } finally {
    errSpy.mockRestore();
  }
});

interface CliResult {
  code: number;
  lines: string[];
}

function cliLines(args: string[]): CliResult {
  const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  try {
    const code = cli(args);
    const lines = consoleSpy.mock.calls.map((params) => params.join(" "));
    return { code, lines };
  } finally {
    consoleSpy.mockRestore();
  }
}

function fixture(name: string): string {
  return fileURLToPath(new URL(`./glsl/${name}`, import.meta.url));
}
