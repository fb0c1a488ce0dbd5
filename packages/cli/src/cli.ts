import fs from "fs";
import yargs from "yargs";
import {
  enableTracing,
  ShaderReflector,
  type ShaderReflection,
  type StructTable,
} from "glsl-reflect";

type CliArgs = ReturnType<typeof parseArgs>;
let argv: CliArgs;

/** run the cli
 * @return process exit code */
export function cli(rawArgs: string[]): number {
  argv = parseArgs(rawArgs);
  argv.trace && enableTracing();

  const reflected: [string, ShaderReflection][] = [];
  const files = argv._.map(String);
  for (const file of files) {
    const src = readSrc(file);
    if (src === undefined) return 1;
    reflected.push([file, reflectFile(src)]);
  }

  argv.json ? printJson(reflected) : printText(reflected);
  return 0;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function parseArgs(args: string[]) {
  return yargs(args)
    .usage("$0 <files...>\n\nlist uniform and attribute paths in glsl files")
    .demandCommand(1, "at least one glsl file is required")
    .option("uniforms", {
      type: "boolean",
      default: true,
      describe: "list uniform paths",
    })
    .option("attributes", {
      type: "boolean",
      default: true,
      describe: "list attribute paths",
    })
    .option("structs", {
      type: "boolean",
      default: false,
      describe: "list flattened struct fields",
    })
    .option("json", {
      type: "boolean",
      default: false,
      describe: "print results as json",
    })
    .option("builtin", {
      type: "string",
      array: true,
      describe: "additional builtin type names",
    })
    .option("fragment", {
      type: "string",
      array: true,
      describe: "additional builtin type name fragments (e.g. vec)",
    })
    .option("trace", {
      type: "boolean",
      default: false,
      hidden: true,
      describe: "trace scanning",
    })
    .help()
    .parseSync();
}

function readSrc(path: string): string | undefined {
  try {
    return fs.readFileSync(path, { encoding: "utf8" });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`unable to read ${path}:`, msg);
    return undefined;
  }
}

/** reflect each file separately, structs in one file aren't visible in another */
function reflectFile(src: string): ShaderReflection {
  const reflector = new ShaderReflector({
    builtins: argv.builtin,
    fragments: argv.fragment,
  });
  return reflector.addSource(src);
}

function printText(reflected: [string, ShaderReflection][]): void {
  const withHeader = reflected.length > 1;
  reflected.forEach(([file, { structs, uniforms, attributes }]) => {
    withHeader && console.log(`${file}:`);
    argv.structs && printStructs(structs);
    argv.uniforms && uniforms.forEach((u) => console.log(`uniform ${u}`));
    argv.attributes && attributes.forEach((a) => console.log(`attribute ${a}`));
  });
}

function printStructs(structs: StructTable): void {
  structs.forEach((fields, name) => {
    console.log(`struct ${name}:`, fields.join(" "));
  });
}

interface FileJson {
  structs?: Record<string, string[]>;
  uniforms?: string[];
  attributes?: string[];
}

function printJson(reflected: [string, ShaderReflection][]): void {
  const entries = reflected.map(([file, r]): [string, FileJson] => {
    const json: FileJson = {};
    if (argv.structs) json.structs = Object.fromEntries(r.structs);
    if (argv.uniforms) json.uniforms = r.uniforms;
    if (argv.attributes) json.attributes = r.attributes;
    return [file, json];
  });
  console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
}
