import type { BuiltinTypes } from "./BuiltinTypes.js";
import { nextToken, skipArray, skipWsComments } from "./Scanner.js";
import type { StructTable } from "./StructTable.js";

/** the resolved type of a declaration */
export type DeclType = BuiltinDecl | StructDecl;

export interface BuiltinDecl {
  kind: "builtin";
  name: string;
}

export interface StructDecl {
  kind: "struct";
  name: string;

  /** flattened field paths of the struct */
  paths: string[];
}

/** @return the declared type, or undefined if it's neither builtin nor a known struct */
export function resolveType(
  typeName: string,
  types: BuiltinTypes,
  structs: StructTable
): DeclType | undefined {
  if (types.isBuiltin(typeName)) {
    return { kind: "builtin", name: typeName };
  }
  const paths = structs.get(typeName);
  if (paths) {
    return { kind: "struct", name: typeName, paths };
  }
}

/** @return paths for a variable: the bare name for builtins, name.field for each struct field */
export function memberPaths(varName: string, declType: DeclType): string[] {
  if (declType.kind === "builtin") return [varName];
  return declType.paths.map((p) => `${varName}.${p}`);
}

/**
 * Read a type name, skipping any leading precision qualifiers (highp float)
 * and a trailing array size (float[4]).
 * @return the type name and the position after it
 */
export function typeToken(
  src: string,
  pos: number,
  types: BuiltinTypes
): [string, number] {
  let [typeName, end] = nextToken(src, pos);
  while (typeName && types.isPrecision(typeName)) {
    [typeName, end] = nextToken(src, skipWsComments(src, end));
  }
  if (typeName) {
    const afterWs = skipWsComments(src, end);
    const afterArray = skipArray(src, afterWs);
    if (afterArray !== afterWs) end = afterArray;
  }
  return [typeName, end];
}
