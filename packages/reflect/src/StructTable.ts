import type { BuiltinTypes } from "./BuiltinTypes.js";
import { type DeclType, memberPaths, resolveType, typeToken } from "./DeclTypes.js";
import { findKeyword, nextToken, skipArray, skipWsComments } from "./Scanner.js";
import { scanTrace, srcLog } from "./ScanLogging.js";

/** struct names mapped to the flattened paths of their fields, in declaration order */
export type StructTable = Map<string, string[]>;

/**
 * Collect the struct definitions in a glsl src.
 *
 * Fields typed by an earlier struct are flattened into dotted paths, so
 * the table holds leaf paths only:
 *   struct Inner { float a; };
 *   struct Outer { Inner f; float e; };
 * produces Outer: ["f.a", "e"].
 *
 * Structs are resolved in src order. A field typed by a struct
 * defined later in the src is not flattened.
 * If a struct name is defined twice, the first definition is kept.
 */
export function buildStructTable(src: string, types: BuiltinTypes): StructTable {
  const structs: StructTable = new Map();
  let pos = findKeyword(src, "struct", 0);
  while (pos !== undefined) {
    const next = parseStruct(src, pos, types, structs);
    pos = findKeyword(src, "struct", next);
  }
  return structs;
}

/** parse a struct starting after the 'struct' keyword, adding it to the table if complete
 * @return position to continue searching for structs
 */
function parseStruct(
  src: string,
  start: number,
  types: BuiltinTypes,
  structs: StructTable
): number {
  const nameStart = skipWsComments(src, start);
  const [name, afterName] = nextToken(src, nameStart);
  const open = skipWsComments(src, afterName);
  if (!name || src[open] !== "{") {
    srcLog(src, open, `struct ${name}: expected '{'`);
    return afterName;
  }

  const fields: string[] = [];
  let listType: DeclType | undefined; // type carried to the next name in a comma list
  let pos = open + 1;
  for (;;) {
    pos = skipWsComments(src, pos);
    if (pos >= src.length) break;
    if (src[pos] === "}") {
      if (!structs.has(name)) structs.set(name, fields);
      scanTrace(`struct ${name}:`, fields.join(" "));
      return pos + 1;
    }

    const fieldStart = pos;
    let declType = listType;
    let varName: string;
    if (declType) {
      [varName, pos] = nextToken(src, pos);
    } else {
      const [typeName, afterType] = typeToken(src, pos, types);
      declType = resolveType(typeName, types, structs);
      if (declType) {
        [varName, pos] = nextToken(src, skipWsComments(src, afterType));
      } else {
        varName = typeName; // unresolved type, the token stands in as the field name
        pos = afterType;
      }
    }
    if (varName) {
      const paths = declType ? memberPaths(varName, declType) : [varName];
      fields.push(...paths);
    }

    pos = skipArray(src, skipWsComments(src, pos));
    pos = skipWsComments(src, pos);
    listType = undefined;
    if (src[pos] === ",") {
      listType = declType;
      pos++;
    } else if (src[pos] === ";") {
      pos++;
    } else if (pos === fieldStart) {
      pos++; // stray delimiter
    }
  }

  srcLog(src, nameStart, `struct ${name}: missing '}'`);
  return src.length;
}
