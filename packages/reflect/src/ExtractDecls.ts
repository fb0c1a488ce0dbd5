import type { BuiltinTypes } from "./BuiltinTypes.js";
import { type DeclType, memberPaths, resolveType, typeToken } from "./DeclTypes.js";
import {
  findKeyword,
  nextToken,
  skipArray,
  skipInitializer,
  skipPast,
  skipWsComments,
} from "./Scanner.js";
import { scanTrace, srcLog } from "./ScanLogging.js";
import type { StructTable } from "./StructTable.js";

/** glsl qualifiers that mark externally bindable variables */
export type QualifierKeyword = "uniform" | "attribute";

/**
 * Find the declarations marked by a qualifier keyword and append
 * the bindable path of each variable to results.
 *
 *   uniform float a, b[4];  =>  a, b
 *   uniform Light light;    =>  light.color, light.pos (for struct Light { vec3 color; vec3 pos; })
 *
 * Declarations with a type that is neither builtin nor in the struct table are skipped.
 *
 * @return results
 */
export function extractDecls(
  keyword: QualifierKeyword,
  src: string,
  results: string[],
  types: BuiltinTypes,
  structs: StructTable
): string[] {
  let pos = findKeyword(src, keyword, 0);
  while (pos !== undefined) {
    const next = parseDecl(keyword, src, pos, results, types, structs);
    pos = findKeyword(src, keyword, next);
  }
  return results;
}

/** parse one declaration following the keyword
 * @return position to continue searching for keywords
 */
function parseDecl(
  keyword: QualifierKeyword,
  src: string,
  start: number,
  results: string[],
  types: BuiltinTypes,
  structs: StructTable
): number {
  const typeStart = skipWsComments(src, start);
  const [typeName, afterType] = typeToken(src, typeStart, types);
  const declType = resolveType(typeName, types, structs);
  if (!declType) {
    srcLog(src, typeStart, `${keyword} '${typeName}': unknown type, skipping`);
    return skipPast(src, afterType, ";");
  }

  const end = varNames(keyword, src, afterType, declType, results);
  return src[end] === ";" ? end + 1 : end;
}

/** append paths for each variable name in a comma separated list
 * @return position of the terminating ';', or where parsing stopped
 */
function varNames(
  keyword: QualifierKeyword,
  src: string,
  start: number,
  declType: DeclType,
  results: string[]
): number {
  let pos = start;
  for (;;) {
    pos = skipWsComments(src, pos);
    if (pos >= src.length || src[pos] === ";") return pos;

    const [name, afterName] = nextToken(src, pos);
    if (name) {
      const paths = memberPaths(name, declType);
      scanTrace(`${keyword} ${declType.name}:`, paths.join(" "));
      results.push(...paths);
    }

    pos = skipArray(src, skipWsComments(src, afterName));
    pos = skipWsComments(src, pos);
    if (src[pos] === "=") {
      pos = skipInitializer(src, pos + 1);
    }
    if (src[pos] !== ",") return pos;
    pos++;
  }
}
