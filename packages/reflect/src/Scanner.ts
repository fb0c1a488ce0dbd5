/* Cursor functions over glsl source text.
 * Each takes the src and a starting position and returns the advanced position. */

/** ascii whitespace only, unicode spaces (e.g. U+00A0) are token characters */
const ws = /[ \t\n\v\f\r]/;

/** characters that end a token (in addition to whitespace) */
const delimiters = new Set([";", "{", "}", ",", "/", "["]);

/** paired brackets tracked while skipping initializer expressions */
const opens = new Set(["(", "[", "{"]);
const closes = new Set([")", "]", "}"]);

export function isWs(c: string): boolean {
  return ws.test(c);
}

/** @return position of the first char that isn't whitespace or inside a comment */
export function skipWsComments(src: string, pos: number): number {
  const len = src.length;
  let p = pos;
  for (;;) {
    while (p < len && isWs(src[p])) p++;

    if (src.startsWith("//", p)) {
      p += 2;
      while (p < len && src[p] !== "\n" && src[p] !== "\r") p++;
    } else if (src.startsWith("/*", p)) {
      const end = src.indexOf("*/", p + 2);
      p = end === -1 ? len : end + 2;
    } else {
      return p;
    }
  }
}

/** read a token, stopping at whitespace or a delimiter (which is not consumed)
 * @return the token text (empty if src[pos] is a delimiter) and the position after the token
 */
export function nextToken(src: string, pos: number): [string, number] {
  const len = src.length;
  let p = pos;
  while (p < len && !isWs(src[p]) && !delimiters.has(src[p])) p++;
  return [src.slice(pos, p), p];
}

/**
 * Find the next token that matches a keyword exactly.
 * Comments are skipped, and keywords embedded in longer identifiers don't match.
 * @return the position just after the keyword, or undefined if not found
 */
export function findKeyword(
  src: string,
  keyword: string,
  pos: number
): number | undefined {
  let p = pos;
  for (;;) {
    p = skipWsComments(src, p);
    if (p >= src.length) return undefined;

    const [token, end] = nextToken(src, p);
    if (token === keyword) return end;
    p = end === p ? p + 1 : end; // step over a lone delimiter
  }
}

/** skip a single [...] group if one starts at pos (nested brackets are not tracked) */
export function skipArray(src: string, pos: number): number {
  if (src[pos] !== "[") return pos;
  const close = src.indexOf("]", pos + 1);
  return close === -1 ? src.length : close + 1;
}

/** @return the position after the next occurrence of char, or the end of the src */
export function skipPast(src: string, pos: number, char: string): number {
  const found = src.indexOf(char, pos);
  return found === -1 ? src.length : found + 1;
}

/** skip an initializer expression, e.g. vec2(1.0, 2.0)
 * @return position of the ',' or ';' that ends the expression, or the end of the src
 */
export function skipInitializer(src: string, pos: number): number {
  const len = src.length;
  let depth = 0;
  let p = pos;
  while (p < len) {
    if (src.startsWith("//", p) || src.startsWith("/*", p)) {
      p = skipWsComments(src, p); // brackets and commas in comments don't count
      continue;
    }
    const c = src[p];
    if (opens.has(c)) {
      depth++;
    } else if (closes.has(c)) {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && (c === "," || c === ";")) {
      break;
    }
    p++;
  }
  return p;
}
