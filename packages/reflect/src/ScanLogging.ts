export let tracing = false;

/** enable trace logging of scanner activity */
export function enableTracing(enable = true): void {
  tracing = enable;
}

/** base logger. (can be overriden to a capturing logger for tests) */
export let logger: typeof console.log = console.log;

/** log a trace message, but only if tracing is enabled */
export function scanTrace(...msgs: unknown[]): void {
  if (tracing) {
    logger(...msgs);
  }
}

/** use temporary logger for tests */
export function _withBaseLogger<T>(logFn: typeof console.log, fn: () => T): T {
  const orig = logger;
  try {
    logger = logFn;
    return fn();
  } finally {
    logger = orig;
  }
}

/** log a message along with the source line and a caret indicating the position in the line */
export function srcLog(src: string, pos: number, ...msgs: unknown[]): void {
  logger(...msgs);
  const { line, lineNum, linePos } = srcLine(src, pos);
  logger(line, `  Ln ${lineNum}`);
  logger(" ".repeat(linePos) + "^");
}

export interface SrcLine {
  /** src line w/o newline */
  line: string;

  /** requested position relative to line start */
  linePos: number;

  /** line number in the src (first line is #1) */
  lineNum: number;
}

/** return the line in the src containing a given character postion */
export function srcLine(src: string, pos: number): SrcLine {
  const starts = getStarts(src);

  let start = 0;
  let end = starts.length - 1;

  // short circuit search if pos is after last line start
  if (pos >= starts[end]) {
    start = end;
  }

  // binary search to find start,end positions that surround provided pos
  while (start + 1 < end) {
    const mid = (start + end) >> 1;
    if (pos >= starts[mid]) {
      start = mid;
    } else {
      end = mid;
    }
  }

  // get line with possible trailing newline
  const lineNl = src.slice(starts[start], starts[start + 1] ?? src.length);

  // return line without trailing newline (or \r\n)
  const line = lineNl.replace(/\r?\n$/, "");

  return { line, linePos: pos - starts[start], lineNum: start + 1 };
}

/** return an array of the character positions of the start of each line in the src.
 * (not cached, srcs are only scanned for lines when logging) */
function getStarts(src: string): number[] {
  const starts = [...src.matchAll(/\n/g)].map((m) => (m.index ?? 0) + 1);
  starts.unshift(0);
  return starts;
}
