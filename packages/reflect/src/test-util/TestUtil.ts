import { expect } from "vitest";
import { _withBaseLogger } from "../ScanLogging.js";
import { logCatch } from "./LogCatcher.js";

/** run a test function and expect that no error logs are produced */
export function expectNoLogErr<T>(fn: () => T): T {
  const { log, logged } = logCatch();
  const result = _withBaseLogger(log, fn);
  expect(logged()).eq("");
  return result;
}

/** run a function with a capturing logger
 * @return the function result and the captured log text */
export function withLogCatch<T>(fn: () => T): { result: T; logged: string } {
  const { log, logged } = logCatch();
  const result = _withBaseLogger(log, fn);
  return { result, logged: logged() };
}
