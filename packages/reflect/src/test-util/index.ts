export * from "./LogCatcher.js";
export * from "./TestUtil.js";
