export * from "./BuiltinTypes.js";
export * from "./DeclTypes.js";
export * from "./ExtractDecls.js";
export * from "./HandleTable.js";
export * from "./Scanner.js";
export * from "./ScanLogging.js";
export * from "./ShaderReflector.js";
export * from "./StructTable.js";
