import { BuiltinTypes, type BuiltinTypesParams } from "./BuiltinTypes.js";
import { extractDecls } from "./ExtractDecls.js";
import { HandleTable, type HandleResolver } from "./HandleTable.js";
import { buildStructTable, type StructTable } from "./StructTable.js";

/** bindable variables found in one glsl src */
export interface ShaderReflection {
  structs: StructTable;
  uniforms: string[];
  attributes: string[];
}

/** find the struct definitions, uniforms and attributes in a glsl src */
export function reflectShader(
  src: string,
  types: BuiltinTypes = new BuiltinTypes()
): ShaderReflection {
  const structs = buildStructTable(src, types);
  const uniforms = extractDecls("uniform", src, [], types, structs);
  const attributes = extractDecls("attribute", src, [], types, structs);
  return { structs, uniforms, attributes };
}

/**
 * Collects the uniform and attribute paths from the shader stages of a program,
 * and resolves them to handles once the program is linked.
 *
 * @example
 *   const reflector = new ShaderReflector();
 *   reflector.addSource(vertexSrc);
 *   reflector.addSource(fragmentSrc);
 *   // ... compile and link
 *   const handles = reflector.finalize(resolver);
 *   handles.uniform("light.other.color");
 */
export class ShaderReflector {
  readonly types: BuiltinTypes;
  private uniforms: string[] = [];
  private attributes: string[] = [];
  private sourceCount = 0;

  constructor(params?: BuiltinTypesParams) {
    this.types = new BuiltinTypes(params);
  }

  /** add the bindable paths from one shader stage to the pending lists */
  addSource(src: string): ShaderReflection {
    const reflection = reflectShader(src, this.types);
    this.uniforms.push(...reflection.uniforms);
    this.attributes.push(...reflection.attributes);
    this.sourceCount++;
    return reflection;
  }

  get pendingUniforms(): readonly string[] {
    return this.uniforms;
  }

  get pendingAttributes(): readonly string[] {
    return this.attributes;
  }

  /** resolve the pending paths to handles and clear the pending lists */
  finalize(resolver: HandleResolver): HandleTable {
    if (this.sourceCount === 0) {
      throw new Error("finalize(): no shader sources added");
    }
    const table = HandleTable.resolve(resolver, this.uniforms, this.attributes);
    this.reset();
    return table;
  }

  /** drop pending paths */
  reset(): void {
    this.uniforms = [];
    this.attributes = [];
    this.sourceCount = 0;
  }
}
