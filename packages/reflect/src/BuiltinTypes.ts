/** scalar type names, matched exactly */
export const stdBuiltins = [
  "int",
  "uint",
  "bool",
  "float",
  "double",
  "atomic_uint",
] as const;

/** type name fragments, matched anywhere in a type name (e.g. vec matches ivec3, dmat4x3) */
export const stdFragments = ["vec", "mat", "image", "sampler"] as const;

/** precision qualifiers that may precede a type name */
export const stdPrecisions = ["lowp", "mediump", "highp"] as const;

export interface BuiltinTypesParams {
  /** additional exact match type names */
  builtins?: string[];

  /** additional type name fragments */
  fragments?: string[];

  /** additional qualifier words to skip before a type name */
  precisions?: string[];
}

/**
 * Registry of the glsl types that need no struct lookup.
 *
 * Scalar types are recognized by exact name. Vector, matrix, image and sampler
 * families carry size and precision suffixes, so they're recognized by a name fragment.
 */
export class BuiltinTypes {
  private exact: string[] = [];
  private fragments: string[] = [];
  private precisions: string[] = [];

  constructor(params: BuiltinTypesParams = {}) {
    this.reset();
    const { builtins = [], fragments = [], precisions = [] } = params;
    builtins.forEach((b) => this.register(b));
    fragments.forEach((f) => this.register(f, true));
    precisions.forEach((p) => this.registerPrecision(p));
  }

  /** add a type name, or a type name fragment if fragment is true */
  register(name: string, fragment = false): void {
    fragment ? this.fragments.push(name) : this.exact.push(name);
  }

  registerPrecision(word: string): void {
    this.precisions.push(word);
  }

  /** restore the standard glsl types, dropping any registered types */
  reset(): void {
    this.exact = [...stdBuiltins];
    this.fragments = [...stdFragments];
    this.precisions = [...stdPrecisions];
  }

  isBuiltin(typeName: string): boolean {
    return (
      this.exact.includes(typeName) ||
      this.fragments.some((f) => typeName.includes(f))
    );
  }

  isPrecision(word: string): boolean {
    return this.precisions.includes(word);
  }
}
