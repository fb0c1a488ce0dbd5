/**
 * Resolves bindable paths to handles after a program is linked.
 * Implemented by the graphics api binding (e.g. wrapping getUniformLocation).
 */
export interface HandleResolver {
  uniformLocation(path: string): number;
  attributeLocation(path: string): number;
}

/** handle returned for paths that weren't resolved */
export const noHandle = 0;

/** lookup table of resolved uniform and attribute handles by dotted path */
export class HandleTable {
  private uniforms = new Map<string, number>();
  private attributes = new Map<string, number>();

  /** resolve each path once, the first occurrence of a repeated path wins */
  static resolve(
    resolver: HandleResolver,
    uniformPaths: readonly string[],
    attributePaths: readonly string[]
  ): HandleTable {
    const table = new HandleTable();
    attributePaths.forEach((p) =>
      resolveOnce(table.attributes, p, () => resolver.attributeLocation(p))
    );
    uniformPaths.forEach((p) =>
      resolveOnce(table.uniforms, p, () => resolver.uniformLocation(p))
    );
    return table;
  }

  /** @return the handle for a uniform path, or 0 if the path is unknown */
  uniform(path: string): number {
    return this.uniforms.get(path) ?? noHandle;
  }

  /** @return the handle for an attribute path, or 0 if the path is unknown */
  attribute(path: string): number {
    return this.attributes.get(path) ?? noHandle;
  }

  uniformPaths(): string[] {
    return [...this.uniforms.keys()];
  }

  attributePaths(): string[] {
    return [...this.attributes.keys()];
  }
}

function resolveOnce(
  handles: Map<string, number>,
  path: string,
  resolve: () => number
): void {
  if (!handles.has(path)) {
    handles.set(path, resolve());
  }
}
