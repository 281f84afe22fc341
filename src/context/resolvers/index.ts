/**
 * Resolver Registry
 *
 * Maps file extensions to language-specific import resolvers. A registry
 * is built per dependency-graph build, so a Go module path from one
 * project never leaks into another.
 */
import { GoResolver } from './go-resolver.js';
import { PythonResolver } from './python-resolver.js';
import { TypeScriptResolver } from './typescript-resolver.js';
import type { ImportResolver, ResolverOptions } from './types.js';

export type { ImportResolver, ResolverOptions } from './types.js';
export { TypeScriptResolver } from './typescript-resolver.js';
export { PythonResolver } from './python-resolver.js';
export { GoResolver, parseGoModulePath } from './go-resolver.js';

export class ResolverRegistry {
  private readonly byExtension = new Map<string, ImportResolver>();

  constructor(resolvers: readonly ImportResolver[]) {
    for (const resolver of resolvers) {
      for (const ext of resolver.extensions) {
        this.byExtension.set(ext, resolver);
      }
    }
  }

  /**
   * Resolver for a file based on its extension, or null.
   */
  forFile(filepath: string): ImportResolver | null {
    const dot = filepath.lastIndexOf('.');
    if (dot < 0) return null;
    return this.byExtension.get(filepath.substring(dot)) ?? null;
  }

  supportedExtensions(): string[] {
    return [...this.byExtension.keys()];
  }
}

export function createResolverRegistry(options: ResolverOptions = {}): ResolverRegistry {
  return new ResolverRegistry([
    new TypeScriptResolver(),
    new PythonResolver(),
    new GoResolver(options),
  ]);
}
