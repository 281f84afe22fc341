/**
 * Go Import Resolver
 *
 * With a module path, only imports under that module are local and the
 * module prefix is stripped. Without one, multi-segment paths outside the
 * well-known hosting domains are assumed local.
 */
import { joinRelative } from './paths.js';
import type { ImportResolver, ResolverOptions } from './types.js';

const EXTERNAL_DOMAINS = [
  'github.com/',
  'gitlab.com/',
  'bitbucket.org/',
  'golang.org/',
  'google.golang.org/',
  'gopkg.in/',
  'go.uber.org/',
  'cloud.google.com/',
  'k8s.io/',
];

export class GoResolver implements ImportResolver {
  readonly language = 'go';
  readonly extensions = ['.go'];
  readonly packageImports = true;
  private readonly modulePath: string | undefined;

  constructor(options: ResolverOptions = {}) {
    this.modulePath = options.goModulePath?.replace(/\/+$/, '');
  }

  extractImports(source: string): string[] {
    const imports = new Set<string>();

    // import "path"  /  import alias "path"
    for (const match of source.matchAll(/^import\s+(?:[\w.]+\s+)?"([^"]+)"/gm)) {
      imports.add(match[1]);
    }

    // import ( ... )
    for (const match of source.matchAll(/^import\s*\(([\s\S]*?)\)/gm)) {
      for (const line of match[1].matchAll(/^\s*(?:[\w.]+\s+)?"([^"]+)"/gm)) {
        imports.add(line[1]);
      }
    }

    return [...imports];
  }

  isLocalImport(specifier: string): boolean {
    if (specifier.startsWith('./') || specifier.startsWith('../')) {
      return true;
    }
    if (this.modulePath) {
      return specifier === this.modulePath || specifier.startsWith(`${this.modulePath}/`);
    }
    if (EXTERNAL_DOMAINS.some((d) => specifier.startsWith(d))) {
      return false;
    }
    // Single segment: standard library (fmt, os)
    return specifier.includes('/');
  }

  resolveImportPath(specifier: string, fromFile: string): string | null {
    if (!this.isLocalImport(specifier)) {
      return null;
    }
    if (specifier.startsWith('./') || specifier.startsWith('../')) {
      return joinRelative(fromFile, specifier);
    }
    if (this.modulePath) {
      return specifier.substring(this.modulePath.length).replace(/^\/+/, '');
    }
    return specifier;
  }

  getCandidatePaths(resolvedPath: string): string[] {
    if (resolvedPath.endsWith('.go')) {
      return [resolvedPath];
    }
    return [`${resolvedPath}.go`, resolvedPath];
  }
}

/**
 * Read the module path from go.mod contents.
 */
export function parseGoModulePath(goMod: string): string | undefined {
  const match = goMod.match(/^module\s+(\S+)/m);
  return match?.[1];
}
