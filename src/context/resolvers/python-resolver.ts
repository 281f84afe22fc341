/**
 * Python Import Resolver
 */
import { dirname, normalizePath } from './paths.js';
import type { ImportResolver } from './types.js';

export class PythonResolver implements ImportResolver {
  readonly language = 'python';
  readonly extensions = ['.py'];
  readonly packageImports = false;

  extractImports(source: string): string[] {
    const imports = new Set<string>();

    // from x.y import a  /  from ..x import a
    for (const match of source.matchAll(/^\s*from\s+(\.+[\w.]*|[\w.]+)\s+import\s/gm)) {
      imports.add(match[1]);
    }

    // import x.y, z as w
    for (const match of source.matchAll(/^\s*import\s+([\w.]+(?:\s+as\s+\w+)?(?:\s*,\s*[\w.]+(?:\s+as\s+\w+)?)*)/gm)) {
      for (const part of match[1].split(',')) {
        const module = part.trim().split(/\s+as\s+/)[0];
        if (module) imports.add(module);
      }
    }

    return [...imports];
  }

  isLocalImport(specifier: string): boolean {
    if (specifier.startsWith('.')) {
      return true;
    }
    // Single names are stdlib or third-party (os, requests)
    return specifier.includes('.');
  }

  resolveImportPath(specifier: string, fromFile: string): string | null {
    if (!this.isLocalImport(specifier)) {
      return null;
    }

    if (!specifier.startsWith('.')) {
      return specifier.split('.').join('/');
    }

    const dotMatch = specifier.match(/^(\.+)(.*)$/);
    if (!dotMatch) return null;

    // One dot is the current package; each extra dot climbs one level
    let base = dirname(fromFile);
    for (let level = 1; level < dotMatch[1].length; level++) {
      base = dirname(base);
    }

    const rest = dotMatch[2];
    if (!rest) {
      return base || null;
    }
    return normalizePath(`${base}/${rest.split('.').join('/')}`);
  }

  getCandidatePaths(resolvedPath: string): string[] {
    if (resolvedPath.endsWith('.py')) {
      return [resolvedPath];
    }
    return [`${resolvedPath}.py`, `${resolvedPath}/__init__.py`];
  }
}
