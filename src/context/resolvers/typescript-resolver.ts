/**
 * TypeScript/JavaScript Import Resolver
 */
import { joinRelative, normalizePath } from './paths.js';
import type { ImportResolver } from './types.js';

const IMPORT_PATTERNS = [
  /import\s+(?:[\s\S]*?)\s+from\s+['"]([^'"]+)['"]/g,
  /import\s+['"]([^'"]+)['"]/g,
  /import\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  /require\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  /export\s+(?:[\s\S]*?)\s+from\s+['"]([^'"]+)['"]/g,
];

const CODE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

/** Emitted-file suffixes that point back at a TypeScript source */
const EMITTED_SUFFIX = /\.(?:js|jsx|mjs|cjs)$/;

const PROJECT_ROOTS = ['src/', 'lib/', 'app/'];

export class TypeScriptResolver implements ImportResolver {
  readonly language = 'typescript';
  readonly extensions = CODE_EXTENSIONS;
  readonly packageImports = false;

  extractImports(source: string): string[] {
    const imports = new Set<string>();
    for (const pattern of IMPORT_PATTERNS) {
      for (const match of source.matchAll(pattern)) {
        imports.add(match[1]);
      }
    }
    return [...imports];
  }

  isLocalImport(specifier: string): boolean {
    if (specifier.startsWith('.') || specifier.startsWith('/')) {
      return true;
    }
    return PROJECT_ROOTS.some((root) => specifier.startsWith(root));
  }

  resolveImportPath(specifier: string, fromFile: string): string | null {
    if (!this.isLocalImport(specifier)) {
      return null;
    }
    const resolved = specifier.startsWith('.')
      ? joinRelative(fromFile, specifier)
      : normalizePath(specifier);
    return resolved.replace(EMITTED_SUFFIX, '');
  }

  getCandidatePaths(resolvedPath: string): string[] {
    if (CODE_EXTENSIONS.some((ext) => resolvedPath.endsWith(ext))) {
      return [resolvedPath];
    }
    const direct = ['.ts', '.tsx', '.js', '.jsx'].map((ext) => `${resolvedPath}${ext}`);
    const index = ['.ts', '.tsx', '.js', '.jsx'].map((ext) => `${resolvedPath}/index${ext}`);
    return [...direct, ...index];
  }
}
