/**
 * ImportResolver interface
 *
 * Language-specific import extraction and resolution, used to derive
 * dependency edges from source contents.
 */
export interface ImportResolver {
  readonly language: string;
  readonly extensions: readonly string[];
  /**
   * True when an import names a package directory rather than a file, so a
   * directory candidate stands for every non-test file inside it.
   */
  readonly packageImports: boolean;
  extractImports(source: string): string[];
  isLocalImport(specifier: string): boolean;
  /** Project-relative base path for a local import, or null when external */
  resolveImportPath(specifier: string, fromFile: string): string | null;
  /** Candidate file paths for a resolved base path, most likely first */
  getCandidatePaths(resolvedPath: string): string[];
}

export interface ResolverOptions {
  /** Go module path from go.mod; imports under it are local */
  goModulePath?: string;
}
