/**
 * Dependency Graph
 *
 * Import/reference graph over a snapshot's files. Built in full from a file
 * set and never patched; the same files and sources always produce the
 * same graph. Every edge endpoint is a node.
 */

import { ConfigurationError, PartialAnalysisFailure, describeError } from '../lib/errors.js';
import { isTestPath, normalizeFilePath } from './file-classifier.js';
import { createResolverRegistry, parseGoModulePath, type ImportResolver, type ResolverRegistry } from './resolvers/index.js';
import { dirname } from './resolvers/paths.js';
import type { FileRecord } from './types.js';

export type DependencyEdgeType = 'import' | 'test';

export interface DependencyEdge {
  readonly from: string;
  readonly to: string;
  readonly type: DependencyEdgeType;
  /** Weight in [0,1] */
  readonly strength: number;
}

export interface DependencyNode {
  readonly path: string;
  /** Paths this file depends on */
  readonly imports: readonly string[];
  /** Paths that depend on this file */
  readonly dependents: readonly string[];
}

export const EDGE_STRENGTH: Readonly<Record<DependencyEdgeType, number>> = {
  import: 1.0,
  test: 0.5,
};

export interface TransitiveDependency {
  path: string;
  /** The file whose edge pulled this one in */
  via: string;
  depth: number;
}

function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  if (a.from !== b.from) return a.from < b.from ? -1 : 1;
  if (a.to !== b.to) return a.to < b.to ? -1 : 1;
  return 0;
}

/** Strongest first, then path order */
function byStrength(key: 'from' | 'to') {
  return (a: DependencyEdge, b: DependencyEdge): number => {
    if (a.strength !== b.strength) return b.strength - a.strength;
    return a[key] < b[key] ? -1 : a[key] > b[key] ? 1 : 0;
  };
}

export class DependencyGraph {
  private readonly nodes = new Map<string, DependencyNode>();
  private readonly edgeList: readonly DependencyEdge[];
  private readonly outgoing = new Map<string, DependencyEdge[]>();
  private readonly incoming = new Map<string, DependencyEdge[]>();

  /**
   * @throws ConfigurationError when an edge names a path that is not a node
   * or carries a strength outside [0,1]
   */
  constructor(paths: Iterable<string>, edges: Iterable<DependencyEdge> = []) {
    const sortedPaths = [...new Set(paths)].sort();
    const known = new Set(sortedPaths);

    // Keep the strongest edge per (from, to); drop self edges
    const strongest = new Map<string, DependencyEdge>();
    const problems: string[] = [];
    for (const edge of edges) {
      if (!known.has(edge.from) || !known.has(edge.to)) {
        problems.push(`edge ${edge.from} -> ${edge.to} references a missing node`);
        continue;
      }
      if (!(edge.strength >= 0 && edge.strength <= 1)) {
        problems.push(`edge ${edge.from} -> ${edge.to} has strength ${edge.strength}`);
        continue;
      }
      if (edge.from === edge.to) continue;

      const key = `${edge.from}\u0000${edge.to}`;
      const existing = strongest.get(key);
      if (!existing || edge.strength > existing.strength) {
        strongest.set(key, Object.freeze({ ...edge }));
      }
    }
    if (problems.length > 0) {
      throw new ConfigurationError('Invalid dependency graph', problems);
    }

    this.edgeList = Object.freeze([...strongest.values()].sort(compareEdges));

    for (const path of sortedPaths) {
      this.outgoing.set(path, []);
      this.incoming.set(path, []);
    }
    for (const edge of this.edgeList) {
      this.outgoing.get(edge.from)?.push(edge);
      this.incoming.get(edge.to)?.push(edge);
    }
    for (const path of sortedPaths) {
      const out = (this.outgoing.get(path) ?? []).sort(byStrength('to'));
      const inc = (this.incoming.get(path) ?? []).sort(byStrength('from'));
      this.nodes.set(path, Object.freeze({
        path,
        imports: Object.freeze(out.map((e) => e.to)),
        dependents: Object.freeze(inc.map((e) => e.from)),
      }));
    }
  }

  static empty(paths: Iterable<string> = []): DependencyGraph {
    return new DependencyGraph(paths);
  }

  get size(): number {
    return this.nodes.size;
  }

  has(path: string): boolean {
    return this.nodes.has(path);
  }

  node(path: string): DependencyNode | undefined {
    return this.nodes.get(path);
  }

  paths(): string[] {
    return [...this.nodes.keys()];
  }

  edges(): readonly DependencyEdge[] {
    return this.edgeList;
  }

  /** Outgoing edges, strongest first */
  dependenciesOf(path: string): readonly DependencyEdge[] {
    return this.outgoing.get(path) ?? [];
  }

  /** Incoming edges, strongest first */
  dependentsOf(path: string): readonly DependencyEdge[] {
    return this.incoming.get(path) ?? [];
  }

  /**
   * Strongest edge weight between two files in either direction, 0 if none.
   */
  strengthBetween(a: string, b: string): number {
    let best = 0;
    for (const edge of this.dependenciesOf(a)) {
      if (edge.to === b) best = Math.max(best, edge.strength);
    }
    for (const edge of this.dependentsOf(a)) {
      if (edge.from === b) best = Math.max(best, edge.strength);
    }
    return best;
  }

  /**
   * Strength-weighted degree centrality. Being depended upon counts twice as
   * much as depending on others. 0 for unknown paths and single-node graphs.
   */
  centrality(path: string): number {
    if (!this.nodes.has(path) || this.nodes.size <= 1) return 0;

    const inWeight = this.dependentsOf(path).reduce((sum, e) => sum + e.strength, 0);
    const outWeight = this.dependenciesOf(path).reduce((sum, e) => sum + e.strength, 0);
    return Math.min(1, (inWeight * 2 + outWeight) / (3 * (this.nodes.size - 1)));
  }

  /**
   * Breadth-first walk of outgoing edges up to `depth` levels, excluding the
   * start file. Each file is reported once, at its shallowest depth.
   */
  collectDependencies(path: string, depth: number): TransitiveDependency[] {
    const result: TransitiveDependency[] = [];
    const seen = new Set([path]);
    let frontier = [path];

    for (let level = 1; level <= depth && frontier.length > 0; level++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const edge of this.dependenciesOf(current)) {
          if (seen.has(edge.to)) continue;
          seen.add(edge.to);
          result.push({ path: edge.to, via: current, depth: level });
          next.push(edge.to);
        }
      }
      frontier = next;
    }

    return result;
  }
}

// --- Builder ---

export interface GraphBuildOptions {
  /** File contents by path, for import extraction */
  sources?: ReadonlyMap<string, string>;
  /** Go module path; read from a go.mod source when omitted */
  goModulePath?: string;
}

export interface GraphBuildResult {
  graph: DependencyGraph;
  failures: PartialAnalysisFailure[];
}

/**
 * Subject file a test file exercises, by naming convention.
 */
export function testSubjectCandidates(path: string): string[] {
  const candidates: string[] = [];

  const goTest = path.match(/^(.*)_test\.go$/);
  if (goTest) candidates.push(`${goTest[1]}.go`);

  const jsTest = path.match(/^(.*)\.(?:test|spec)\.(\w+)$/);
  if (jsTest) {
    candidates.push(`${jsTest[1]}.${jsTest[2]}`);
    if (jsTest[1].includes('/__tests__/')) {
      candidates.push(`${jsTest[1].replace('/__tests__/', '/')}.${jsTest[2]}`);
    }
  }

  const pyPrefix = path.match(/^(.*\/)?test_(\w+)\.py$/);
  if (pyPrefix) {
    const dir = pyPrefix[1] ?? '';
    candidates.push(`${dir}${pyPrefix[2]}.py`);
    if (dir.endsWith('tests/')) {
      candidates.push(`${dir.slice(0, -'tests/'.length)}${pyPrefix[2]}.py`);
    }
  }

  const pySuffix = path.match(/^(.*)_test\.py$/);
  if (pySuffix) candidates.push(`${pySuffix[1]}.py`);

  return candidates;
}

function readMetadataImports(file: FileRecord): string[] {
  const declared = file.metadata['imports'];
  if (declared === undefined) return [];
  if (!Array.isArray(declared) || !declared.every((entry): entry is string => typeof entry === 'string')) {
    throw new Error('metadata.imports must be an array of strings');
  }
  return declared;
}

class EdgeCollector {
  private readonly packageFiles = new Map<string, string[]>();

  constructor(
    private readonly known: ReadonlySet<string>,
    private readonly registry: ResolverRegistry
  ) {
    for (const path of known) {
      if (isTestPath(path)) continue;
      const dir = dirname(path);
      const files = this.packageFiles.get(dir) ?? [];
      files.push(path);
      this.packageFiles.set(dir, files);
    }
  }

  /**
   * Targets for one import specifier from one file.
   */
  resolve(resolver: ImportResolver, specifier: string, fromFile: string): string[] {
    const resolved = resolver.resolveImportPath(specifier, fromFile);
    if (resolved === null) return [];

    const candidates = resolver.getCandidatePaths(resolved);
    const direct = candidates.find((candidate) => this.known.has(candidate));
    if (direct) return [direct];

    if (resolver.packageImports) {
      for (const candidate of candidates) {
        const files = (this.packageFiles.get(candidate) ?? []).filter((p) =>
          resolver.extensions.some((ext) => p.endsWith(ext))
        );
        if (files.length > 0) return files;
      }
    }
    return [];
  }

  collect(file: FileRecord, source: string | undefined): DependencyEdge[] {
    const edges: DependencyEdge[] = [];
    const addImport = (to: string) => {
      edges.push({ from: file.path, to, type: 'import', strength: EDGE_STRENGTH.import });
    };

    const resolver = this.registry.forFile(file.path);

    for (const declared of readMetadataImports(file)) {
      const path = normalizeFilePath(declared);
      if (this.known.has(path)) {
        addImport(path);
      } else if (resolver) {
        this.resolve(resolver, declared, file.path).forEach(addImport);
      }
    }

    if (source !== undefined && resolver) {
      for (const specifier of resolver.extractImports(source)) {
        this.resolve(resolver, specifier, file.path).forEach(addImport);
      }
    }

    const subject = testSubjectCandidates(file.path).find((candidate) => this.known.has(candidate));
    if (subject) {
      edges.push({ from: file.path, to: subject, type: 'test', strength: EDGE_STRENGTH.test });
    }

    return edges;
  }
}

/**
 * Build the dependency graph for a file set.
 *
 * A file whose relationships cannot be derived becomes an isolated node and
 * is reported in `failures`; every other file is processed normally.
 */
export function buildDependencyGraph(
  files: readonly FileRecord[],
  options: GraphBuildOptions = {}
): GraphBuildResult {
  const known = new Set(files.map((f) => f.path));
  const goMod = options.sources?.get('go.mod');
  const goModulePath = options.goModulePath ?? (goMod !== undefined ? parseGoModulePath(goMod) : undefined);
  const collector = new EdgeCollector(known, createResolverRegistry({ goModulePath }));

  const edges: DependencyEdge[] = [];
  const failures: PartialAnalysisFailure[] = [];
  const isolated = new Set<string>();

  const ordered = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of ordered) {
    try {
      edges.push(...collector.collect(file, options.sources?.get(file.path)));
    } catch (error) {
      isolated.add(file.path);
      failures.push(new PartialAnalysisFailure(file.path, 'dependency', describeError(error)));
    }
  }

  const kept = edges.filter((e) => !isolated.has(e.from) && !isolated.has(e.to));
  return { graph: new DependencyGraph(known, kept), failures };
}
