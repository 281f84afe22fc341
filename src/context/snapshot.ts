/**
 * Project Snapshot
 *
 * The static view of a project the engine selects from: file records, their
 * aggregates, a structural summary and the dependency graph. Snapshots are
 * frozen once created and may be shared between concurrent selections.
 */

import { ConfigurationError, type PartialAnalysisFailure } from '../lib/errors.js';
import { fingerprintParts } from '../lib/fingerprint.js';
import { DependencyGraph, buildDependencyGraph, type DependencyEdge } from './dependency-graph.js';
import { matchesPatterns } from './file-classifier.js';
import type { FileRecord } from './types.js';

const ENTRY_POINT_PATTERNS = [
  '**/main.go',
  'cmd/**/*.go',
  '**/index.ts',
  '**/main.ts',
  '**/__main__.py',
  '**/main.py',
  '**/app.py',
  '**/main.rs',
];

/** Projects above this many tokens should always be selected from, never sent whole */
export const LARGE_PROJECT_TOKENS = 100_000;

export interface StructuralSummary {
  readonly entryPoints: readonly string[];
  readonly testFiles: readonly string[];
  readonly configFiles: readonly string[];
  readonly docFiles: readonly string[];
  /** Top-level directories holding source files, largest first */
  readonly coreDirectories: readonly string[];
  readonly recommendOptimization: boolean;
}

export interface ProjectSnapshot {
  readonly root: string;
  /** Files sorted by path */
  readonly files: readonly FileRecord[];
  readonly totalTokens: number;
  /** File count per language tag */
  readonly languages: Readonly<Record<string, number>>;
  readonly graph: DependencyGraph;
  readonly summary: StructuralSummary;
  readonly fingerprint: string;
  readonly diagnostics: readonly PartialAnalysisFailure[];
}

export interface SnapshotInput {
  root: string;
  files: readonly FileRecord[];
  /** File contents by path, used only to derive dependency edges */
  sources?: ReadonlyMap<string, string>;
  /** A prebuilt graph, or explicit edges, from the analyzer collaborator */
  graph?: DependencyGraph;
  edges?: readonly DependencyEdge[];
  goModulePath?: string;
}

function comparePaths(a: FileRecord, b: FileRecord): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

function summarize(files: readonly FileRecord[], totalTokens: number): StructuralSummary {
  const sourceTokensByDir = new Map<string, number>();
  for (const file of files) {
    if (file.kind !== 'source') continue;
    const slash = file.path.indexOf('/');
    if (slash < 0) continue;
    const top = file.path.substring(0, slash);
    sourceTokensByDir.set(top, (sourceTokensByDir.get(top) ?? 0) + file.tokenCount);
  }

  const coreDirectories = [...sourceTokensByDir.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1))
    .map(([dir]) => dir);

  return Object.freeze({
    entryPoints: Object.freeze(
      files.filter((f) => f.kind === 'source' && matchesPatterns(f.path, ENTRY_POINT_PATTERNS)).map((f) => f.path)
    ),
    testFiles: Object.freeze(files.filter((f) => f.kind === 'test').map((f) => f.path)),
    configFiles: Object.freeze(files.filter((f) => f.kind === 'config').map((f) => f.path)),
    docFiles: Object.freeze(files.filter((f) => f.kind === 'doc').map((f) => f.path)),
    coreDirectories: Object.freeze(coreDirectories),
    recommendOptimization: totalTokens > LARGE_PROJECT_TOKENS,
  });
}

/**
 * Stable hash over every file's path, size, token count, timestamp, kind and
 * language, plus the dependency edges. Selections differ whenever any of
 * these differ, so each is part of the cache key.
 */
export function fingerprintFiles(files: readonly FileRecord[], edges: readonly DependencyEdge[] = []): string {
  const sorted = [...files].sort(comparePaths);
  const sortedEdges = [...edges].sort(
    (a, b) => (a.from < b.from ? -1 : a.from > b.from ? 1 : a.to < b.to ? -1 : a.to > b.to ? 1 : 0)
  );
  return fingerprintParts([
    ...sorted.map((f) => `${f.path}|${f.size}|${f.tokenCount}|${f.lastModified}|${f.kind}|${f.language}`),
    ...sortedEdges.map((e) => `${e.from}>${e.to}|${e.type}|${e.strength}`),
  ]);
}

function checkGraphNodes(graph: DependencyGraph, paths: ReadonlySet<string>): void {
  const problems: string[] = [];
  for (const path of graph.paths()) {
    if (!paths.has(path)) problems.push(`node ${path} is not a snapshot file`);
  }
  for (const path of paths) {
    if (!graph.has(path)) problems.push(`file ${path} has no graph node`);
  }
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid dependency graph', problems);
  }
}

/**
 * Assemble a snapshot from analyzer output.
 *
 * @throws ConfigurationError on duplicate paths or an invalid graph
 */
export function createSnapshot(input: SnapshotInput): ProjectSnapshot {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const file of input.files) {
    if (seen.has(file.path)) duplicates.push(file.path);
    seen.add(file.path);
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError('Duplicate file paths in snapshot', duplicates);
  }

  const files = Object.freeze([...input.files].sort(comparePaths));

  let graph: DependencyGraph;
  let diagnostics: PartialAnalysisFailure[] = [];
  if (input.graph) {
    checkGraphNodes(input.graph, seen);
    graph = input.graph;
  } else if (input.edges) {
    graph = new DependencyGraph(seen, input.edges);
  } else {
    const built = buildDependencyGraph(files, { sources: input.sources, goModulePath: input.goModulePath });
    graph = built.graph;
    diagnostics = built.failures;
  }

  let totalTokens = 0;
  const languages: Record<string, number> = {};
  for (const file of files) {
    if (Number.isFinite(file.tokenCount) && file.tokenCount > 0) {
      totalTokens += file.tokenCount;
    }
    languages[file.language] = (languages[file.language] ?? 0) + 1;
  }

  return Object.freeze({
    root: input.root,
    files,
    totalTokens,
    languages: Object.freeze(languages),
    graph,
    summary: summarize(files, totalTokens),
    fingerprint: fingerprintFiles(files, graph.edges()),
    diagnostics: Object.freeze(diagnostics),
  });
}

/**
 * Suggested token budget for a task against a project of this size.
 */
export function predictBudget(snapshot: ProjectSnapshot): number {
  if (snapshot.totalTokens > 200_000) return 12_000;
  if (snapshot.totalTokens < 50_000) return 4_000;
  return 8_000;
}
