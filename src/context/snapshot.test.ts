import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../lib/errors.js';
import { createFileRecord } from './file-record.js';
import { DependencyGraph } from './dependency-graph.js';
import { createSnapshot, fingerprintFiles, predictBudget } from './snapshot.js';

const files = [
  createFileRecord({ path: 'cmd/api/main.go', tokenCount: 300, lastModified: 0 }),
  createFileRecord({ path: 'internal/auth/auth.go', tokenCount: 800, lastModified: 0 }),
  createFileRecord({ path: 'internal/auth/auth_test.go', tokenCount: 500, lastModified: 0 }),
  createFileRecord({ path: 'config.yaml', tokenCount: 40, lastModified: 0 }),
  createFileRecord({ path: 'README.md', tokenCount: 200, lastModified: 0 }),
];

describe('createSnapshot', () => {
  const snapshot = createSnapshot({ root: 'shop', files });

  it('sorts files by path and sums tokens', () => {
    expect(snapshot.files.map((f) => f.path)).toEqual([
      'README.md',
      'cmd/api/main.go',
      'config.yaml',
      'internal/auth/auth.go',
      'internal/auth/auth_test.go',
    ]);
    expect(snapshot.totalTokens).toBe(1840);
  });

  it('counts languages', () => {
    expect(snapshot.languages).toEqual({ go: 3, yaml: 1, markdown: 1 });
  });

  it('summarizes structure', () => {
    expect(snapshot.summary).toEqual({
      entryPoints: ['cmd/api/main.go'],
      testFiles: ['internal/auth/auth_test.go'],
      configFiles: ['config.yaml'],
      docFiles: ['README.md'],
      coreDirectories: ['internal', 'cmd'],
      recommendOptimization: false,
    });
  });

  it('builds the dependency graph', () => {
    expect(snapshot.graph.edges()).toEqual([
      { from: 'internal/auth/auth_test.go', to: 'internal/auth/auth.go', type: 'test', strength: 0.5 },
    ]);
    expect(snapshot.diagnostics).toEqual([]);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.files)).toBe(true);
  });

  it('accepts explicit edges', () => {
    const withEdges = createSnapshot({
      root: 'shop',
      files,
      edges: [{ from: 'cmd/api/main.go', to: 'internal/auth/auth.go', type: 'import', strength: 1 }],
    });
    expect(withEdges.graph.node('internal/auth/auth.go')?.dependents).toEqual(['cmd/api/main.go']);
  });

  it('rejects duplicate paths', () => {
    expect(() => createSnapshot({ root: 'shop', files: [files[0], files[0]] })).toThrow(ConfigurationError);
  });

  it('accepts a prebuilt graph over the same files', () => {
    const graph = new DependencyGraph(files.map((f) => f.path));
    expect(createSnapshot({ root: 'shop', files, graph }).graph).toBe(graph);
  });

  it('rejects a prebuilt graph whose nodes differ from the files', () => {
    const graph = new DependencyGraph(['cmd/api/main.go', 'internal/auth/auth.go', 'vendor/lib.go'], [
      { from: 'cmd/api/main.go', to: 'vendor/lib.go', type: 'import', strength: 1 },
    ]);
    expect(() => createSnapshot({ root: 'shop', files: files.slice(0, 2), graph })).toThrow(
      'Invalid dependency graph: node vendor/lib.go is not a snapshot file'
    );
    expect(() => createSnapshot({ root: 'shop', files, graph })).toThrow(
      'Invalid dependency graph: node vendor/lib.go is not a snapshot file; ' +
        'file internal/auth/auth_test.go has no graph node; file config.yaml has no graph node; ' +
        'file README.md has no graph node'
    );
  });

  it('skips corrupt token counts in the total', () => {
    const corrupt = createFileRecord({ path: 'broken.go', tokenCount: Number.NaN, lastModified: 0 });
    expect(createSnapshot({ root: 'x', files: [files[0], corrupt] }).totalTokens).toBe(300);
  });
});

describe('fingerprintFiles', () => {
  it('ignores order', () => {
    expect(fingerprintFiles([...files].reverse())).toBe(fingerprintFiles(files));
  });

  it('changes when a file changes', () => {
    const touched = files.map((f) =>
      f.path === 'README.md' ? createFileRecord({ path: 'README.md', tokenCount: 200, lastModified: 5 }) : f
    );
    expect(fingerprintFiles(touched)).not.toBe(fingerprintFiles(files));
  });

  it('changes when a file is classified differently', () => {
    const retagged = files.map((f) =>
      f.path === 'config.yaml'
        ? createFileRecord({ path: 'config.yaml', tokenCount: 40, lastModified: 0, kind: 'doc' })
        : f
    );
    expect(fingerprintFiles(retagged)).not.toBe(fingerprintFiles(files));
  });

  it('changes with the dependency edges', () => {
    const toAuth = createSnapshot({
      root: 'shop',
      files,
      edges: [{ from: 'cmd/api/main.go', to: 'internal/auth/auth.go', type: 'import', strength: 1 }],
    });
    const toConfig = createSnapshot({
      root: 'shop',
      files,
      edges: [{ from: 'cmd/api/main.go', to: 'config.yaml', type: 'import', strength: 1 }],
    });
    expect(toAuth.fingerprint).not.toBe(toConfig.fingerprint);
    expect(toAuth.fingerprint).not.toBe(createSnapshot({ root: 'shop', files }).fingerprint);
  });
});

describe('predictBudget', () => {
  it('scales with project size', () => {
    expect(predictBudget(createSnapshot({ root: 'x', files }))).toBe(4000);

    const medium = [createFileRecord({ path: 'big.go', tokenCount: 60_000, lastModified: 0 })];
    expect(predictBudget(createSnapshot({ root: 'x', files: medium }))).toBe(8000);

    const large = [createFileRecord({ path: 'huge.go', tokenCount: 250_000, lastModified: 0 })];
    const snapshot = createSnapshot({ root: 'x', files: large });
    expect(predictBudget(snapshot)).toBe(12000);
    expect(snapshot.summary.recommendOptimization).toBe(true);
  });
});
