import { describe, it, expect } from 'vitest';
import { ConfigurationError } from './errors.js';
import { parseSnapshotDocument, snapshotFromDocument } from './snapshot-schema.js';

describe('parseSnapshotDocument', () => {
  it('applies defaults', () => {
    const document = parseSnapshotDocument({
      files: [{ path: 'a.ts', tokenCount: 10, lastModified: 0 }],
      edges: [{ from: 'a.ts', to: 'b.ts' }],
    });
    expect(document.root).toBe('.');
    expect(document.edges).toEqual([{ from: 'a.ts', to: 'b.ts', type: 'import' }]);
  });

  it('requires a token count or content per file', () => {
    expect(() => parseSnapshotDocument({ files: [{ path: 'a.ts', lastModified: 0 }] })).toThrow(
      'Invalid snapshot document: files.0.tokenCount: tokenCount or content is required'
    );
  });

  it('rejects values that are not documents', () => {
    expect(() => parseSnapshotDocument('nope')).toThrow(ConfigurationError);
    expect(() => parseSnapshotDocument({ files: [{ path: 'a.ts', tokenCount: 1, lastModified: 0, kind: 'binary' }] }))
      .toThrow(/files\.0\.kind/);
  });
});

describe('snapshotFromDocument', () => {
  it('builds records and counts tokens from content', () => {
    const snapshot = snapshotFromDocument({
      root: 'web',
      files: [
        { path: './src/b.ts', content: 'export const x = 1;', lastModified: '2026-01-01T00:00:00Z' },
        { path: 'src/a.ts', tokenCount: 40, lastModified: 1000, metadata: { owner: 'core' } },
      ],
    });

    expect(snapshot.root).toBe('web');
    expect(snapshot.files.map((f) => [f.path, f.tokenCount, f.size, f.language])).toEqual([
      ['src/a.ts', 40, 0, 'typescript'],
      ['src/b.ts', 6, 19, 'typescript'],
    ]);
    expect(snapshot.files[1].lastModified).toBe(Date.UTC(2026, 0, 1));
    expect(snapshot.totalTokens).toBe(46);
  });

  it('derives edges from file contents', () => {
    const snapshot = snapshotFromDocument({
      files: [
        { path: 'src/index.ts', content: "import { run } from './run.js';\n", lastModified: 0 },
        { path: 'src/run.ts', tokenCount: 50, lastModified: 0 },
      ],
    });
    expect(snapshot.graph.edges().map((e) => `${e.from}>${e.to}`)).toEqual(['src/index.ts>src/run.ts']);
  });

  it('uses explicit edges with default strengths', () => {
    const snapshot = snapshotFromDocument({
      files: [
        { path: 'a.go', tokenCount: 10, lastModified: 0 },
        { path: 'a_test.go', tokenCount: 10, lastModified: 0 },
      ],
      edges: [{ from: './a_test.go', to: 'a.go', type: 'test' }],
    });
    expect(snapshot.graph.edges()).toEqual([{ from: 'a_test.go', to: 'a.go', type: 'test', strength: 0.5 }]);
  });

  it('rejects edges to unknown files', () => {
    expect(() =>
      snapshotFromDocument({
        files: [{ path: 'a.go', tokenCount: 10, lastModified: 0 }],
        edges: [{ from: 'a.go', to: 'missing.go' }],
      })
    ).toThrow('Invalid dependency graph: edge a.go -> missing.go references a missing node');
  });
});
