import { describe, it, expect, vi } from 'vitest';
import { createConstraints } from '../context/constraints.js';
import { createFileRecord } from '../context/file-record.js';
import { selectedPaths } from '../context/selection.js';
import { createTask } from '../context/task.js';
import { ConfigurationError } from '../lib/errors.js';
import { createContextEngine, type EngineConfig } from './context-engine.js';

const NOW = Date.UTC(2026, 0, 15);

const files = [
  createFileRecord({ path: 'auth.go', tokenCount: 400, lastModified: NOW }),
  createFileRecord({ path: 'auth_test.go', tokenCount: 300, lastModified: NOW }),
  createFileRecord({ path: 'README.md', tokenCount: 200, lastModified: NOW }),
];

const featureTask = createTask({ type: 'feature', description: 'add auth middleware', keywords: ['auth'] });
const tight = createConstraints({ maxTokens: 500, strategy: 'relevance' });

function engine(config: EngineConfig = {}) {
  return createContextEngine({ clock: () => NOW, verbose: false, ...config });
}

describe('ContextEngine.select', () => {
  it('selects within the budget', () => {
    const e = engine();
    const selection = e.select(e.snapshot({ root: 'demo', files }), featureTask, tight);
    expect(selectedPaths(selection)).toEqual(['auth.go']);
    expect(selection.totalTokens).toBe(400);
  });

  it('returns the cached object without rescoring', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const scoreAll = vi.spyOn(e.scorer, 'scoreAll');

    const first = e.select(snapshot, featureTask, tight);
    const second = e.select(snapshot, featureTask, tight);

    expect(second).toBe(first);
    expect(scoreAll).toHaveBeenCalledTimes(1);
    expect(e.cacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1, hitRatio: 0.5 });
  });

  it('shares cache entries between equivalent tasks', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const first = e.select(snapshot, featureTask, tight);
    const reworded = createTask({ type: 'feature', description: '  Add AUTH   middleware ', keywords: ['AUTH'] });

    expect(e.select(snapshot, reworded, tight)).toBe(first);
  });

  it('misses on a different strategy or budget', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    e.select(snapshot, featureTask, tight);
    e.select(snapshot, featureTask, tight.with({ strategy: 'compactness' }));
    e.select(snapshot, featureTask, tight.with({ maxTokens: 600 }));

    expect(e.cacheStats()).toMatchObject({ hits: 0, misses: 3, size: 3 });
  });

  it('keys per-task overrides by their effective values', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const constraints = createConstraints({ maxTokens: 500, strategy: 'relevance', overrides: { feature: { maxTokens: 10_000 } } });

    const selection = e.select(snapshot, featureTask, constraints);
    expect(selection.totalTokens).toBe(900);
    expect(e.select(snapshot, featureTask, tight)).not.toBe(selection);
  });

  it('misses when the dependency edges differ', () => {
    const apiFiles = ['api/a.go', 'api/b.go', 'api/c.go'].map((path) =>
      createFileRecord({ path, tokenCount: 300, lastModified: NOW })
    );
    const task = createTask({ type: 'debug', keywords: ['a'] });
    const constraints = createConstraints({ maxTokens: 600, strategy: 'dependency' });
    const edge = (to: string) => [{ from: 'api/a.go', to, type: 'import' as const, strength: 1 }];

    const e = engine();
    const toB = e.snapshot({ root: 'api', files: apiFiles, edges: edge('api/b.go') });
    const toC = e.snapshot({ root: 'api', files: apiFiles, edges: edge('api/c.go') });
    const first = e.select(toB, task, constraints);
    const second = e.select(toC, task, constraints);

    expect(second).not.toBe(first);
    expect(second).toEqual(engine().select(toC, task, constraints));
    expect(e.cacheStats()).toMatchObject({ hits: 0, misses: 2, size: 2 });
  });

  it('misses when a file is classified differently', () => {
    const e = engine();
    const retagged = files.map((f) =>
      f.path === 'README.md' ? createFileRecord({ path: 'README.md', tokenCount: 200, lastModified: NOW, kind: 'source' }) : f
    );
    e.select(e.snapshot({ root: 'demo', files }), featureTask, tight);
    e.select(e.snapshot({ root: 'demo', files: retagged }), featureTask, tight);

    expect(e.cacheStats()).toMatchObject({ hits: 0, misses: 2 });
  });

  it('recomputes after invalidation', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const scoreAll = vi.spyOn(e.scorer, 'scoreAll');

    const first = e.select(snapshot, featureTask, tight);
    expect(e.invalidate(snapshot)).toBe(1);
    const second = e.select(snapshot, featureTask, tight);

    expect(second).not.toBe(first);
    expect(second).toEqual(first);
    expect(scoreAll).toHaveBeenCalledTimes(2);
    expect(e.cacheStats().invalidations).toBe(1);
  });

  it('expires entries after the TTL', () => {
    let now = NOW;
    const e = engine({ clock: () => now, cache: { ttlMs: 1000 } });
    const snapshot = e.snapshot({ root: 'demo', files });

    const first = e.select(snapshot, featureTask, tight);
    now += 1000;
    expect(e.select(snapshot, featureTask, tight)).not.toBe(first);
    expect(e.cacheStats()).toMatchObject({ hits: 0, misses: 2 });
  });

  it('uses the configured default constraints', () => {
    const e = engine({ constraints: { maxTokens: 500, strategy: 'relevance' } });
    const selection = e.select(e.snapshot({ root: 'demo', files }), featureTask);
    expect(selection.budget).toEqual({ maxTokens: 500, maxFiles: 50 });
  });
});

describe('ContextEngine.adapt', () => {
  it('targets the size-based budget without history', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const selection = e.adapt(snapshot, featureTask);

    expect(selection.budget.maxTokens).toBe(4000);
    expect(selectedPaths(selection)).toEqual(['auth.go', 'auth_test.go', 'README.md']);
    expect(selection.adaptationReasons).toEqual([]);
  });

  it('targets the learned budget after a successful run', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    e.recordOutcome({ taskType: 'feature', strategy: 'relevance', tokensUsed: 700, quality: 0.9, success: true });

    const selection = e.adapt(snapshot, featureTask);
    expect(selection.budget.maxTokens).toBe(700);
    expect(selectedPaths(selection)).toEqual(['auth.go', 'auth_test.go']);
  });

  it('keeps working after an empty selection succeeded', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const empty = e.select(snapshot, featureTask, createConstraints({ maxTokens: 50 }));
    expect(empty.totalFiles).toBe(0);
    e.recordExecution(empty, featureTask, { filesAccessed: [], filesModified: [], status: 'success', durationMs: 1000, errors: [] });

    const selection = e.adapt(snapshot, featureTask);
    expect(selection.budget.maxTokens).toBe(4000);
    expect(selectedPaths(selection)).toEqual(['auth.go', 'auth_test.go', 'README.md']);
  });

  it('rounds a fractional soft target up', () => {
    const e = engine();
    const selection = e.adapt(e.snapshot({ root: 'demo', files }), featureTask, 999.5);

    expect(selection.budget.maxTokens).toBe(1000);
    expect(selection.totalTokens).toBe(900);
  });
});

describe('ContextEngine feedback', () => {
  it('evaluates an execution and learns from it', () => {
    const e = engine();
    const snapshot = e.snapshot({ root: 'demo', files });
    const selection = e.select(snapshot, featureTask, tight);

    const evaluation = e.recordExecution(
      selection,
      featureTask,
      { filesAccessed: ['auth.go', 'auth_test.go'], filesModified: ['auth.go'], status: 'success', durationMs: 60_000, errors: [] },
      snapshot
    );

    expect(evaluation.precision).toBe(1);
    expect(evaluation.recall).toBe(0.5);
    expect(evaluation.missingFiles).toEqual(['auth_test.go']);
    expect(evaluation.tokenReduction).toBeCloseTo(5 / 9);
    expect(evaluation.quality).toBeCloseTo(1);
    expect(e.getProfile('feature')).toMatchObject({ samples: 1, successRate: 1, preferredTokens: 400 });
    expect(e.suggestBudget('feature', snapshot)).toBe(400);
  });
});

describe('ContextEngine', () => {
  it('counts tokens with the configured counter', () => {
    expect(engine().countTokens('abcdefg')).toBe(2);
    expect(engine({ counter: { name: 'words', count: (t) => t.split(' ').length } }).countTokens('a b c')).toBe(3);
  });

  it('loads snapshot documents', () => {
    const snapshot = engine().loadSnapshot({
      root: 'demo',
      files: [{ path: 'main.go', content: 'package main', lastModified: 0 }],
    });
    expect(snapshot.files.map((f) => [f.path, f.tokenCount])).toEqual([['main.go', 4]]);
  });

  it('assembles selected content', async () => {
    const e = engine();
    const selection = e.select(e.snapshot({ root: 'demo', files }), featureTask, tight);
    const assembled = await e.assemble(selection, async () => 'package auth');

    expect(assembled.files.map((f) => [f.path, f.tokens])).toEqual([['auth.go', 4]]);
  });

  it('rejects invalid configuration at construction', () => {
    expect(() => engine({ constraints: { maxTokens: 0 } })).toThrow(ConfigurationError);
    expect(() => engine({ cache: { maxEntries: -1 } })).toThrow(ConfigurationError);
    expect(() => engine({ adaptive: { maxAttempts: 9 } })).toThrow(ConfigurationError);
  });
});
