import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createContextEngine } from '../../src/engine/index.js';
import {
  adaptContext,
  adaptContextInput,
  analyzeSnapshot,
  analyzeSnapshotInput,
  cacheStats,
  countTokens,
  countTokensInput,
  evaluateSelection,
  evaluateSelectionInput,
  recordOutcome,
  recordOutcomeInput,
  selectContext,
  selectContextInput,
  type ToolResult,
} from './handlers.js';

const NOW = Date.UTC(2026, 0, 15);

const snapshot = {
  root: 'demo',
  files: [
    { path: 'auth.go', tokenCount: 400, lastModified: NOW },
    { path: 'auth_test.go', tokenCount: 300, lastModified: NOW },
    { path: 'README.md', tokenCount: 200, lastModified: NOW },
  ],
};

const featureTask = { task_type: 'feature', description: 'add auth middleware', keywords: ['auth'] };

function payload(result: ToolResult): unknown {
  expect(result.content).toHaveLength(1);
  return JSON.parse(result.content[0].text);
}

function engine() {
  return createContextEngine({ clock: () => NOW, verbose: false });
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('select_context', () => {
  it('returns the selection as JSON', () => {
    const args = selectContextInput.parse({ snapshot, ...featureTask, max_tokens: 500, strategy: 'relevance' });
    const result = selectContext(engine(), args);

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({
      success: true,
      project: { root: 'demo', total_files: 3, total_tokens: 900 },
      selection: {
        strategy: 'relevance',
        total_tokens: 400,
        max_tokens: 500,
        files: [{ path: 'auth.go', tokens: 400, reason: 'ranked' }],
      },
    });
  });

  it('serves repeated requests from the cache', () => {
    const e = engine();
    const args = selectContextInput.parse({ snapshot, ...featureTask, max_tokens: 500 });
    selectContext(e, args);
    selectContext(e, args);

    expect(payload(cacheStats(e))).toEqual({
      hits: 1,
      misses: 1,
      evictions: 0,
      invalidations: 0,
      size: 1,
      max_entries: 1000,
      hit_ratio: 0.5,
    });
  });

  it('returns engine errors as error results', () => {
    const args = selectContextInput.parse({ snapshot, ...featureTask, max_tokens: 50, fail_on_empty: true });
    const result = selectContext(engine(), args);

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      success: false,
      code: 'budget_infeasible',
      error: 'No file fits a budget of 50 tokens (smallest candidate needs 200 tokens)',
    });
  });

  it('reports duplicate paths as a configuration error', () => {
    const duplicated = { root: 'demo', files: [snapshot.files[0], snapshot.files[0]] };
    const result = selectContext(engine(), selectContextInput.parse({ snapshot: duplicated }));

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      success: false,
      code: 'configuration_invalid',
      error: 'Duplicate file paths in snapshot: auth.go',
    });
  });
});

describe('adapt_context', () => {
  it('targets the suggested budget without a soft target', () => {
    const result = adaptContext(engine(), adaptContextInput.parse({ snapshot, ...featureTask }));
    expect(payload(result)).toMatchObject({ selection: { max_tokens: 4000, total_tokens: 900, total_files: 3 } });
  });

  it('uses the given soft target', () => {
    const result = adaptContext(engine(), adaptContextInput.parse({ snapshot, ...featureTask, soft_target: 700 }));
    expect(payload(result)).toMatchObject({ selection: { max_tokens: 700, total_tokens: 700 } });
  });
});

describe('analyze_snapshot', () => {
  it('summarizes the project', () => {
    const result = analyzeSnapshot(engine(), analyzeSnapshotInput.parse({ snapshot }));
    expect(payload(result)).toMatchObject({
      root: 'demo',
      total_files: 3,
      total_tokens: 900,
      languages: { go: 2, markdown: 1 },
      test_files: ['auth_test.go'],
      doc_files: ['README.md'],
      recommend_optimization: false,
      dependency_edges: 1,
      suggested_budget: 4000,
      diagnostics: [],
    });
  });
});

describe('count_tokens', () => {
  it('uses the engine counter by default', () => {
    expect(payload(countTokens(engine(), countTokensInput.parse({ text: 'abcdefg' })))).toEqual({
      tokens: 2,
      counter: 'char-ratio',
    });
  });

  it('applies the lexical language multiplier', () => {
    const args = countTokensInput.parse({ text: 'return x', counter: 'lexical', language: 'go' });
    expect(payload(countTokens(engine(), args))).toEqual({ tokens: 4, counter: 'lexical' });
  });
});

describe('record_outcome', () => {
  it('returns the updated profile', () => {
    const args = recordOutcomeInput.parse({
      task_type: 'debug',
      strategy: 'dependency',
      tokens_used: 3000,
      quality: 0.8,
      success: true,
    });
    expect(payload(recordOutcome(engine(), args))).toEqual({
      success: true,
      profile: { task_type: 'debug', samples: 1, average_quality: 0.8, success_rate: 1, preferred_tokens: 3000 },
    });
  });
});

describe('evaluate_selection', () => {
  const execution = {
    snapshot,
    ...featureTask,
    max_tokens: 500,
    strategy: 'relevance',
    files_accessed: ['auth.go', 'auth_test.go'],
    status: 'success',
    duration_ms: 60_000,
  };

  it('scores the selection and records the outcome', () => {
    const e = engine();
    const result = evaluateSelection(e, evaluateSelectionInput.parse(execution));

    expect(payload(result)).toMatchObject({
      precision: 1,
      recall: 0.5,
      missing_files: ['auth_test.go'],
      unnecessary_files: [],
      success: true,
      recorded: true,
      issues: ['Missing: 1 accessed file(s) were not selected'],
    });
    expect(e.getProfile('feature')?.preferredTokens).toBe(400);
  });

  it('leaves profiles alone when record is false', () => {
    const e = engine();
    evaluateSelection(e, evaluateSelectionInput.parse({ ...execution, record: false }));
    expect(e.getProfile('feature')).toBeUndefined();
  });
});
