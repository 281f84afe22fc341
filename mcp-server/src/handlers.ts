/**
 * Tool handlers for the context selection MCP server.
 *
 * Each handler takes the engine and already-validated tool arguments and
 * returns JSON text content. Engine errors come back as `isError` results
 * so the calling agent can correct its input.
 */

import { z } from 'zod';
import type { ContextEngine } from '../../src/engine/index.js';
import type { ConstraintOverrides } from '../../src/context/constraints.js';
import { createTask } from '../../src/context/task.js';
import { LexicalTokenCounter } from '../../src/context/token-counter.js';
import { SELECTION_STRATEGIES, TASK_TYPES } from '../../src/context/types.js';
import { formatEvalReport } from '../../src/eval/index.js';
import { ContextEngineError, describeError } from '../../src/lib/errors.js';
import { projectToJSON, selectionToJSON } from '../../src/lib/selection-json.js';
import { snapshotDocumentSchema } from '../../src/lib/snapshot-schema.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

// --- Input shapes ---

const taskFields = {
  task_type: z.enum(TASK_TYPES).optional().describe('Task type (default: general)'),
  description: z.string().optional().describe('What the task is about'),
  keywords: z.array(z.string()).optional().describe('Keywords to match against paths and names'),
  must_include: z.array(z.string()).optional().describe('Paths that must be selected'),
};

const constraintFields = {
  max_tokens: z.number().int().positive().optional().describe('Token budget'),
  max_files: z.number().int().positive().optional().describe('File limit'),
  strategy: z.enum(SELECTION_STRATEGIES).optional().describe('Ranking strategy'),
  min_relevance_score: z.number().min(0).max(1).optional().describe('Drop files scoring below this'),
  exclude_patterns: z.array(z.string()).optional().describe('Glob patterns never selected'),
  include_tests: z.boolean().optional().describe('Consider test files (default: true)'),
  include_docs: z.boolean().optional().describe('Consider documentation (default: true)'),
  dependency_depth: z.number().int().min(0).max(10).optional().describe('Import levels the dependency strategy follows'),
  fail_on_empty: z.boolean().optional().describe('Return an error instead of an empty selection'),
};

const snapshotField = {
  snapshot: snapshotDocumentSchema.describe('Snapshot document: root, files and optional edges'),
};

export const selectContextInput = z.object({ ...snapshotField, ...taskFields, ...constraintFields });

export const adaptContextInput = z.object({
  ...snapshotField,
  ...taskFields,
  ...constraintFields,
  soft_target: z.number().int().positive().optional().describe('Token target; learned per task type when omitted'),
});

export const analyzeSnapshotInput = z.object({
  ...snapshotField,
  task_type: z.enum(TASK_TYPES).optional().describe('Task type for the budget suggestion (default: general)'),
});

export const countTokensInput = z.object({
  text: z.string().describe('Text to count'),
  counter: z.enum(['char-ratio', 'lexical']).optional().describe('Counting method (default: char-ratio)'),
  language: z.string().optional().describe('Language for the lexical multiplier'),
});

export const recordOutcomeInput = z.object({
  task_type: z.enum(TASK_TYPES).describe('Task type the selection was for'),
  strategy: z.enum(SELECTION_STRATEGIES).describe('Strategy that produced the selection'),
  tokens_used: z.number().int().min(0).describe('Tokens in the selection'),
  quality: z.number().min(0).max(1).describe('Observed quality (0-1)'),
  success: z.boolean().describe('Whether the task succeeded'),
});

export const evaluateSelectionInput = z.object({
  ...snapshotField,
  ...taskFields,
  ...constraintFields,
  files_accessed: z.array(z.string()).describe('Files the task read'),
  files_modified: z.array(z.string()).optional().describe('Files the task changed'),
  status: z.enum(['success', 'partial', 'failed']).describe('How the task ended'),
  duration_ms: z.number().min(0).describe('Task duration in milliseconds'),
  errors: z.array(z.string()).optional().describe('Errors seen during the task'),
  iterations: z.number().int().min(1).optional().describe('Attempts the task needed'),
  interventions: z.number().int().min(0).optional().describe('Times a human stepped in'),
  record: z.boolean().optional().describe('Feed the result into the task type profile (default: true)'),
});

export type SelectContextArgs = z.infer<typeof selectContextInput>;
export type AdaptContextArgs = z.infer<typeof adaptContextInput>;
export type AnalyzeSnapshotArgs = z.infer<typeof analyzeSnapshotInput>;
export type CountTokensArgs = z.infer<typeof countTokensInput>;
export type RecordOutcomeArgs = z.infer<typeof recordOutcomeInput>;
export type EvaluateSelectionArgs = z.infer<typeof evaluateSelectionInput>;

type TaskArgs = z.infer<z.ZodObject<typeof taskFields>>;
type ConstraintArgs = z.infer<z.ZodObject<typeof constraintFields>>;

// --- Helpers ---

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] };
}

function errorResult(error: unknown): ToolResult {
  const code = error instanceof ContextEngineError ? error.code : 'internal_error';
  console.error(`❌ Tool failed (${code}): ${describeError(error)}`);
  return {
    content: [{ type: 'text', text: JSON.stringify({ success: false, code, error: describeError(error) }) }],
    isError: true,
  };
}

function run(handler: () => unknown): ToolResult {
  try {
    return jsonResult(handler());
  } catch (error) {
    return errorResult(error);
  }
}

function taskFrom(args: TaskArgs) {
  return createTask({
    type: args.task_type,
    description: args.description,
    keywords: args.keywords,
    mustInclude: args.must_include,
  });
}

function overridesFrom(args: ConstraintArgs): ConstraintOverrides {
  const overrides: ConstraintOverrides = {};
  if (args.max_tokens !== undefined) overrides.maxTokens = args.max_tokens;
  if (args.max_files !== undefined) overrides.maxFiles = args.max_files;
  if (args.strategy !== undefined) overrides.strategy = args.strategy;
  if (args.min_relevance_score !== undefined) overrides.minRelevanceScore = args.min_relevance_score;
  if (args.exclude_patterns !== undefined) overrides.excludePatterns = args.exclude_patterns;
  if (args.include_tests !== undefined) overrides.includeTests = args.include_tests;
  if (args.include_docs !== undefined) overrides.includeDocs = args.include_docs;
  if (args.dependency_depth !== undefined) overrides.dependencyDepth = args.dependency_depth;
  if (args.fail_on_empty !== undefined) overrides.failOnEmpty = args.fail_on_empty;
  return overrides;
}

// --- Handlers ---

export function selectContext(engine: ContextEngine, args: SelectContextArgs): ToolResult {
  return run(() => {
    const snapshot = engine.loadSnapshot(args.snapshot);
    const selection = engine.select(snapshot, taskFrom(args), engine.defaults.with(overridesFrom(args)));
    return { success: true, project: projectToJSON(snapshot), selection: selectionToJSON(selection) };
  });
}

export function adaptContext(engine: ContextEngine, args: AdaptContextArgs): ToolResult {
  return run(() => {
    const snapshot = engine.loadSnapshot(args.snapshot);
    const overrides = overridesFrom(args);
    const constraints = Object.keys(overrides).length > 0 ? engine.defaults.with(overrides) : undefined;
    const selection = engine.adapt(snapshot, taskFrom(args), args.soft_target, constraints);
    return { success: true, project: projectToJSON(snapshot), selection: selectionToJSON(selection) };
  });
}

export function analyzeSnapshot(engine: ContextEngine, args: AnalyzeSnapshotArgs): ToolResult {
  return run(() => {
    const snapshot = engine.loadSnapshot(args.snapshot);
    const { summary } = snapshot;
    return {
      ...projectToJSON(snapshot),
      languages: snapshot.languages,
      entry_points: summary.entryPoints,
      test_files: summary.testFiles,
      config_files: summary.configFiles,
      doc_files: summary.docFiles,
      core_directories: summary.coreDirectories,
      recommend_optimization: summary.recommendOptimization,
      dependency_edges: snapshot.graph.edges().length,
      suggested_budget: engine.suggestBudget(args.task_type ?? 'general', snapshot),
      diagnostics: snapshot.diagnostics.map((failure) => failure.message),
    };
  });
}

export function countTokens(engine: ContextEngine, args: CountTokensArgs): ToolResult {
  return run(() => {
    if (args.counter === 'lexical') {
      const counter = new LexicalTokenCounter(args.language);
      return { tokens: counter.count(args.text), counter: counter.name };
    }
    return { tokens: engine.countTokens(args.text), counter: 'char-ratio' };
  });
}

export function recordOutcome(engine: ContextEngine, args: RecordOutcomeArgs): ToolResult {
  return run(() => {
    const profile = engine.recordOutcome({
      taskType: args.task_type,
      strategy: args.strategy,
      tokensUsed: args.tokens_used,
      quality: args.quality,
      success: args.success,
    });
    return {
      success: true,
      profile: {
        task_type: profile.taskType,
        samples: profile.samples,
        average_quality: profile.averageQuality,
        success_rate: profile.successRate,
        preferred_tokens: profile.preferredTokens,
      },
    };
  });
}

export function evaluateSelection(engine: ContextEngine, args: EvaluateSelectionArgs): ToolResult {
  return run(() => {
    const snapshot = engine.loadSnapshot(args.snapshot);
    const task = taskFrom(args);
    // the cache returns the selection the agent was given for the same inputs
    const selection = engine.select(snapshot, task, engine.defaults.with(overridesFrom(args)));
    const execution = {
      filesAccessed: args.files_accessed,
      filesModified: args.files_modified ?? [],
      status: args.status,
      durationMs: args.duration_ms,
      errors: args.errors ?? [],
      iterations: args.iterations,
      interventions: args.interventions,
    };
    const evaluation = args.record === false
      ? engine.evaluate(selection, execution, snapshot)
      : engine.recordExecution(selection, task, execution, snapshot);

    return {
      precision: evaluation.precision,
      recall: evaluation.recall,
      missing_files: evaluation.missingFiles,
      unnecessary_files: evaluation.unnecessaryFiles,
      token_reduction: evaluation.tokenReduction,
      quality: evaluation.quality,
      success: evaluation.success,
      issues: evaluation.issues,
      recorded: args.record !== false,
      report: formatEvalReport(evaluation),
    };
  });
}

export function cacheStats(engine: ContextEngine): ToolResult {
  return run(() => {
    const stats = engine.cacheStats();
    return {
      hits: stats.hits,
      misses: stats.misses,
      evictions: stats.evictions,
      invalidations: stats.invalidations,
      size: stats.size,
      max_entries: stats.maxEntries,
      hit_ratio: stats.hitRatio,
    };
  });
}
