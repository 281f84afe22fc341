/**
 * Context Engine
 *
 * One explicitly constructed instance owns a scorer, an optimizer, a result
 * cache and an adaptive manager. Nothing is shared between instances.
 *
 * Usage:
 * ```ts
 * const engine = createContextEngine({ constraints: { maxTokens: 6000 } });
 * const snapshot = engine.snapshot({ root: 'shop', files });
 * const task = createTask({ type: 'debug', description: 'login fails after token refresh' });
 * const selection = engine.select(snapshot, task);
 * ```
 */

import { AdaptiveContextManager, type AdaptiveConfig, type SelectionOutcome, type TaskProfile } from '../context/adaptive-manager.js';
import { assembleContext, type AssembleOptions, type AssembledContext, type SourceReader } from '../context/assembler.js';
import { ContextCache, type CacheConfig, type CacheKey, type CacheStats } from '../context/cache.js';
import { createConstraints, type ContextConstraints, type ConstraintsInput } from '../context/constraints.js';
import { ContextOptimizer, type ContextSelector } from '../context/optimizer.js';
import { RelevanceScorer } from '../context/relevance-scorer.js';
import type { ScorerConfigInput } from '../context/scoring-config.js';
import { createSnapshot, type ProjectSnapshot, type SnapshotInput } from '../context/snapshot.js';
import { fingerprintTask } from '../context/task.js';
import { defaultTokenCounter, type TokenCounter } from '../context/token-counter.js';
import type { SelectedContext, Task, TaskType } from '../context/types.js';
import {
  evaluateSelection,
  outcomeFromEvaluation,
  type ExecutionRecord,
  type SelectionEvaluation,
} from '../eval/selection-evaluator.js';
import { snapshotFromDocument } from '../lib/snapshot-schema.js';

export interface EngineConfig {
  /** Constraints used when a call passes none */
  constraints?: ConstraintsInput;
  scorer?: ScorerConfigInput;
  cache?: Partial<CacheConfig>;
  adaptive?: Partial<AdaptiveConfig>;
  counter?: TokenCounter;
  /** Reference time for recency and cache expiry, ms since the epoch */
  clock?: () => number;
  verbose?: boolean;
}

export class ContextEngine implements ContextSelector {
  readonly scorer: RelevanceScorer;
  readonly defaults: ContextConstraints;
  private readonly optimizer: ContextOptimizer;
  private readonly cache: ContextCache;
  private readonly adaptive: AdaptiveContextManager;
  private readonly counter: TokenCounter;
  private readonly verbose: boolean;

  /**
   * @throws ConfigurationError when any part of the configuration is invalid
   */
  constructor(config: EngineConfig = {}) {
    const clock = config.clock ?? Date.now;
    this.verbose = config.verbose ?? (process.env.DEBUG_CONTEXT_ENGINE === 'true');
    this.counter = config.counter ?? defaultTokenCounter;
    this.defaults = createConstraints(config.constraints);
    this.scorer = new RelevanceScorer(config.scorer, clock);
    this.optimizer = new ContextOptimizer(this.scorer, { clock, verbose: this.verbose });
    this.cache = new ContextCache(config.cache, clock);
    // retries go through select() so they share the cache
    this.adaptive = new AdaptiveContextManager(this, config.adaptive, { verbose: this.verbose });
  }

  /**
   * Build a snapshot from analyzer records.
   */
  snapshot(input: SnapshotInput): ProjectSnapshot {
    return this.logSnapshot(createSnapshot(input));
  }

  /**
   * Build a snapshot from a JSON snapshot document.
   */
  loadSnapshot(document: unknown): ProjectSnapshot {
    return this.logSnapshot(snapshotFromDocument(document, this.counter));
  }

  /**
   * Select context for a task. A cached selection for the same project,
   * task and constraints is returned as the same object.
   */
  select(snapshot: ProjectSnapshot, task: Task, constraints: ContextConstraints = this.defaults): SelectedContext {
    const effective = constraints.forTask(task.type);
    const key: CacheKey = {
      projectFingerprint: snapshot.fingerprint,
      taskFingerprint: fingerprintTask(task),
      strategy: effective.strategy,
      budgetFingerprint: effective.fingerprint(),
    };

    const cached = this.cache.get(key);
    if (cached) {
      if (this.verbose) {
        console.log(`⚡ Cache hit: ${cached.totalFiles} files for ${task.type} task`);
      }
      return cached;
    }

    const selection = this.optimizer.select(snapshot, task, constraints);
    this.cache.put(key, selection);
    return selection;
  }

  /**
   * Select with retries when the result leaves the soft target underused.
   * Without a target, the task type's learned budget (or a size-based guess)
   * is used.
   */
  adapt(snapshot: ProjectSnapshot, task: Task, softTarget?: number, constraints?: ContextConstraints): SelectedContext {
    const target = softTarget ?? this.adaptive.suggestBudget(task.type, snapshot);
    return this.adaptive.adapt(snapshot, task, target, constraints);
  }

  recordOutcome(outcome: SelectionOutcome): TaskProfile {
    return this.adaptive.recordOutcome(outcome);
  }

  evaluate(selection: SelectedContext, execution: ExecutionRecord, snapshot?: ProjectSnapshot): SelectionEvaluation {
    return evaluateSelection(selection, execution, snapshot?.totalTokens);
  }

  /**
   * Evaluate a selection and fold the result into the task type's profile.
   */
  recordExecution(
    selection: SelectedContext,
    task: Task,
    execution: ExecutionRecord,
    snapshot?: ProjectSnapshot
  ): SelectionEvaluation {
    const evaluation = this.evaluate(selection, execution, snapshot);
    this.recordOutcome(outcomeFromEvaluation(selection, task.type, evaluation));
    return evaluation;
  }

  getProfile(taskType: TaskType): TaskProfile | undefined {
    return this.adaptive.getProfile(taskType);
  }

  suggestBudget(taskType: TaskType, snapshot: ProjectSnapshot): number {
    return this.adaptive.suggestBudget(taskType, snapshot);
  }

  countTokens(text: string): number {
    return this.counter.count(text);
  }

  /**
   * Load the selected files' contents and fit them into the budget.
   */
  assemble(
    selection: SelectedContext,
    read: SourceReader,
    options: Partial<Omit<AssembleOptions, 'counter'>> = {}
  ): Promise<AssembledContext> {
    return assembleContext(selection, read, { ...options, counter: this.counter });
  }

  /**
   * Drop every cached selection for the snapshot's project.
   */
  invalidate(snapshot: ProjectSnapshot): number {
    const removed = this.cache.invalidateProject(snapshot.fingerprint);
    if (this.verbose && removed > 0) {
      console.log(`🗑️  Invalidated ${removed} cached selections`);
    }
    return removed;
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private logSnapshot(snapshot: ProjectSnapshot): ProjectSnapshot {
    if (this.verbose) {
      console.log(`📁 Snapshot ${snapshot.root}: ${snapshot.files.length} files, ${snapshot.totalTokens} tokens`);
      for (const failure of snapshot.diagnostics) {
        console.warn(`   ⚠️  ${failure.message}`);
      }
    }
    return snapshot;
  }
}

export function createContextEngine(config: EngineConfig = {}): ContextEngine {
  return new ContextEngine(config);
}
