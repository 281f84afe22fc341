/**
 * Adaptive Context Manager
 *
 * Wraps a selector with a bounded retry loop. A selection that leaves most of
 * the soft token target unused, or a task type whose recorded outcomes were
 * poor, triggers a retry with a looser budget or another strategy. Every
 * adjustment is reported in the selection's adaptation reasons.
 *
 * Outcome profiles live in memory only.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { createConstraints, type ContextConstraints, type ConstraintOverrides } from './constraints.js';
import type { ContextSelector } from './optimizer.js';
import { withAdaptationReasons } from './selection.js';
import { predictBudget, type ProjectSnapshot } from './snapshot.js';
import { SELECTION_STRATEGIES, TASK_TYPES, type SelectedContext, type SelectionStrategy, type Task, type TaskType } from './types.js';

const adaptiveConfigSchema = z.object({
  /** Retry when fewer than this share of the soft target was used */
  underuseRatio: z.number().gt(0).max(1),
  /** Retry when the task type's average recorded quality is below this */
  lowQualityThreshold: z.number().min(0).max(1),
  budgetGrowth: z.number().gt(1).max(4),
  maxAttempts: z.number().int().min(1).max(5),
  /** Weight of the newest outcome in the quality and budget averages */
  learningRate: z.number().gt(0).max(1),
  defaultMaxFiles: z.number().int().positive(),
});

export type AdaptiveConfig = z.infer<typeof adaptiveConfigSchema>;

export const DEFAULT_ADAPTIVE_CONFIG: AdaptiveConfig = {
  underuseRatio: 0.5,
  lowQualityThreshold: 0.6,
  budgetGrowth: 1.5,
  maxAttempts: 3,
  learningRate: 0.3,
  defaultMaxFiles: 50,
};

/** Starting constraints per task type when the caller gives none */
export const TASK_DEFAULTS: Readonly<Record<TaskType, ConstraintOverrides>> = {
  general: { strategy: 'balanced' },
  feature: { strategy: 'relevance' },
  test: { strategy: 'relevance' },
  documentation: { strategy: 'relevance' },
  debug: { strategy: 'dependency', dependencyDepth: 3 },
  refactor: { strategy: 'dependency', dependencyDepth: 4 },
};

/** Order in which underused selections try other strategies */
const ROTATION: readonly SelectionStrategy[] = ['balanced', 'dependency', 'relevance', 'compactness', 'freshness'];

export const selectionOutcomeSchema = z.object({
  taskType: z.enum(TASK_TYPES),
  strategy: z.enum(SELECTION_STRATEGIES),
  tokensUsed: z.number().int().min(0),
  quality: z.number().min(0).max(1),
  success: z.boolean(),
});

export type SelectionOutcome = z.infer<typeof selectionOutcomeSchema>;

export interface StrategyRecord {
  samples: number;
  meanQuality: number;
}

export interface TaskProfile {
  taskType: TaskType;
  samples: number;
  /** Exponential moving average of outcome quality */
  averageQuality: number;
  successRate: number;
  strategies: Partial<Record<SelectionStrategy, StrategyRecord>>;
  /** Moving average of tokens used by successful selections */
  preferredTokens: number | null;
}

export interface AdaptiveOptions {
  verbose?: boolean;
}

export class AdaptiveContextManager {
  readonly config: AdaptiveConfig;
  private readonly selector: ContextSelector;
  private readonly profiles = new Map<TaskType, TaskProfile>();
  private readonly verbose: boolean;

  /**
   * @throws ConfigurationError for out-of-range thresholds or attempts
   */
  constructor(selector: ContextSelector, config: Partial<AdaptiveConfig> = {}, options: AdaptiveOptions = {}) {
    const parsed = adaptiveConfigSchema.safeParse({ ...DEFAULT_ADAPTIVE_CONFIG, ...config });
    if (!parsed.success) {
      throw ConfigurationError.fromZod('adaptive config', parsed.error);
    }
    this.config = parsed.data;
    this.selector = selector;
    this.verbose = options.verbose ?? (process.env.DEBUG_CONTEXT_ENGINE === 'true');
  }

  /**
   * Constraints a task type starts from when the caller has none.
   */
  initialConstraints(taskType: TaskType, softTarget: number): ContextConstraints {
    return createConstraints({
      maxFiles: this.config.defaultMaxFiles,
      ...TASK_DEFAULTS[taskType],
      maxTokens: softTarget,
    });
  }

  /**
   * Select, then retry while the result looks over-conservative. At most
   * `maxAttempts` selections run; the best by token coverage is returned.
   * The target is rounded up to a whole positive token count.
   */
  adapt(
    snapshot: ProjectSnapshot,
    task: Task,
    softTarget: number,
    constraints?: ContextConstraints
  ): SelectedContext {
    const target = Number.isFinite(softTarget) ? Math.max(1, Math.ceil(softTarget)) : predictBudget(snapshot);
    let current = constraints
      ? constraints.with({ maxTokens: target })
      : this.initialConstraints(task.type, target);
    let best = this.selector.select(snapshot, task, current);
    const reasons: string[] = [];
    const tried = new Set<SelectionStrategy>([current.strategy]);
    const profile = this.profiles.get(task.type);

    for (let attempt = 2; attempt <= this.config.maxAttempts; attempt++) {
      const lowQuality =
        attempt === 2 && profile !== undefined && profile.averageQuality < this.config.lowQualityThreshold;
      const underused = best.totalTokens < this.config.underuseRatio * target;
      if (!lowQuality && !underused) break;
      if (!lowQuality && best.totalFiles >= snapshot.files.length) break;

      let next: ContextConstraints;
      if (lowQuality && profile) {
        const strategy = this.bestKnownStrategy(profile);
        const maxTokens = Math.ceil(current.maxTokens * this.config.budgetGrowth);
        next = current.with({ strategy, maxTokens });
        reasons.push(
          `prior ${task.type} outcomes averaged quality ${profile.averageQuality.toFixed(2)}; ` +
          `retrying with ${strategy} strategy and a budget of ${maxTokens} tokens`
        );
      } else if (best.totalFiles >= current.maxFiles) {
        const maxFiles = Math.ceil(current.maxFiles * this.config.budgetGrowth);
        next = current.with({ maxFiles });
        reasons.push(
          `selection used ${best.totalTokens} of ${target} target tokens with ${best.totalFiles} of ` +
          `${current.maxFiles} files; raising file limit to ${maxFiles}`
        );
      } else {
        const strategy = ROTATION.find((s) => !tried.has(s));
        if (!strategy) break;
        next = current.with({ strategy, minRelevanceScore: 0 });
        reasons.push(
          `selection used ${best.totalTokens} of ${target} target tokens; retrying with ${strategy} strategy`
        );
      }

      tried.add(next.strategy);
      current = next;
      const retry = this.selector.select(snapshot, task, current);
      if (retry.totalTokens > best.totalTokens) {
        best = retry;
      } else {
        reasons.push(`attempt ${attempt} (${current.strategy}) did not improve coverage: ${retry.totalTokens} tokens`);
      }
    }

    if (this.verbose && reasons.length > 0) {
      console.log(`\n🔄 Adapted ${task.type} selection:`);
      for (const reason of reasons) {
        console.log(`   - ${reason}`);
      }
    }

    return withAdaptationReasons(best, reasons);
  }

  /**
   * Fold an execution outcome into its task type's profile.
   *
   * @throws ConfigurationError for an out-of-range outcome
   */
  recordOutcome(outcome: SelectionOutcome): TaskProfile {
    const parsed = selectionOutcomeSchema.safeParse(outcome);
    if (!parsed.success) {
      throw ConfigurationError.fromZod('outcome', parsed.error);
    }
    const { taskType, strategy, tokensUsed, quality, success } = parsed.data;
    const rate = this.config.learningRate;

    const previous = this.profiles.get(taskType);
    const samples = (previous?.samples ?? 0) + 1;
    const successes = (previous ? previous.successRate * previous.samples : 0) + (success ? 1 : 0);
    const strategyRecord = previous?.strategies[strategy];
    const strategySamples = (strategyRecord?.samples ?? 0) + 1;

    // an empty selection says nothing about the budget a task type needs
    let preferredTokens = previous?.preferredTokens ?? null;
    if (success && tokensUsed > 0) {
      preferredTokens = preferredTokens === null
        ? tokensUsed
        : Math.round((1 - rate) * preferredTokens + rate * tokensUsed);
    }

    const strategies = { ...previous?.strategies };
    strategies[strategy] = {
      samples: strategySamples,
      meanQuality: ((strategyRecord?.meanQuality ?? 0) * (strategySamples - 1) + quality) / strategySamples,
    };

    const profile: TaskProfile = {
      taskType,
      samples,
      averageQuality: previous ? (1 - rate) * previous.averageQuality + rate * quality : quality,
      successRate: successes / samples,
      strategies,
      preferredTokens,
    };
    this.profiles.set(taskType, profile);

    if (this.verbose) {
      console.log(`📈 ${taskType} profile: ${samples} outcomes, quality ${profile.averageQuality.toFixed(2)}`);
    }
    return { ...profile, strategies: { ...strategies } };
  }

  getProfile(taskType: TaskType): TaskProfile | undefined {
    const profile = this.profiles.get(taskType);
    return profile ? { ...profile, strategies: { ...profile.strategies } } : undefined;
  }

  /**
   * Token target for a task type: what successful runs used, else a
   * size-based guess for the project.
   */
  suggestBudget(taskType: TaskType, snapshot: ProjectSnapshot): number {
    return this.profiles.get(taskType)?.preferredTokens ?? predictBudget(snapshot);
  }

  reset(): void {
    this.profiles.clear();
  }

  private bestKnownStrategy(profile: TaskProfile): SelectionStrategy {
    let best: SelectionStrategy = 'dependency';
    let bestQuality = this.config.lowQualityThreshold;
    for (const strategy of SELECTION_STRATEGIES) {
      const record = profile.strategies[strategy];
      if (record && record.meanQuality >= bestQuality) {
        best = strategy;
        bestQuality = record.meanQuality;
      }
    }
    return best;
  }
}
