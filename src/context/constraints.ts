/**
 * Selection constraints, validated once at construction.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { fingerprintParts } from '../lib/fingerprint.js';
import { SELECTION_STRATEGIES, TASK_TYPES, type SelectionStrategy, type TaskType } from './types.js';

export const DEFAULT_MAX_TOKENS = 8000;
export const DEFAULT_MAX_FILES = 50;

const overridableSchema = z.object({
  maxTokens: z.number().int().positive(),
  maxFiles: z.number().int().positive(),
  strategy: z.enum(SELECTION_STRATEGIES),
  minRelevanceScore: z.number().min(0).max(1),
  excludePatterns: z.array(z.string().min(1)),
  includeTests: z.boolean(),
  includeDocs: z.boolean(),
  dependencyDepth: z.number().int().min(0).max(10),
  freshnessBias: z.number().min(0).max(1),
  failOnEmpty: z.boolean(),
});

export type ConstraintValues = z.infer<typeof overridableSchema>;

export type ConstraintOverrides = Partial<ConstraintValues>;

export type ConstraintsInput = ConstraintOverrides & {
  /** Per-task-type adjustments applied by `forTask` */
  overrides?: Partial<Record<TaskType, ConstraintOverrides>>;
};

const constraintsSchema = overridableSchema.extend({
  overrides: z.record(z.enum(TASK_TYPES), overridableSchema.partial()).default({}),
});

export const DEFAULT_CONSTRAINTS: ConstraintValues = {
  maxTokens: DEFAULT_MAX_TOKENS,
  maxFiles: DEFAULT_MAX_FILES,
  strategy: 'balanced',
  minRelevanceScore: 0,
  excludePatterns: [],
  includeTests: true,
  includeDocs: true,
  dependencyDepth: 1,
  freshnessBias: 0.5,
  failOnEmpty: false,
};

export class ContextConstraints {
  readonly maxTokens: number;
  readonly maxFiles: number;
  readonly strategy: SelectionStrategy;
  /** Files scoring below this are not candidates (must-include excepted) */
  readonly minRelevanceScore: number;
  /** Glob patterns of paths that are never candidates */
  readonly excludePatterns: readonly string[];
  readonly includeTests: boolean;
  readonly includeDocs: boolean;
  /** Levels of imports the dependency strategy follows */
  readonly dependencyDepth: number;
  /** Share of the freshness strategy's key that comes from recency */
  readonly freshnessBias: number;
  /** Throw BudgetInfeasibleError instead of returning an empty selection */
  readonly failOnEmpty: boolean;
  readonly overrides: Readonly<Partial<Record<TaskType, ConstraintOverrides>>>;

  /**
   * @throws ConfigurationError for non-positive budgets, unknown strategies
   * or out-of-range values
   */
  constructor(input: ConstraintsInput = {}) {
    const defined = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
    const parsed = constraintsSchema.safeParse({ ...DEFAULT_CONSTRAINTS, ...defined });
    if (!parsed.success) {
      throw ConfigurationError.fromZod('constraints', parsed.error);
    }

    const values = parsed.data;
    this.maxTokens = values.maxTokens;
    this.maxFiles = values.maxFiles;
    this.strategy = values.strategy;
    this.minRelevanceScore = values.minRelevanceScore;
    this.excludePatterns = Object.freeze([...values.excludePatterns]);
    this.includeTests = values.includeTests;
    this.includeDocs = values.includeDocs;
    this.dependencyDepth = values.dependencyDepth;
    this.freshnessBias = values.freshnessBias;
    this.failOnEmpty = values.failOnEmpty;
    this.overrides = Object.freeze(values.overrides);
    Object.freeze(this);
  }

  values(): ConstraintValues {
    return {
      maxTokens: this.maxTokens,
      maxFiles: this.maxFiles,
      strategy: this.strategy,
      minRelevanceScore: this.minRelevanceScore,
      excludePatterns: [...this.excludePatterns],
      includeTests: this.includeTests,
      includeDocs: this.includeDocs,
      dependencyDepth: this.dependencyDepth,
      freshnessBias: this.freshnessBias,
      failOnEmpty: this.failOnEmpty,
    };
  }

  /**
   * A copy with some values replaced. Per-task overrides carry over.
   */
  with(changes: ConstraintOverrides): ContextConstraints {
    return new ContextConstraints({ ...this.values(), ...changes, overrides: { ...this.overrides } });
  }

  /**
   * Constraints with the task type's overrides applied.
   */
  forTask(type: TaskType): ContextConstraints {
    const override = this.overrides[type];
    return override ? this.with(override) : this;
  }

  /**
   * Stable identifier over every value that affects a selection.
   */
  fingerprint(): string {
    const v = this.values();
    return fingerprintParts([
      String(v.maxTokens),
      String(v.maxFiles),
      v.strategy,
      String(v.minRelevanceScore),
      [...v.excludePatterns].sort().join(','),
      String(v.includeTests),
      String(v.includeDocs),
      String(v.dependencyDepth),
      String(v.freshnessBias),
      String(v.failOnEmpty),
    ]);
  }
}

export function createConstraints(input: ConstraintsInput = {}): ContextConstraints {
  return new ContextConstraints(input);
}
