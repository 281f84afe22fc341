/**
 * Core data model shared by the scorer, optimizer, cache and adaptive manager.
 */

export const TASK_TYPES = ['general', 'debug', 'refactor', 'feature', 'test', 'documentation'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const FILE_KINDS = ['source', 'test', 'config', 'doc', 'unknown'] as const;
export type FileKind = (typeof FILE_KINDS)[number];

export const SELECTION_STRATEGIES = ['relevance', 'dependency', 'freshness', 'compactness', 'balanced'] as const;
export type SelectionStrategy = (typeof SELECTION_STRATEGIES)[number];

/**
 * A single project file as described by the analyzer collaborator.
 */
export interface FileRecord {
  /** Project-relative path, unique within a snapshot */
  readonly path: string;
  /** Size in bytes */
  readonly size: number;
  readonly tokenCount: number;
  /** Milliseconds since the Unix epoch */
  readonly lastModified: number;
  readonly kind: FileKind;
  readonly language: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * What the caller wants the model to do.
 */
export interface Task {
  readonly type: TaskType;
  readonly description: string;
  readonly keywords: readonly string[];
  readonly mustInclude: readonly string[];
}

/**
 * Per-factor breakdown behind an aggregate score. Every value is in [0,1].
 */
export interface ScoringFactors {
  keywordMatch: number;
  pathRelevance: number;
  fileType: number;
  recency: number;
  size: number;
  dependency: number;
  taskType: number;
  language: number;
}

export type ScoringFactor = keyof ScoringFactors;

export interface ScoredFile {
  readonly file: FileRecord;
  readonly score: number;
  readonly factors: Readonly<ScoringFactors>;
}

/** Why a file ended up in a selection */
export type InclusionReason = 'must-include' | 'ranked' | 'dependency';

export interface ContextFile {
  readonly file: FileRecord;
  readonly score: number;
  readonly reason: InclusionReason;
}

export interface SelectionBudget {
  readonly maxTokens: number;
  readonly maxFiles: number;
}

/**
 * The engine's output. Deep-frozen once returned.
 */
export interface SelectedContext {
  /** Chosen files in selection order */
  readonly files: readonly ContextFile[];
  readonly totalTokens: number;
  readonly totalFiles: number;
  readonly strategy: SelectionStrategy;
  /** Human-readable notes on files pulled in or parameters changed */
  readonly adaptationReasons: readonly string[];
  /** Partial analysis failures and unmatched must-include entries */
  readonly diagnostics: readonly string[];
  /** Mean score of the chosen files (0 when empty) */
  readonly selectionScore: number;
  readonly budget: SelectionBudget;
  readonly projectFingerprint: string;
}

export function isTaskType(value: string): value is TaskType {
  return TASK_TYPES.some((type) => type === value);
}

export function isSelectionStrategy(value: string): value is SelectionStrategy {
  return SELECTION_STRATEGIES.some((strategy) => strategy === value);
}
