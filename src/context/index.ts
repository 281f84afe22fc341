/**
 * Context System
 *
 * Re-exports for snapshots, scoring, selection, caching and assembly.
 */

export {
  TASK_TYPES,
  FILE_KINDS,
  SELECTION_STRATEGIES,
  isTaskType,
  isSelectionStrategy,
  type TaskType,
  type FileKind,
  type SelectionStrategy,
  type FileRecord,
  type Task,
  type ScoringFactors,
  type ScoringFactor,
  type ScoredFile,
  type InclusionReason,
  type ContextFile,
  type SelectionBudget,
  type SelectedContext,
} from './types.js';

export {
  CharRatioTokenCounter,
  LexicalTokenCounter,
  LANGUAGE_TOKEN_MULTIPLIERS,
  defaultTokenCounter,
  estimateTokens,
  truncateToTokenBudget,
  type TokenCounter,
} from './token-counter.js';

export {
  classifyFile,
  detectLanguage,
  matchesPatterns,
  normalizeFilePath,
  isTestPath,
  isDocPath,
  isVendoredPath,
} from './file-classifier.js';

export { createFileRecord, type FileRecordInput } from './file-record.js';

export {
  createTask,
  fingerprintTask,
  extractKeywords,
  matchesMustInclude,
  taskInputSchema,
  type TaskInput,
} from './task.js';

export {
  DependencyGraph,
  buildDependencyGraph,
  testSubjectCandidates,
  EDGE_STRENGTH,
  type DependencyEdge,
  type DependencyEdgeType,
  type DependencyNode,
  type TransitiveDependency,
  type GraphBuildOptions,
  type GraphBuildResult,
} from './dependency-graph.js';

export {
  createResolverRegistry,
  ResolverRegistry,
  GoResolver,
  PythonResolver,
  TypeScriptResolver,
  parseGoModulePath,
  type ImportResolver,
  type ResolverOptions,
} from './resolvers/index.js';

export {
  createSnapshot,
  fingerprintFiles,
  predictBudget,
  LARGE_PROJECT_TOKENS,
  type ProjectSnapshot,
  type SnapshotInput,
  type StructuralSummary,
} from './snapshot.js';

export {
  DEFAULT_SCORER_CONFIG,
  DEFAULT_SCORING_TABLES,
  DEFAULT_WEIGHTS,
  resolveScorerConfig,
  type ScorerConfig,
  type ScorerConfigInput,
  type ScoringTables,
  type ScoringWeights,
} from './scoring-config.js';

export {
  RelevanceScorer,
  compareScored,
  type FileScorer,
  type ScoringOptions,
} from './relevance-scorer.js';

export {
  ContextConstraints,
  createConstraints,
  DEFAULT_CONSTRAINTS,
  DEFAULT_MAX_FILES,
  DEFAULT_MAX_TOKENS,
  type ConstraintOverrides,
  type ConstraintsInput,
} from './constraints.js';

export {
  freezeSelection,
  withAdaptationReasons,
  selectedPaths,
  averageTokensPerFile,
  type SelectionParts,
} from './selection.js';

export {
  ContextOptimizer,
  type ContextSelector,
  type OptimizerOptions,
} from './optimizer.js';

export {
  ContextCache,
  cacheKeyToString,
  DEFAULT_CACHE_CONFIG,
  type CacheConfig,
  type CacheEntryInfo,
  type CacheKey,
  type CacheStats,
} from './cache.js';

export {
  AdaptiveContextManager,
  DEFAULT_ADAPTIVE_CONFIG,
  TASK_DEFAULTS,
  selectionOutcomeSchema,
  type AdaptiveConfig,
  type AdaptiveOptions,
  type SelectionOutcome,
  type StrategyRecord,
  type TaskProfile,
} from './adaptive-manager.js';

export {
  compressContent,
  estimateCompressionRatio,
  isCompressionStrategy,
  COMPRESSION_STRATEGIES,
  type CompressedFile,
  type CompressionStrategy,
} from './compression.js';

export {
  assembleContext,
  formatAssembledContext,
  type AssembleOptions,
  type AssembledContext,
  type AssembledFile,
  type SourceReader,
} from './assembler.js';
