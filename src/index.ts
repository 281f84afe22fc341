/**
 * Task Context Selector
 *
 * Picks the smallest set of project files a coding task needs:
 * 1. An analyzer supplies file records (and optionally contents or edges)
 * 2. The snapshot builds a dependency graph and structural summary
 * 3. Files are scored for the task and packed under a token budget
 * 4. Results are cached per project, task and constraints
 * 5. Execution feedback tunes budgets and strategies per task type
 */

export { ContextEngine, createContextEngine, type EngineConfig } from './engine/index.js';

export * from './context/index.js';

export {
  evaluateSelection,
  executionRecordSchema,
  formatEvalReport,
  inferQuality,
  outcomeFromEvaluation,
  qualityFromRating,
  type ExecutionRecord,
  type ExecutionStatus,
  type SelectionEvaluation,
} from './eval/index.js';

export {
  ContextEngineError,
  ConfigurationError,
  BudgetInfeasibleError,
  PartialAnalysisFailure,
  describeError,
  type AnalysisStage,
  type ContextEngineErrorCode,
} from './lib/errors.js';

export { hashContent, fingerprintParts } from './lib/fingerprint.js';
export { loadEngineConfigFromEnv, type EnvEngineConfig } from './lib/config.js';
export {
  parseSnapshotDocument,
  snapshotFromDocument,
  snapshotDocumentSchema,
  type SnapshotDocument,
} from './lib/snapshot-schema.js';
