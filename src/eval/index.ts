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
} from './selection-evaluator.js';
