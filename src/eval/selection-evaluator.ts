/**
 * Selection Evaluator
 *
 * Compares a selection with what the task execution actually touched and
 * infers a quality score for the adaptive manager.
 */

import { z } from 'zod';
import type { SelectionOutcome } from '../context/adaptive-manager.js';
import { normalizeFilePath } from '../context/file-classifier.js';
import type { SelectedContext, TaskType } from '../context/types.js';
import { ConfigurationError } from '../lib/errors.js';

export const executionRecordSchema = z.object({
  /** Files the task read */
  filesAccessed: z.array(z.string().min(1)).default([]),
  /** Files the task changed; these count as accessed */
  filesModified: z.array(z.string().min(1)).default([]),
  status: z.enum(['success', 'partial', 'failed']),
  durationMs: z.number().min(0),
  errors: z.array(z.string()).default([]),
  iterations: z.number().int().min(0).default(1),
  interventions: z.number().int().min(0).default(0),
});

export type ExecutionRecord = z.input<typeof executionRecordSchema>;
export type ExecutionStatus = ExecutionRecord['status'];

/**
 * Evaluation of one selection against one execution.
 */
export interface SelectionEvaluation {
  /** Share of selected files the execution touched (0-1) */
  precision: number;
  /** Share of touched files that were selected (0-1) */
  recall: number;
  /** Accessed but not selected */
  missingFiles: string[];
  /** Selected but never accessed */
  unnecessaryFiles: string[];
  /** 1 - selected tokens / project tokens; null without a project total */
  tokenReduction: number | null;
  /** Inferred from the execution record (0-1) */
  quality: number;
  success: boolean;
  issues: string[];
}

const MINUTE_MS = 60 * 1000;

/**
 * @throws ConfigurationError for a malformed record
 */
function parseExecution(execution: ExecutionRecord): z.infer<typeof executionRecordSchema> {
  const parsed = executionRecordSchema.safeParse(execution);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('execution record', parsed.error);
  }
  return parsed.data;
}

const BASE_QUALITY: Readonly<Record<ExecutionStatus, number>> = {
  success: 0.8,
  partial: 0.5,
  failed: 0.2,
};

/**
 * Quality implied by how the task went. Fast, error-free runs score high;
 * long runs, errors, many iterations and frequent interventions lower it.
 */
export function inferQuality(execution: ExecutionRecord): number {
  const data = parseExecution(execution);
  let quality = BASE_QUALITY[data.status];

  if (data.durationMs < 5 * MINUTE_MS) {
    quality += 0.1;
  } else if (data.durationMs > 30 * MINUTE_MS) {
    quality -= 0.2;
  }

  if (data.errors.length === 0) {
    quality += 0.1;
  } else {
    quality -= data.errors.length * 0.05;
  }

  if (data.iterations > 5) quality -= 0.1;
  if (data.interventions > 3) quality -= 0.15;

  return Math.min(1, Math.max(0, quality));
}

/**
 * Map a 1-5 user rating onto 0-1.
 */
export function qualityFromRating(rating: number): number {
  const clamped = Math.min(5, Math.max(1, rating));
  return (clamped - 1) / 4;
}

/**
 * Evaluate a selection against an execution record.
 *
 * @param projectTokens - the snapshot's total tokens, for the reduction ratio
 */
export function evaluateSelection(
  selection: SelectedContext,
  execution: ExecutionRecord,
  projectTokens?: number
): SelectionEvaluation {
  const data = parseExecution(execution);
  const touched = new Set([...data.filesAccessed, ...data.filesModified].map(normalizeFilePath));
  const selected = selection.files.map((entry) => entry.file.path);
  const selectedSet = new Set(selected);

  const hits = selected.filter((path) => touched.has(path)).length;
  const missingFiles = [...touched].filter((path) => !selectedSet.has(path)).sort();
  const unnecessaryFiles = selected.filter((path) => !touched.has(path));

  const precision = selected.length > 0 ? hits / selected.length : touched.size === 0 ? 1 : 0;
  const recall = touched.size > 0 ? hits / touched.size : 1;
  const tokenReduction =
    projectTokens !== undefined && projectTokens > 0 ? 1 - selection.totalTokens / projectTokens : null;
  const quality = inferQuality(data);

  const issues: string[] = [];
  if (missingFiles.length > 0) {
    issues.push(`Missing: ${missingFiles.length} accessed file(s) were not selected`);
  }
  if (selected.length > 0 && precision < 0.5) {
    issues.push(`Unnecessary: ${Math.round((1 - precision) * 100)}% of selected files were never accessed`);
  }
  if (data.errors.length > 0) {
    issues.push(`Errors: ${data.errors.length} error(s) during execution`);
  }

  return {
    precision,
    recall,
    missingFiles,
    unnecessaryFiles,
    tokenReduction,
    quality,
    success: data.status === 'success',
    issues,
  };
}

/**
 * Outcome record for the adaptive manager.
 */
export function outcomeFromEvaluation(
  selection: SelectedContext,
  taskType: TaskType,
  evaluation: SelectionEvaluation
): SelectionOutcome {
  return {
    taskType,
    strategy: selection.strategy,
    tokensUsed: selection.totalTokens,
    quality: evaluation.quality,
    success: evaluation.success,
  };
}

function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

/**
 * Format an evaluation as a human-readable report.
 */
export function formatEvalReport(evaluation: SelectionEvaluation): string {
  const lines: string[] = [];

  lines.push('=== Context Selection Report ===');
  lines.push('');
  lines.push(`Quality: ${evaluation.quality.toFixed(2)} (${evaluation.success ? 'success' : 'not successful'})`);
  lines.push(`Precision: ${percent(evaluation.precision)}`);
  lines.push(`Recall:    ${percent(evaluation.recall)}`);
  if (evaluation.tokenReduction !== null) {
    lines.push(`Token reduction: ${percent(evaluation.tokenReduction)}`);
  }

  if (evaluation.missingFiles.length > 0) {
    lines.push('');
    lines.push('--- Missing ---');
    for (const path of evaluation.missingFiles) {
      lines.push(`  - ${path}`);
    }
  }

  if (evaluation.unnecessaryFiles.length > 0) {
    lines.push('');
    lines.push('--- Unnecessary ---');
    for (const path of evaluation.unnecessaryFiles) {
      lines.push(`  - ${path}`);
    }
  }

  if (evaluation.issues.length > 0) {
    lines.push('');
    lines.push('--- Issues ---');
    for (const issue of evaluation.issues) {
      lines.push(`  - ${issue}`);
    }
  }

  return lines.join('\n');
}
