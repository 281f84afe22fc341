/**
 * Error taxonomy for the context engine.
 *
 * ConfigurationError is thrown from constructors and factories only.
 * BudgetInfeasibleError is thrown by a selection that can return nothing.
 * PartialAnalysisFailure is recorded as a diagnostic and never escapes a selection.
 */

import type { ZodError } from 'zod';

export type ContextEngineErrorCode =
  | 'configuration_invalid'
  | 'budget_infeasible'
  | 'partial_analysis_failure';

export class ContextEngineError extends Error {
  readonly code: ContextEngineErrorCode;

  constructor(code: ContextEngineErrorCode, message: string) {
    super(message);
    this.name = 'ContextEngineError';
    this.code = code;
  }
}

export class ConfigurationError extends ContextEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration_invalid', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  /**
   * Wrap a zod validation failure, keeping one issue line per failing field.
   */
  static fromZod(subject: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ConfigurationError(`Invalid ${subject}`, issues);
  }
}

export class BudgetInfeasibleError extends ContextEngineError {
  readonly maxTokens: number;
  readonly smallestFileTokens: number | null;

  constructor(maxTokens: number, smallestFileTokens: number | null) {
    const detail = smallestFileTokens === null
      ? 'no candidate files'
      : `smallest candidate needs ${smallestFileTokens} tokens`;
    super('budget_infeasible', `No file fits a budget of ${maxTokens} tokens (${detail})`);
    this.name = 'BudgetInfeasibleError';
    this.maxTokens = maxTokens;
    this.smallestFileTokens = smallestFileTokens;
  }
}

export type AnalysisStage = 'dependency' | 'scoring';

export class PartialAnalysisFailure extends ContextEngineError {
  readonly path: string;
  readonly stage: AnalysisStage;

  constructor(path: string, stage: AnalysisStage, reason: string) {
    super('partial_analysis_failure', `${stage} analysis failed for ${path}: ${reason}`);
    this.name = 'PartialAnalysisFailure';
    this.path = path;
    this.stage = stage;
  }
}

/**
 * Extract a readable message from anything thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
