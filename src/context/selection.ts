/**
 * SelectedContext construction helpers. Every selection leaving the engine
 * is deep-frozen; adding reasons produces a new object.
 */

import type { ContextFile, SelectedContext, SelectionStrategy } from './types.js';

export interface SelectionParts {
  files: readonly ContextFile[];
  strategy: SelectionStrategy;
  adaptationReasons: readonly string[];
  diagnostics: readonly string[];
  maxTokens: number;
  maxFiles: number;
  projectFingerprint: string;
}

export function freezeSelection(parts: SelectionParts): SelectedContext {
  const files = Object.freeze(parts.files.map((entry) => Object.freeze({ ...entry })));
  const totalTokens = files.reduce((sum, entry) => sum + entry.file.tokenCount, 0);
  const selectionScore = files.length > 0
    ? files.reduce((sum, entry) => sum + entry.score, 0) / files.length
    : 0;

  return Object.freeze({
    files,
    totalTokens,
    totalFiles: files.length,
    strategy: parts.strategy,
    adaptationReasons: Object.freeze([...parts.adaptationReasons]),
    diagnostics: Object.freeze([...parts.diagnostics]),
    selectionScore,
    budget: Object.freeze({ maxTokens: parts.maxTokens, maxFiles: parts.maxFiles }),
    projectFingerprint: parts.projectFingerprint,
  });
}

/**
 * A copy of the selection with extra adaptation reasons appended.
 */
export function withAdaptationReasons(selection: SelectedContext, reasons: readonly string[]): SelectedContext {
  if (reasons.length === 0) return selection;
  return freezeSelection({
    files: selection.files,
    strategy: selection.strategy,
    adaptationReasons: [...selection.adaptationReasons, ...reasons],
    diagnostics: selection.diagnostics,
    maxTokens: selection.budget.maxTokens,
    maxFiles: selection.budget.maxFiles,
    projectFingerprint: selection.projectFingerprint,
  });
}

/** Paths of the selected files, in selection order */
export function selectedPaths(selection: SelectedContext): string[] {
  return selection.files.map((entry) => entry.file.path);
}

/** Mean tokens per selected file, 0 when empty */
export function averageTokensPerFile(selection: SelectedContext): number {
  return selection.totalFiles > 0 ? selection.totalTokens / selection.totalFiles : 0;
}
