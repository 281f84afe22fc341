/**
 * JSON shapes for selections, shared by the CLI and the MCP server.
 */

import type { ProjectSnapshot } from '../context/snapshot.js';
import type { SelectedContext } from '../context/types.js';

export interface SelectionJSON {
  strategy: string;
  total_files: number;
  total_tokens: number;
  max_tokens: number;
  max_files: number;
  selection_score: number;
  files: Array<{
    path: string;
    tokens: number;
    score: number;
    reason: string;
  }>;
  adaptation_reasons: string[];
  diagnostics: string[];
}

export interface ProjectJSON {
  root: string;
  fingerprint: string;
  total_files: number;
  total_tokens: number;
}

export function selectionToJSON(selection: SelectedContext): SelectionJSON {
  return {
    strategy: selection.strategy,
    total_files: selection.totalFiles,
    total_tokens: selection.totalTokens,
    max_tokens: selection.budget.maxTokens,
    max_files: selection.budget.maxFiles,
    selection_score: selection.selectionScore,
    files: selection.files.map((entry) => ({
      path: entry.file.path,
      tokens: entry.file.tokenCount,
      score: entry.score,
      reason: entry.reason,
    })),
    adaptation_reasons: [...selection.adaptationReasons],
    diagnostics: [...selection.diagnostics],
  };
}

export function projectToJSON(snapshot: ProjectSnapshot): ProjectJSON {
  return {
    root: snapshot.root,
    fingerprint: snapshot.fingerprint,
    total_files: snapshot.files.length,
    total_tokens: snapshot.totalTokens,
  };
}
