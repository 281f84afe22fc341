/**
 * Context Assembly
 *
 * Loads the contents of a selection through a caller-supplied reader,
 * compresses each file and fits the result into a token budget. The engine
 * itself never touches the filesystem; the reader decides where content
 * comes from.
 */

import { describeError } from '../lib/errors.js';
import { compressContent, type CompressionStrategy } from './compression.js';
import { defaultTokenCounter, truncateToTokenBudget, type TokenCounter } from './token-counter.js';
import type { SelectedContext } from './types.js';

/** Resolves a project-relative path to its content, or null when absent */
export type SourceReader = (path: string) => Promise<string | null>;

export interface AssembleOptions {
  /** Token budget for the assembled text; defaults to the selection's */
  maxTokens: number;
  compression: CompressionStrategy;
  counter: TokenCounter;
}

export interface AssembledFile {
  path: string;
  language: string;
  content: string;
  tokens: number;
  truncated: boolean;
}

export interface AssembledContext {
  files: AssembledFile[];
  totalTokens: number;
  /** Selected paths the reader had no content for */
  missing: string[];
  /** Selected paths left out because the budget ran out */
  omitted: string[];
  /** Reader failures, as `path: reason` */
  errors: string[];
}

/**
 * Load, compress and budget the selected files, in selection order.
 */
export async function assembleContext(
  selection: SelectedContext,
  read: SourceReader,
  options: Partial<AssembleOptions> = {}
): Promise<AssembledContext> {
  const maxTokens = options.maxTokens ?? selection.budget.maxTokens;
  const compression = options.compression ?? 'none';
  const counter = options.counter ?? defaultTokenCounter;

  const errors: string[] = [];
  const failed = new Set<string>();
  const contents = await Promise.all(
    selection.files.map(async (entry) => {
      try {
        return await read(entry.file.path);
      } catch (error) {
        errors.push(`${entry.file.path}: ${describeError(error)}`);
        failed.add(entry.file.path);
        return null;
      }
    })
  );

  const files: AssembledFile[] = [];
  const missing: string[] = [];
  const omitted: string[] = [];
  let totalTokens = 0;
  let exhausted = false;

  selection.files.forEach((entry, index) => {
    const { path, language } = entry.file;
    const content = contents[index];
    if (content === null) {
      if (!failed.has(path)) missing.push(path);
      return;
    }

    const remaining = maxTokens - totalTokens;
    if (exhausted || remaining <= 0) {
      omitted.push(path);
      return;
    }

    const compressed = compressContent(content, entry.file, compression, counter);
    if (compressed.compressedTokens <= remaining) {
      files.push({ path, language, content: compressed.content, tokens: compressed.compressedTokens, truncated: false });
      totalTokens += compressed.compressedTokens;
      return;
    }

    const truncated = truncateToTokenBudget(compressed.content, remaining, undefined, counter);
    const tokens = Math.min(remaining, counter.count(truncated));
    files.push({ path, language, content: truncated, tokens, truncated: true });
    totalTokens += tokens;
    exhausted = true;
  });

  return { files, totalTokens, missing, omitted, errors };
}

function fenceLanguage(path: string): string {
  const name = path.substring(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.substring(dot + 1) : '';
}

/**
 * Format assembled context as a Markdown prompt section.
 */
export function formatAssembledContext(assembled: AssembledContext, title = 'Selected Context'): string {
  if (assembled.files.length === 0) return '';

  const count = assembled.files.length;
  const sections: string[] = [`## ${title}\n\n${count} ${count === 1 ? 'file' : 'files'}, ~${assembled.totalTokens} tokens:`];

  for (const file of assembled.files) {
    sections.push(`### ${file.path}\n\n\`\`\`${fenceLanguage(file.path)}\n${file.content}\n\`\`\``);
  }

  return sections.join('\n\n');
}
