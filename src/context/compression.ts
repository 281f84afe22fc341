/**
 * Content compression for selected files.
 *
 * Line-based and language-aware: nothing here parses code, so results are
 * approximate for unusual formatting.
 */

import { defaultTokenCounter, type TokenCounter } from './token-counter.js';
import type { FileRecord } from './types.js';

export const COMPRESSION_STRATEGIES = ['none', 'minify', 'snippet', 'summary'] as const;
export type CompressionStrategy = (typeof COMPRESSION_STRATEGIES)[number];

export interface CompressedFile {
  path: string;
  content: string;
  originalTokens: number;
  compressedTokens: number;
  /** compressed / original tokens; 1 for empty input */
  ratio: number;
  strategy: CompressionStrategy;
}

interface LanguageSyntax {
  lineComment: string | null;
  blockComment: boolean;
  braces: boolean;
  packageLine: RegExp | null;
  importLine: RegExp;
  /** Opens a multi-line import list, closed by a line holding only `)` */
  importBlock: RegExp | null;
  typeLine: RegExp;
  functionStart: RegExp;
}

const GO: LanguageSyntax = {
  lineComment: '//',
  blockComment: true,
  braces: true,
  packageLine: /^package\s/,
  importLine: /^import\s+(?:\w+\s+)?"/,
  importBlock: /^import\s*\($/,
  typeLine: /^type\s/,
  functionStart: /^func\s/,
};

const SCRIPT: LanguageSyntax = {
  lineComment: '//',
  blockComment: true,
  braces: true,
  packageLine: null,
  importLine: /^import\s|^(?:const|let|var)\s.*=\s*require\(/,
  importBlock: null,
  typeLine: /^(?:export\s+)?(?:declare\s+)?(?:abstract\s+)?(?:interface|type|class|enum)\s/,
  functionStart: /^(?:export\s+)?(?:default\s+)?(?:async\s+)?function[\s*]|^(?:export\s+)?const\s+\w+\s*=\s*(?:async\s+)?\(/,
};

const PYTHON: LanguageSyntax = {
  lineComment: '#',
  blockComment: false,
  braces: false,
  packageLine: null,
  importLine: /^(?:import|from)\s/,
  importBlock: null,
  typeLine: /^class\s/,
  functionStart: /^(?:async\s+)?def\s/,
};

const SYNTAX: Readonly<Record<string, LanguageSyntax>> = {
  go: GO,
  typescript: SCRIPT,
  javascript: SCRIPT,
  python: PYTHON,
};

const RATIO_ESTIMATES: Readonly<Record<CompressionStrategy, number>> = {
  none: 1.0,
  minify: 0.8,
  snippet: 0.4,
  summary: 0.3,
};

/** Lines of an unknown-language file kept at each end of a summary */
const GENERIC_EDGE_LINES = 3;

/**
 * Typical compressed/original token ratio for a strategy, for budgeting
 * before any content is loaded.
 */
export function estimateCompressionRatio(strategy: CompressionStrategy): number {
  return RATIO_ESTIMATES[strategy];
}

export function isCompressionStrategy(value: string): value is CompressionStrategy {
  return COMPRESSION_STRATEGIES.some((strategy) => strategy === value);
}

function indentOf(line: string): string {
  return line.match(/^\s*/)?.[0] ?? '';
}

function stripComments(content: string, syntax: LanguageSyntax): string {
  let result = syntax.blockComment ? content.replace(/\/\*[\s\S]*?\*\//g, '') : content;
  if (syntax.lineComment) {
    const marker = syntax.lineComment.replace(/[/]/g, '\\/');
    const lineComment = new RegExp(`(^|\\s)${marker}.*$`);
    result = result
      .split('\n')
      .map((line) => line.replace(lineComment, '$1'))
      .join('\n');
  }
  return result;
}

function minify(content: string, syntax: LanguageSyntax | undefined): string {
  const stripped = syntax ? stripComments(content, syntax) : content;
  return stripped
    .split('\n')
    .map((line) => indentOf(line) + line.trim().replace(/[ \t]+/g, ' '))
    .filter((line) => line.trim() !== '')
    .join('\n');
}

function importLines(lines: readonly string[], syntax: LanguageSyntax): string[] {
  const result: string[] = [];
  let inBlock = false;
  for (const line of lines) {
    const trimmed = line.trim();
    if (inBlock) {
      result.push(line);
      if (trimmed === ')') inBlock = false;
    } else if (syntax.importBlock?.test(trimmed)) {
      result.push(line);
      inBlock = true;
    } else if (syntax.importLine.test(trimmed)) {
      result.push(line);
    }
  }
  return result;
}

/**
 * Index of the line closing the brace block opened at `start`, or -1.
 */
function closingLine(lines: readonly string[], start: number): number {
  const head = lines[start];
  if (head.trimEnd().endsWith('}')) return -1;
  const indent = indentOf(head);
  for (let i = start + 1; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if ((trimmed === '}' || trimmed === '};') && indentOf(lines[i]) === indent) return i;
  }
  return -1;
}

function snippet(content: string, file: Pick<FileRecord, 'path'>, syntax: LanguageSyntax): string {
  const lines = content.split('\n');
  const marker = syntax.lineComment ?? '#';
  const out = [`${marker} snippets from ${file.path}`, ...importLines(lines, syntax), ''];

  lines.forEach((line, index) => {
    if (!syntax.functionStart.test(line.trim())) return;
    out.push(line);
    const indent = indentOf(line);
    if (syntax.braces) {
      const end = closingLine(lines, index);
      if (end < 0) return;
      out.push(`${indent}    ${marker} ...`);
      out.push(lines[end]);
    } else {
      out.push(`${indent}    ...`);
    }
  });

  return out.join('\n').trimEnd();
}

function summaryBody(lines: readonly string[], syntax: LanguageSyntax): string[] {
  const body: string[] = [];
  const imports = new Set(importLines(lines, syntax));
  for (const line of lines) {
    const trimmed = line.trim();
    if (imports.has(line) || syntax.packageLine?.test(trimmed) || syntax.typeLine.test(trimmed)) {
      body.push(line);
    } else if (syntax.functionStart.test(trimmed)) {
      const signature = line.trimEnd().replace(/\s*\{$/, '').replace(/:$/, '');
      body.push(syntax.braces ? `${signature} { ... }` : `${signature}: ...`);
    }
  }
  return body;
}

function summary(
  content: string,
  file: Pick<FileRecord, 'path' | 'language'>,
  syntax: LanguageSyntax | undefined,
  originalTokens: number
): string {
  const lines = content.split('\n');
  const marker = syntax?.lineComment ?? '#';
  const header = `${marker} summary of ${file.path} (${file.language}, ${originalTokens} tokens)`;

  if (syntax) {
    return [header, ...summaryBody(lines, syntax)].join('\n');
  }

  if (lines.length <= GENERIC_EDGE_LINES * 2 + 1) {
    return [header, ...lines].join('\n');
  }
  return [
    header,
    ...lines.slice(0, GENERIC_EDGE_LINES),
    `${marker} ... ${lines.length - GENERIC_EDGE_LINES * 2} lines omitted ...`,
    ...lines.slice(-GENERIC_EDGE_LINES),
  ].join('\n');
}

function compressText(
  content: string,
  file: Pick<FileRecord, 'path' | 'language'>,
  strategy: CompressionStrategy,
  originalTokens: number
): string {
  const syntax: LanguageSyntax | undefined = SYNTAX[file.language];
  switch (strategy) {
    case 'none':
      return content;
    case 'minify':
      return minify(content, syntax);
    case 'snippet':
      // unknown languages have no function shape to cut along
      return syntax ? snippet(content, file, syntax) : minify(content, syntax);
    case 'summary':
      return summary(content, file, syntax, originalTokens);
  }
}

/**
 * Compress one file's content.
 */
export function compressContent(
  content: string,
  file: Pick<FileRecord, 'path' | 'language'>,
  strategy: CompressionStrategy,
  counter: TokenCounter = defaultTokenCounter
): CompressedFile {
  const originalTokens = counter.count(content);
  const compressed = compressText(content, file, strategy, originalTokens);
  const compressedTokens = strategy === 'none' ? originalTokens : counter.count(compressed);

  return {
    path: file.path,
    content: compressed,
    originalTokens,
    compressedTokens,
    ratio: originalTokens > 0 ? compressedTokens / originalTokens : 1,
    strategy,
  };
}
