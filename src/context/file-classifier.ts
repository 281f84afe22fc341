/**
 * File Classification
 *
 * Derives a file's kind and language tag from its path, for collaborators
 * that hand over bare paths. Kinds are matched in order: test, doc, config,
 * then source when the language is a programming language.
 */

import { minimatch } from 'minimatch';
import { z } from 'zod';
import languageTable from './data/languages.json' with { type: 'json' };
import type { FileKind } from './types.js';

const languageTableSchema = z.object({
  extensions: z.record(z.string()),
  filenames: z.record(z.string()),
});

const LANGUAGES = languageTableSchema.parse(languageTable);

/** Languages whose files hold data or prose rather than code */
const NON_SOURCE_LANGUAGES = new Set([
  'markdown',
  'restructuredtext',
  'text',
  'yaml',
  'json',
  'toml',
  'xml',
  'ini',
  'go-module',
]);

export const TEST_PATTERNS = [
  '**/*_test.go',
  '**/*.test.*',
  '**/*.spec.*',
  '**/test_*.py',
  '**/*_test.py',
  '**/test/**',
  '**/tests/**',
  '**/__tests__/**',
  '**/testdata/**',
];

export const DOC_PATTERNS = [
  '**/*.md',
  '**/*.mdx',
  '**/*.rst',
  '**/*.txt',
  '**/*.adoc',
  '**/docs/**',
  '**/doc/**',
  '**/README*',
  '**/CHANGELOG*',
  '**/LICENSE*',
];

export const CONFIG_PATTERNS = [
  '**/*.yml',
  '**/*.yaml',
  '**/*.json',
  '**/*.toml',
  '**/*.ini',
  '**/*.xml',
  '**/*.config.*',
  '**/.env*',
  '**/.*rc',
  '**/Dockerfile*',
  '**/docker-compose*',
  '**/Makefile',
  '**/go.mod',
  '**/go.sum',
  '**/.github/**',
];

export const VENDOR_PATTERNS = [
  '**/vendor/**',
  '**/node_modules/**',
  '**/third_party/**',
  '**/external/**',
];

/**
 * Check if a path matches any of the given glob patterns.
 */
export function matchesPatterns(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(path, pattern, { dot: true, matchBase: true }));
}

export function isTestPath(path: string): boolean {
  return matchesPatterns(path, TEST_PATTERNS);
}

export function isDocPath(path: string): boolean {
  return matchesPatterns(path, DOC_PATTERNS);
}

export function isVendoredPath(path: string): boolean {
  return matchesPatterns(path, VENDOR_PATTERNS);
}

/**
 * Normalize a collaborator-supplied path to forward slashes without a
 * leading "./" or "/".
 */
export function normalizeFilePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

function basename(path: string): string {
  return path.substring(path.lastIndexOf('/') + 1);
}

/**
 * Language tag for a path, or "unknown".
 */
export function detectLanguage(path: string): string {
  const name = basename(path);
  const byName = LANGUAGES.filenames[name];
  if (byName) return byName;

  const dot = name.lastIndexOf('.');
  if (dot <= 0) return 'unknown';
  return LANGUAGES.extensions[name.substring(dot).toLowerCase()] ?? 'unknown';
}

/**
 * File kind for a path.
 */
export function classifyFile(path: string): FileKind {
  if (isTestPath(path)) return 'test';
  if (isDocPath(path)) return 'doc';
  if (matchesPatterns(path, CONFIG_PATTERNS)) return 'config';

  const language = detectLanguage(path);
  if (language !== 'unknown' && !NON_SOURCE_LANGUAGES.has(language)) {
    return 'source';
  }
  return 'unknown';
}
