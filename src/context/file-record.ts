/**
 * FileRecord construction for analyzer collaborators.
 */

import { classifyFile, detectLanguage, normalizeFilePath } from './file-classifier.js';
import type { FileKind, FileRecord } from './types.js';

export interface FileRecordInput {
  path: string;
  tokenCount: number;
  /** Milliseconds since the epoch, an ISO-8601 string, or a Date */
  lastModified: number | string | Date;
  size?: number;
  kind?: FileKind;
  language?: string;
  metadata?: Record<string, unknown>;
}

function toEpochMillis(value: number | string | Date): number {
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value.getTime();
  return Date.parse(value);
}

/**
 * Build an immutable FileRecord, deriving kind and language from the path
 * when the collaborator leaves them out.
 *
 * Values are not validated here: a corrupt token count or timestamp is
 * reported by the scorer as a partial analysis failure for that file only.
 */
export function createFileRecord(input: FileRecordInput): FileRecord {
  const path = normalizeFilePath(input.path);

  return Object.freeze({
    path,
    size: input.size ?? 0,
    tokenCount: input.tokenCount,
    lastModified: toEpochMillis(input.lastModified),
    kind: input.kind ?? classifyFile(path),
    language: input.language ?? detectLanguage(path),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
}
