/**
 * Snapshot document schema shared by the CLI and the MCP server.
 *
 * A snapshot document is the JSON an analyzer writes: file records, and
 * optionally explicit edges or file contents to derive edges from.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { EDGE_STRENGTH, type DependencyEdge } from '../context/dependency-graph.js';
import { normalizeFilePath } from '../context/file-classifier.js';
import { createFileRecord } from '../context/file-record.js';
import { createSnapshot, type ProjectSnapshot } from '../context/snapshot.js';
import { defaultTokenCounter, type TokenCounter } from '../context/token-counter.js';
import { FILE_KINDS } from '../context/types.js';

export const fileEntrySchema = z
  .object({
    path: z.string().min(1),
    /** Computed from `content` when left out */
    tokenCount: z.number().optional(),
    lastModified: z.union([z.number(), z.string()]),
    size: z.number().int().min(0).optional(),
    kind: z.enum(FILE_KINDS).optional(),
    language: z.string().min(1).optional(),
    metadata: z.record(z.unknown()).optional(),
    /** Source text, used for token counting and import resolution */
    content: z.string().optional(),
  })
  .refine((file) => file.tokenCount !== undefined || file.content !== undefined, {
    message: 'tokenCount or content is required',
    path: ['tokenCount'],
  });

export const edgeEntrySchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  type: z.enum(['import', 'test']).default('import'),
  strength: z.number().min(0).max(1).optional(),
});

export const snapshotDocumentSchema = z.object({
  root: z.string().default('.'),
  files: z.array(fileEntrySchema),
  edges: z.array(edgeEntrySchema).optional(),
  goModulePath: z.string().min(1).optional(),
});

export type SnapshotDocument = z.input<typeof snapshotDocumentSchema>;
export type ParsedDocument = z.infer<typeof snapshotDocumentSchema>;

/**
 * @throws ConfigurationError when the value is not a snapshot document
 */
export function parseSnapshotDocument(value: unknown): ParsedDocument {
  const parsed = snapshotDocumentSchema.safeParse(value);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('snapshot document', parsed.error);
  }
  return parsed.data;
}

/**
 * Build a project snapshot from a parsed or raw snapshot document.
 *
 * @throws ConfigurationError for an invalid document, duplicate paths or
 * edges naming unknown files
 */
export function snapshotFromDocument(value: unknown, counter: TokenCounter = defaultTokenCounter): ProjectSnapshot {
  const document = parseSnapshotDocument(value);
  const sources = new Map<string, string>();

  const files = document.files.map((entry) => {
    const size = entry.size ?? (entry.content !== undefined ? Buffer.byteLength(entry.content, 'utf8') : undefined);
    const record = createFileRecord({
      path: entry.path,
      tokenCount: entry.tokenCount ?? counter.count(entry.content ?? ''),
      lastModified: entry.lastModified,
      size,
      kind: entry.kind,
      language: entry.language,
      metadata: entry.metadata,
    });
    if (entry.content !== undefined) sources.set(record.path, entry.content);
    return record;
  });

  const edges: DependencyEdge[] | undefined = document.edges?.map((edge) => ({
    from: normalizeFilePath(edge.from),
    to: normalizeFilePath(edge.to),
    type: edge.type,
    strength: edge.strength ?? EDGE_STRENGTH[edge.type],
  }));

  return createSnapshot({
    root: document.root,
    files,
    sources: sources.size > 0 ? sources : undefined,
    edges,
    goModulePath: document.goModulePath,
  });
}
