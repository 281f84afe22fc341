import { createHash } from 'node:crypto';

/**
 * SHA-256 hex digest of a string.
 */
export function hashContent(content: string): string {
  const hash = createHash('sha256');
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Hash a list of parts joined with a separator that cannot appear in paths.
 */
export function fingerprintParts(parts: readonly string[]): string {
  return hashContent(parts.join('\u0000'));
}
