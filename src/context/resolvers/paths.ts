/**
 * Resolve "." and ".." segments in a slash-separated path.
 */
export function normalizePath(path: string): string {
  const normalized: string[] = [];
  for (const part of path.split('/')) {
    if (part === '.' || part === '') continue;
    if (part === '..') {
      normalized.pop();
    } else {
      normalized.push(part);
    }
  }
  return normalized.join('/');
}

/**
 * Directory part of a project-relative path ("" at the root).
 */
export function dirname(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash >= 0 ? path.substring(0, slash) : '';
}

/**
 * Join a directory and a relative specifier, then normalize.
 */
export function joinRelative(fromFile: string, specifier: string): string {
  const dir = dirname(fromFile);
  return normalizePath(dir ? `${dir}/${specifier}` : specifier);
}
