/**
 * Task value objects and their fingerprints.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import { fingerprintParts } from '../lib/fingerprint.js';
import { normalizeFilePath } from './file-classifier.js';
import { TASK_TYPES, type Task } from './types.js';

export const taskInputSchema = z.object({
  type: z.enum(TASK_TYPES).default('general'),
  description: z.string().default(''),
  keywords: z.array(z.string()).default([]),
  mustInclude: z.array(z.string().min(1)).default([]),
});

export type TaskInput = z.input<typeof taskInputSchema>;

/**
 * Validate and freeze a task.
 */
export function createTask(input: TaskInput): Task {
  const parsed = taskInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('task', parsed.error);
  }

  const { type, description, keywords, mustInclude } = parsed.data;
  return Object.freeze({
    type,
    description,
    keywords: Object.freeze(keywords.map((k) => k.trim()).filter((k) => k.length > 0)),
    mustInclude: Object.freeze(mustInclude.map(normalizeFilePath)),
  });
}

/**
 * Stable identifier for a task: whitespace and case in the description and
 * the order of keywords and must-include entries do not matter.
 */
export function fingerprintTask(task: Task): string {
  const description = task.description.trim().toLowerCase().replace(/\s+/g, ' ');
  const keywords = [...new Set(task.keywords.map((k) => k.toLowerCase()))].sort();
  const mustInclude = [...new Set(task.mustInclude)].sort();
  return fingerprintParts([
    task.type,
    description,
    keywords.join(','),
    mustInclude.join(','),
  ]);
}

/**
 * Whether a path is named by a must-include entry: exactly, or as a
 * trailing run of whole path segments ("auth/login.go" names
 * "internal/auth/login.go").
 */
export function matchesMustInclude(path: string, mustInclude: readonly string[]): boolean {
  return mustInclude.some((entry) => path === entry || path.endsWith(`/${entry}`));
}

/**
 * Lowercased keywords from free text, without stop words and words of two
 * characters or fewer.
 */
export function extractKeywords(text: string, stopWords: ReadonlySet<string>): string[] {
  const keywords: string[] = [];
  for (const raw of text.toLowerCase().split(/\s+/)) {
    const word = raw.replace(/^[.,!?;:"'()]+|[.,!?;:"'()]+$/g, '');
    if (word.length > 2 && !stopWords.has(word) && !keywords.includes(word)) {
      keywords.push(word);
    }
  }
  return keywords;
}
