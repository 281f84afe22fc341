/**
 * Relevance Scorer
 *
 * Scores each file 0..1 for a task as a weighted sum of independent factors.
 * Dependency scoring runs in two phases: every file is first scored without
 * the dependency factor, then files connected to the strongest first-phase
 * files (the anchors) earn dependency credit in the final pass.
 */

import { PartialAnalysisFailure, describeError } from '../lib/errors.js';
import type { DependencyGraph } from './dependency-graph.js';
import { isDocPath, isTestPath, isVendoredPath } from './file-classifier.js';
import { resolveScorerConfig, type ScorerConfig, type ScorerConfigInput } from './scoring-config.js';
import { extractKeywords, matchesMustInclude } from './task.js';
import type { FileRecord, ScoredFile, ScoringFactor, ScoringFactors, Task } from './types.js';

export interface ScoringOptions {
  graph?: DependencyGraph;
  /** Reference time for recency, ms since the epoch */
  now?: number;
  /** Called once per file whose scoring failed */
  onFailure?: (failure: PartialAnalysisFailure) => void;
}

/**
 * Anything that can rank a file set for a task. The optimizer depends on
 * this seam so tests can count or replace scoring calls.
 */
export interface FileScorer {
  scoreAll(files: readonly FileRecord[], task: Task, options?: ScoringOptions): ScoredFile[];
}

const FACTOR_NAMES: readonly ScoringFactor[] = [
  'keywordMatch',
  'pathRelevance',
  'fileType',
  'recency',
  'size',
  'dependency',
  'taskType',
  'language',
];

const ZERO_FACTORS: Readonly<ScoringFactors> = Object.freeze({
  keywordMatch: 0,
  pathRelevance: 0,
  fileType: 0,
  recency: 0,
  size: 0,
  dependency: 0,
  taskType: 0,
  language: 0,
});

const NEUTRAL = 0.5;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function basename(path: string): string {
  return path.substring(path.lastIndexOf('/') + 1);
}

export function compareScored(a: ScoredFile, b: ScoredFile): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.file.path < b.file.path ? -1 : a.file.path > b.file.path ? 1 : 0;
}

interface PhaseOne {
  file: FileRecord;
  factors: Omit<ScoringFactors, 'dependency'>;
  score: number;
}

export class RelevanceScorer implements FileScorer {
  readonly config: ScorerConfig;
  private readonly stopWords: ReadonlySet<string>;
  private readonly clock: () => number;

  /**
   * @throws ConfigurationError for invalid weights or parameters
   */
  constructor(config: ScorerConfigInput = {}, clock: () => number = Date.now) {
    this.config = resolveScorerConfig(config);
    this.stopWords = new Set(this.config.tables.stopWords);
    this.clock = clock;
  }

  /**
   * Score one file. Without the rest of the file set there are no anchors,
   * so the dependency factor falls back to graph centrality.
   */
  score(file: FileRecord, task: Task, options: ScoringOptions = {}): number {
    return this.scoreFile(file, task, options).score;
  }

  scoreFile(file: FileRecord, task: Task, options: ScoringOptions = {}): ScoredFile {
    const now = options.now ?? this.clock();
    try {
      const base = this.baseFactors(file, task, this.taskKeywords(task), now);
      const dependency = options.graph ? options.graph.centrality(file.path) : 0;
      return this.finish(file, { ...base, dependency });
    } catch (error) {
      return this.failed(file, error, options);
    }
  }

  /**
   * Score every file, sorted by score descending then path.
   */
  scoreAll(files: readonly FileRecord[], task: Task, options: ScoringOptions = {}): ScoredFile[] {
    const now = options.now ?? this.clock();
    const keywords = this.taskKeywords(task);

    const phaseOne: PhaseOne[] = [];
    const results: ScoredFile[] = [];
    for (const file of files) {
      try {
        const factors = this.baseFactors(file, task, keywords, now);
        phaseOne.push({ file, factors, score: this.phaseOneScore(factors) });
      } catch (error) {
        results.push(this.failed(file, error, options));
      }
    }

    const anchors = this.selectAnchors(phaseOne);
    for (const entry of phaseOne) {
      const dependency = options.graph ? this.anchorConnectivity(entry.file.path, anchors, options.graph) : 0;
      results.push(this.finish(entry.file, { ...entry.factors, dependency }));
    }

    return results.sort(compareScored);
  }

  /**
   * Keywords for a task: the explicit list when given, else extracted from
   * the description.
   */
  taskKeywords(task: Task): string[] {
    if (task.keywords.length > 0) {
      return [...new Set(task.keywords.map((k) => k.toLowerCase()))];
    }
    return extractKeywords(task.description, this.stopWords);
  }

  // --- Factors ---

  private baseFactors(
    file: FileRecord,
    task: Task,
    keywords: readonly string[],
    now: number
  ): Omit<ScoringFactors, 'dependency'> {
    if (!Number.isFinite(file.tokenCount) || file.tokenCount < 0) {
      throw new Error(`invalid token count ${file.tokenCount}`);
    }
    if (!Number.isFinite(file.lastModified)) {
      throw new Error('invalid last-modified timestamp');
    }

    return {
      keywordMatch: this.keywordScore(file, task, keywords),
      pathRelevance: this.pathScore(file, task),
      fileType: this.fileTypeScore(file, task),
      recency: this.recencyScore(file, now),
      size: this.sizeScore(file),
      taskType: this.taskTypeScore(file, task),
      language: this.languageScore(file, task),
    };
  }

  private keywordScore(file: FileRecord, task: Task, keywords: readonly string[]): number {
    if (matchesMustInclude(file.path, task.mustInclude)) return 1;
    if (keywords.length === 0) return NEUTRAL;

    const path = file.path.toLowerCase();
    const name = basename(path);
    let hits = 0;
    for (const keyword of keywords) {
      if (name.includes(keyword)) hits += 2;
      if (path.includes(keyword)) hits += 1;
    }
    return Math.min(1, hits / (2 * keywords.length));
  }

  private pathScore(file: FileRecord, task: Task): number {
    if (isVendoredPath(file.path)) return 0.1;
    if (task.type !== 'test' && isTestPath(file.path)) return 0.2;
    if (task.type !== 'documentation' && isDocPath(file.path)) return 0.3;

    const directories = file.path.toLowerCase().split('/').slice(0, -1);
    let best: number | null = null;
    for (const dir of directories) {
      const boost = this.config.tables.coreDirectories[dir];
      if (boost !== undefined && (best === null || boost > best)) {
        best = boost;
      }
    }
    return best ?? NEUTRAL;
  }

  private fileTypeScore(file: FileRecord, task: Task): number {
    return this.config.tables.fileTypePreferences[task.type]?.[file.kind] ?? NEUTRAL;
  }

  private recencyScore(file: FileRecord, now: number): number {
    const age = Math.max(0, now - file.lastModified);
    return Math.exp((-Math.LN2 * age) / this.config.recencyHalfLifeMs);
  }

  private sizeScore(file: FileRecord): number {
    const { optimalTokens, sizePenalty, minSizeScore } = this.config;
    const tokens = file.tokenCount;
    if (tokens <= 0) return 0;
    if (tokens <= optimalTokens) return tokens / optimalTokens;

    const over = (tokens - optimalTokens) / optimalTokens;
    return Math.max(minSizeScore, 1 - over * sizePenalty);
  }

  private taskTypeScore(file: FileRecord, task: Task): number {
    const rule = this.config.tables.taskPatterns[task.type];
    if (!rule) return NEUTRAL;

    const path = `/${file.path.toLowerCase()}`;
    return rule.patterns.some((pattern) => path.includes(pattern)) ? rule.score : NEUTRAL;
  }

  private languageScore(file: FileRecord, task: Task): number {
    return this.config.tables.languagePreferences[file.language]?.[task.type] ?? NEUTRAL;
  }

  // --- Aggregation ---

  /**
   * Weighted sum without the dependency factor, rescaled so the remaining
   * weights sum to 1.
   */
  private phaseOneScore(factors: Omit<ScoringFactors, 'dependency'>): number {
    const { weights } = this.config;
    const remaining = 1 - weights.dependency;
    if (remaining <= 0) return 0;

    let sum = 0;
    for (const name of FACTOR_NAMES) {
      if (name === 'dependency') continue;
      sum += weights[name] * factors[name];
    }
    return clamp01(sum / remaining);
  }

  private selectAnchors(phaseOne: readonly PhaseOne[]): Map<string, number> {
    const eligible = phaseOne
      .filter((entry) => entry.score >= this.config.anchorThreshold)
      .sort((a, b) => b.score - a.score || (a.file.path < b.file.path ? -1 : 1))
      .slice(0, this.config.maxAnchors);
    return new Map(eligible.map((entry) => [entry.file.path, entry.score]));
  }

  private anchorConnectivity(path: string, anchors: ReadonlyMap<string, number>, graph: DependencyGraph): number {
    let connectivity = 0;
    for (const [anchor, anchorScore] of anchors) {
      if (anchor === path) continue;
      connectivity += graph.strengthBetween(path, anchor) * anchorScore;
    }
    return Math.min(1, connectivity / this.config.dependencySaturation);
  }

  private finish(file: FileRecord, factors: ScoringFactors): ScoredFile {
    const { weights } = this.config;
    let sum = 0;
    for (const name of FACTOR_NAMES) {
      sum += weights[name] * factors[name];
    }
    return Object.freeze({ file, score: clamp01(sum), factors: Object.freeze(factors) });
  }

  private failed(file: FileRecord, error: unknown, options: ScoringOptions): ScoredFile {
    options.onFailure?.(new PartialAnalysisFailure(file.path, 'scoring', describeError(error)));
    return Object.freeze({ file, score: 0, factors: ZERO_FACTORS });
  }
}
