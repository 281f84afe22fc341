/**
 * Context Optimizer
 *
 * Packs scored files into a token and file budget. A strategy decides the
 * order; packing is greedy: a file that does not fit is skipped, never
 * truncated. Must-include files are packed first and always kept, even past
 * the token budget.
 */

import { BudgetInfeasibleError } from '../lib/errors.js';
import type { ContextConstraints } from './constraints.js';
import { matchesPatterns } from './file-classifier.js';
import { RelevanceScorer, type FileScorer } from './relevance-scorer.js';
import { freezeSelection } from './selection.js';
import type { ProjectSnapshot } from './snapshot.js';
import { matchesMustInclude } from './task.js';
import type { ContextFile, FileRecord, InclusionReason, ScoredFile, SelectedContext, SelectionStrategy, Task } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OptimizerOptions {
  /** Reference time for recency and freshness, ms since the epoch */
  clock?: () => number;
  verbose?: boolean;
}

/**
 * Anything that turns a snapshot and task into a selection. The cache and
 * the adaptive manager wrap this seam.
 */
export interface ContextSelector {
  select(snapshot: ProjectSnapshot, task: Task, constraints: ContextConstraints): SelectedContext;
}

export interface RankedFile {
  scored: ScoredFile;
  key: number;
}

function compareRanked(a: RankedFile, b: RankedFile): number {
  if (a.key !== b.key) return b.key - a.key;
  const pa = a.scored.file.path;
  const pb = b.scored.file.path;
  if (pa.length !== pb.length) return pa.length - pb.length;
  return pa < pb ? -1 : pa > pb ? 1 : 0;
}

function hasUsableTokenCount(file: FileRecord): boolean {
  return Number.isFinite(file.tokenCount) && file.tokenCount >= 0;
}

/** Score per token, so small relevant files rank first */
function density(scored: ScoredFile): number {
  return scored.score / Math.max(1, scored.file.tokenCount);
}

export class ContextOptimizer implements ContextSelector {
  private readonly scorer: FileScorer;
  private readonly clock: () => number;
  private readonly verbose: boolean;

  constructor(scorer: FileScorer = new RelevanceScorer(), options: OptimizerOptions = {}) {
    this.scorer = scorer;
    this.clock = options.clock ?? Date.now;
    this.verbose = options.verbose ?? (process.env.DEBUG_CONTEXT_ENGINE === 'true');
  }

  /**
   * Select the files for a task.
   *
   * @throws BudgetInfeasibleError only when `failOnEmpty` is set and nothing
   * could be selected
   */
  select(snapshot: ProjectSnapshot, task: Task, requested: ContextConstraints): SelectedContext {
    const constraints = requested.forTask(task.type);
    const now = this.clock();
    const diagnostics = snapshot.diagnostics.map((failure) => failure.message);
    const reasons: string[] = [];

    for (const entry of task.mustInclude) {
      if (!snapshot.files.some((f) => matchesMustInclude(f.path, [entry]))) {
        diagnostics.push(`must-include path not found: ${entry}`);
      }
    }

    const candidates = snapshot.files.filter((file) => {
      if (matchesMustInclude(file.path, task.mustInclude)) return true;
      if (constraints.excludePatterns.length > 0 && matchesPatterns(file.path, constraints.excludePatterns)) {
        return false;
      }
      if (!constraints.includeTests && file.kind === 'test') return false;
      if (!constraints.includeDocs && file.kind === 'doc') return false;
      return true;
    });

    const scored = this.scorer.scoreAll(candidates, task, {
      graph: snapshot.graph,
      now,
      onFailure: (failure) => diagnostics.push(failure.message),
    });
    const scoredByPath = new Map(scored.map((s) => [s.file.path, s]));

    // files that failed scoring carry no usable size and are never packed
    const eligible = scored.filter(
      (s) =>
        hasUsableTokenCount(s.file) &&
        (s.score >= constraints.minRelevanceScore || matchesMustInclude(s.file.path, task.mustInclude))
    );
    const ranked = this.rank(eligible, constraints.strategy, constraints.freshnessBias, snapshot, now);

    // --- Packing ---
    const selected: ContextFile[] = [];
    const chosen = new Set<string>();
    let tokens = 0;

    const add = (entry: ScoredFile, reason: InclusionReason) => {
      selected.push({ file: entry.file, score: entry.score, reason });
      chosen.add(entry.file.path);
      tokens += entry.file.tokenCount;
    };

    const expand = (from: ScoredFile) => {
      if (constraints.strategy !== 'dependency' || constraints.dependencyDepth === 0) return;
      for (const dep of snapshot.graph.collectDependencies(from.file.path, constraints.dependencyDepth)) {
        if (chosen.has(dep.path)) continue;
        const entry = scoredByPath.get(dep.path);
        if (!entry) continue;
        if (selected.length >= constraints.maxFiles) return;
        if (tokens + entry.file.tokenCount > constraints.maxTokens) continue;
        add(entry, 'dependency');
        reasons.push(`dependency pulled in transitively: ${dep.path} (imported by ${dep.via})`);
      }
    };

    for (const { scored: entry } of ranked) {
      if (!matchesMustInclude(entry.file.path, task.mustInclude)) continue;
      if (selected.length >= constraints.maxFiles) {
        reasons.push(`must-include file dropped, file limit of ${constraints.maxFiles} reached: ${entry.file.path}`);
        continue;
      }
      add(entry, 'must-include');
      if (tokens > constraints.maxTokens) {
        reasons.push(
          `must-include file exceeds token budget: ${entry.file.path} (${tokens} of ${constraints.maxTokens} tokens)`
        );
      }
      expand(entry);
    }

    for (const { scored: entry } of ranked) {
      if (selected.length >= constraints.maxFiles) break;
      if (chosen.has(entry.file.path)) continue;
      if (tokens + entry.file.tokenCount > constraints.maxTokens) continue;
      add(entry, 'ranked');
      expand(entry);
    }

    if (selected.length === 0 && constraints.failOnEmpty && snapshot.files.length > 0) {
      const sizes = candidates.filter(hasUsableTokenCount).map((f) => f.tokenCount);
      throw new BudgetInfeasibleError(constraints.maxTokens, sizes.length > 0 ? Math.min(...sizes) : null);
    }

    const selection = freezeSelection({
      files: selected,
      strategy: constraints.strategy,
      adaptationReasons: reasons,
      diagnostics,
      maxTokens: constraints.maxTokens,
      maxFiles: constraints.maxFiles,
      projectFingerprint: snapshot.fingerprint,
    });

    if (this.verbose) {
      console.log(
        `\n📦 Selected ${selection.totalFiles}/${snapshot.files.length} files ` +
        `(${selection.totalTokens}/${constraints.maxTokens} tokens, ${constraints.strategy})`
      );
      for (const diagnostic of diagnostics) {
        console.warn(`   ⚠️  ${diagnostic}`);
      }
    }

    return selection;
  }

  /**
   * Order files by the strategy's key; ties go to the shorter path, then
   * lexical order.
   */
  rank(
    files: readonly ScoredFile[],
    strategy: SelectionStrategy,
    freshnessBias: number,
    snapshot: ProjectSnapshot,
    now: number
  ): RankedFile[] {
    const maxDensity = files.reduce((max, s) => Math.max(max, density(s)), 0);

    const keyOf = (s: ScoredFile): number => {
      switch (strategy) {
        case 'relevance':
          return s.score;
        case 'dependency':
          return 0.7 * s.score + 0.3 * snapshot.graph.centrality(s.file.path);
        case 'freshness': {
          const fresh = now - s.file.lastModified < DAY_MS ? 1 : s.factors.recency;
          return s.score * (1 - freshnessBias) + fresh * freshnessBias;
        }
        case 'compactness':
          return density(s);
        case 'balanced':
          return 0.5 * s.score + 0.5 * (maxDensity > 0 ? density(s) / maxDensity : 0);
      }
    };

    return files.map((scored) => ({ scored, key: keyOf(scored) })).sort(compareRanked);
  }
}
