/**
 * Relevance scoring configuration.
 *
 * Weights must sum to 1.0. Preference tables, stop words and task patterns
 * ship in data/scoring-defaults.json and are validated on load.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';
import scoringDefaults from './data/scoring-defaults.json' with { type: 'json' };
import type { ScoringFactor } from './types.js';

const unit = z.number().min(0).max(1);

const scoringTablesSchema = z.object({
  stopWords: z.array(z.string()),
  /** task type → file kind → preference */
  fileTypePreferences: z.record(z.record(unit)),
  /** language → task type → preference */
  languagePreferences: z.record(z.record(unit)),
  /** directory name → path relevance */
  coreDirectories: z.record(unit),
  /** task type → path substrings that earn `score` */
  taskPatterns: z.record(z.object({ patterns: z.array(z.string()), score: unit })),
});

export type ScoringTables = z.infer<typeof scoringTablesSchema>;

export const DEFAULT_SCORING_TABLES: ScoringTables = scoringTablesSchema.parse(scoringDefaults);

export type ScoringWeights = Record<ScoringFactor, number>;

export const DEFAULT_WEIGHTS: ScoringWeights = {
  keywordMatch: 0.25,
  pathRelevance: 0.15,
  fileType: 0.2,
  recency: 0.1,
  size: 0.05,
  dependency: 0.1,
  taskType: 0.1,
  language: 0.05,
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ScorerConfig {
  weights: ScoringWeights;
  /** Age at which the recency factor halves */
  recencyHalfLifeMs: number;
  /** Token count that earns a full size score */
  optimalTokens: number;
  /** Size score lost per `optimalTokens` beyond the optimum */
  sizePenalty: number;
  /** Size score floor for oversized files */
  minSizeScore: number;
  /** Phase-one score a file needs to anchor dependency scoring */
  anchorThreshold: number;
  maxAnchors: number;
  /** Weighted anchor connectivity that earns a full dependency score */
  dependencySaturation: number;
  tables: ScoringTables;
}

export const DEFAULT_SCORER_CONFIG: ScorerConfig = {
  weights: DEFAULT_WEIGHTS,
  recencyHalfLifeMs: 7 * DAY_MS,
  optimalTokens: 500,
  sizePenalty: 0.5,
  minSizeScore: 0.3,
  anchorThreshold: 0.5,
  maxAnchors: 10,
  dependencySaturation: 1.0,
  tables: DEFAULT_SCORING_TABLES,
};

export type ScorerConfigInput = Partial<Omit<ScorerConfig, 'weights' | 'tables'>> & {
  weights?: Partial<ScoringWeights>;
  tables?: Partial<ScoringTables>;
};

const weightsSchema = z
  .object({
    keywordMatch: unit,
    pathRelevance: unit,
    fileType: unit,
    recency: unit,
    size: unit,
    dependency: unit,
    taskType: unit,
    language: unit,
  })
  .refine(
    (w) => Math.abs(Object.values(w).reduce((sum, v) => sum + v, 0) - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'weights must sum to 1.0' }
  );

const scorerConfigSchema = z.object({
  weights: weightsSchema,
  recencyHalfLifeMs: z.number().positive(),
  optimalTokens: z.number().int().positive(),
  sizePenalty: z.number().min(0),
  minSizeScore: unit,
  anchorThreshold: unit,
  maxAnchors: z.number().int().min(0),
  dependencySaturation: z.number().positive(),
  tables: scoringTablesSchema,
});

/**
 * Merge overrides onto the defaults and validate once.
 *
 * @throws ConfigurationError when any value is out of range or the weights
 * do not sum to 1.0
 */
export function resolveScorerConfig(input: ScorerConfigInput = {}): ScorerConfig {
  const merged = {
    ...DEFAULT_SCORER_CONFIG,
    ...input,
    weights: { ...DEFAULT_WEIGHTS, ...input.weights },
    tables: { ...DEFAULT_SCORING_TABLES, ...input.tables },
  };

  const parsed = scorerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('scorer configuration', parsed.error);
  }
  return parsed.data;
}
