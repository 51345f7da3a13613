import type { PipelineTuning } from '../config.js';
import type { SentimentLabel } from '../types.js';

/**
 * Every weight and threshold the pipeline uses, in one immutable value.
 * Components take it as an argument; tune per deployment through
 * createScoringConfig rather than by editing module state.
 */
export interface ScoringConfig {
  readonly similarity: {
    readonly jaccardWeight: number;
    readonly overlapWeight: number;
    readonly lengthRatioWeight: number;
  };
  readonly dedup: {
    readonly threshold: number;
    readonly batchSize: number;
  };
  readonly relevance: {
    readonly titleWeight: number;
    readonly contentWeight: number;
    readonly exactMatch: number;
    readonly partialMatch: number;
    readonly companyMention: number;
    readonly sentiment: Readonly<Record<SentimentLabel, number>>;
    readonly recencyMultiplier: number;
    readonly recencyWindowDays: number;
    readonly keywordDensity: number;
  };
  readonly analysis: {
    readonly relevanceThreshold: number; // raw relevance score
    readonly relevanceScale: number; // raw score that maps to a normalized relevance of 1
    readonly increaseRatio: number;
    readonly decreaseRatio: number;
    readonly topArticleCount: number;
  };
  readonly change: {
    readonly significantChange: number;
    readonly emergingIssueThreshold: number;
    readonly coverageSaturation: number;
    readonly coverageWeight: number;
    readonly relevanceRatioWeight: number;
    readonly scoreWeight: number;
    readonly noCoverageConfidence: number;
  };
  readonly discovery: {
    readonly minTokenLength: number;
    readonly topKeywords: number;
    readonly minFrequency: number;
    readonly scoreThreshold: number;
    readonly maxCandidates: number;
  };
  readonly trend: {
    readonly highEmergingCount: number;
    readonly highNewIssueCount: number;
    readonly highMeanMagnitude: number;
    readonly mediumEmergingCount: number;
    readonly mediumDecliningCount: number;
    readonly mediumMeanMagnitude: number;
  };
  readonly recommendations: {
    readonly maxRecommendations: number;
  };
}

export type ScoringOverrides = {
  [Section in keyof ScoringConfig]?: Section extends 'relevance'
    ? Partial<Omit<ScoringConfig['relevance'], 'sentiment'>> & {
        readonly sentiment?: Partial<ScoringConfig['relevance']['sentiment']>;
      }
    : Partial<ScoringConfig[Section]>;
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze({
  similarity: {
    jaccardWeight: 0.5,
    overlapWeight: 0.4,
    lengthRatioWeight: 0.1,
  },
  dedup: {
    threshold: 0.75,
    batchSize: 100,
  },
  relevance: {
    titleWeight: 5.0,
    contentWeight: 2.0,
    exactMatch: 3.0,
    partialMatch: 1.0,
    companyMention: 2.0,
    sentiment: { positive: 1.3, negative: 0.9, neutral: 1.0 },
    recencyMultiplier: 1.5,
    recencyWindowDays: 30,
    keywordDensity: 2.5,
  },
  analysis: {
    relevanceThreshold: 0.3,
    relevanceScale: 20,
    increaseRatio: 1.5,
    decreaseRatio: 0.5,
    topArticleCount: 5,
  },
  change: {
    significantChange: 0.3,
    emergingIssueThreshold: 0.5,
    coverageSaturation: 10,
    coverageWeight: 0.3,
    relevanceRatioWeight: 0.4,
    scoreWeight: 0.3,
    noCoverageConfidence: 0.3,
  },
  discovery: {
    minTokenLength: 3,
    topKeywords: 20,
    minFrequency: 3,
    scoreThreshold: 0.4,
    maxCandidates: 5,
  },
  trend: {
    highEmergingCount: 3,
    highNewIssueCount: 2,
    highMeanMagnitude: 0.5,
    mediumEmergingCount: 1,
    mediumDecliningCount: 2,
    mediumMeanMagnitude: 0.3,
  },
  recommendations: {
    maxRecommendations: 10,
  },
});

export function createScoringConfig(overrides: ScoringOverrides = {}): ScoringConfig {
  const base = DEFAULT_SCORING_CONFIG;
  return deepFreeze({
    similarity: { ...base.similarity, ...overrides.similarity },
    dedup: { ...base.dedup, ...overrides.dedup },
    relevance: {
      ...base.relevance,
      ...overrides.relevance,
      sentiment: { ...base.relevance.sentiment, ...overrides.relevance?.sentiment },
    },
    analysis: { ...base.analysis, ...overrides.analysis },
    change: { ...base.change, ...overrides.change },
    discovery: { ...base.discovery, ...overrides.discovery },
    trend: { ...base.trend, ...overrides.trend },
    recommendations: { ...base.recommendations, ...overrides.recommendations },
  });
}

/** Map the environment-level tuning knobs onto scoring overrides. */
export function overridesFromTuning(tuning: PipelineTuning): ScoringOverrides {
  return {
    dedup: { threshold: tuning.dedupThreshold, batchSize: tuning.dedupBatchSize },
    analysis: { relevanceThreshold: tuning.relevanceThreshold },
    discovery: {
      minFrequency: tuning.newIssueMinFrequency,
      scoreThreshold: tuning.newIssueScoreThreshold,
    },
    recommendations: { maxRecommendations: tuning.maxRecommendations },
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
