import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import type {
  Article,
  NewsTrend,
  ScoredArticleSummary,
  SentimentDistribution,
  SentimentLabel,
  Topic,
  TopicNewsAnalysis,
} from '../types.js';
import { SENTIMENT_LABELS } from '../types.js';
import { monthKey } from '../utils/date.js';
import { clamp, mean, round3 } from '../utils/normalize.js';
import { findMatchedKeywords, scoreArticle } from './relevance.js';

export interface TopicAnalysisOptions {
  companyName: string;
  now?: Date;
  config?: Pick<ScoringConfig, 'relevance' | 'analysis'>;
}

interface RelevantArticle {
  article: Article;
  relevance: number;
  matchedKeywords: string[];
}

export function emptySentimentDistribution(): SentimentDistribution {
  return { positive: 0, negative: 0, neutral: 0 };
}

/**
 * Majority label; neutral when nothing was counted or the top count is shared.
 */
export function dominantSentiment(distribution: SentimentDistribution): SentimentLabel {
  const ranked = SENTIMENT_LABELS.map((label) => [label, distribution[label]] as const).sort(
    (a, b) => b[1] - a[1],
  );
  const [top, runnerUp] = ranked;
  if (!top || top[1] === 0) return 'neutral';
  if (runnerUp && runnerUp[1] === top[1]) return 'neutral';
  return top[0];
}

/**
 * Monthly trend over the relevant articles. The two most recent months with
 * coverage are compared: more than increaseRatio× the prior month is
 * increasing, less than decreaseRatio× is decreasing.
 */
export function analyzeTrend(
  publishedAt: readonly string[],
  ratios: Pick<ScoringConfig['analysis'], 'increaseRatio' | 'decreaseRatio'> = DEFAULT_SCORING_CONFIG.analysis,
): NewsTrend {
  const distribution: Record<string, number> = {};
  for (const iso of publishedAt) {
    const key = monthKey(iso);
    distribution[key] = (distribution[key] ?? 0) + 1;
  }

  const months = Object.keys(distribution).sort();
  let direction: NewsTrend['direction'] = 'stable';
  if (months.length >= 2) {
    const latest = distribution[months[months.length - 1]];
    const prior = distribution[months[months.length - 2]];
    if (latest > prior * ratios.increaseRatio) direction = 'increasing';
    else if (latest < prior * ratios.decreaseRatio) direction = 'decreasing';
  }

  let peakPeriod: string | null = null;
  for (const month of months) {
    if (peakPeriod === null || distribution[month] > distribution[peakPeriod]) peakPeriod = month;
  }

  const monthlyDistribution: Record<string, number> = {};
  for (const month of months) monthlyDistribution[month] = distribution[month];

  return {
    direction,
    recentIncrease: direction === 'increasing',
    peakPeriod,
    monthlyDistribution,
  };
}

/**
 * Score every article against one topic and aggregate the relevant ones.
 *
 * Articles whose raw relevance is strictly above relevanceThreshold count as
 * relevant. Their relevance is then mapped onto [0, 1] by dividing by
 * relevanceScale before it is averaged and reported. The
 * comprehensive score is
 *   0.4 * mean relevance + 0.3 * ln(1 + relevant count) + 0.3 * keyword coverage
 * rounded to 3 decimals, and 0 without relevant articles.
 */
export function analyzeTopicNews(
  topic: Pick<Topic, 'name'>,
  articles: readonly Article[],
  topicKeywords: readonly string[],
  opts: TopicAnalysisOptions,
): TopicNewsAnalysis {
  const cfg = opts.config ?? DEFAULT_SCORING_CONFIG;
  const now = opts.now ?? new Date();
  const sentimentDistribution = emptySentimentDistribution();
  const relevant: RelevantArticle[] = [];

  for (const article of articles) {
    const raw = scoreArticle(article, topicKeywords, opts.companyName, { now, weights: cfg.relevance });
    if (raw <= cfg.analysis.relevanceThreshold) continue;
    const relevance = clamp(raw / cfg.analysis.relevanceScale, 0, 1);

    relevant.push({ article, relevance, matchedKeywords: findMatchedKeywords(article, topicKeywords) });
    sentimentDistribution[article.sentiment] += 1;
  }

  relevant.sort((a, b) => b.relevance - a.relevance);

  const matched = new Set<string>();
  for (const item of relevant) for (const keyword of item.matchedKeywords) matched.add(keyword);

  let comprehensiveScore = 0;
  if (relevant.length) {
    const avgRelevance = mean(relevant.map((item) => item.relevance));
    const volume = Math.log(1 + relevant.length);
    const coverage = topicKeywords.length ? matched.size / topicKeywords.length : 0;
    comprehensiveScore = round3(avgRelevance * 0.4 + volume * 0.3 + coverage * 0.3);
  }

  const topArticles: ScoredArticleSummary[] = relevant
    .slice(0, cfg.analysis.topArticleCount)
    .map((item) => ({
      id: item.article.id,
      title: item.article.title,
      relevance: round3(item.relevance),
      matchedKeywords: item.matchedKeywords.slice(0, 5),
    }));

  return {
    topic: topic.name,
    keywords: topicKeywords,
    matchedKeywords: Array.from(matched),
    totalArticles: articles.length,
    relevantArticles: relevant.length,
    comprehensiveScore,
    trend: analyzeTrend(
      relevant.map((item) => item.article.publishedAt),
      cfg.analysis,
    ),
    dominantSentiment: dominantSentiment(sentimentDistribution),
    sentimentDistribution,
    topArticles,
  };
}
