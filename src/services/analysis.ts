import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { createScoringConfig, DEFAULT_SCORING_CONFIG, overridesFromTuning, type ScoringConfig } from '../constants/scoring.js';
import { err, InsufficientDataError, ok, type MalformedArticle, type Result } from '../errors.js';
import { moduleLogger } from '../logger.js';
import {
  SENTIMENT_LABELS,
  type Article,
  type DateRange,
  type MaterialityReport,
  type SentimentLabel,
  type Topic,
} from '../types.js';
import { parseTimestamp, yearToDate } from '../utils/date.js';
import { clamp, stripMarkup } from '../utils/normalize.js';
import { detectChange, rankTopicsByMentions, withMentionRanks } from './changeDetection.js';
import { dedupeInBatches } from './dedup.js';
import { discoverNewIssues } from './discovery.js';
import { keywordsForTopic, loadKeywordDictionary, loadStopwords, type KeywordDictionary } from './keywords.js';
import type { NewsSource } from './newsSource.js';
import { computeUpdatePriorities, recommend } from './recommendations.js';
import { LexiconSentimentClassifier, type SentimentClassifier } from './sentiment.js';
import { StaticStandardMapper, type StandardMapper } from './standards.js';
import { describeUpdateGuidance } from './summaries.js';
import { analyzeTopicNews } from './topicAnalysis.js';
import { aggregateTrend } from './trend.js';

const log = moduleLogger('analysis');

// Confidence assumed for upstream labels that come without a score.
const DEFAULT_LABEL_CONFIDENCE = 0.5;

const IncomingArticleSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  publishedAt: z.string().nullish(),
  sentiment: z.string().nullish(),
  sentimentConfidence: z.number().nullish(),
  source: z.string().nullish(),
  url: z.string().nullish(),
  matchedKeywords: z.array(z.string()).nullish(),
});

export interface AnalysisDependencies {
  dictionary: KeywordDictionary;
  stopwords?: ReadonlySet<string>;
  standardMapper?: StandardMapper;
  classifier?: SentimentClassifier;
  config?: ScoringConfig;
}

export interface MaterialityAnalysisInput {
  companyName: string;
  topics: readonly Topic[];
  articles: readonly unknown[];
  now?: Date;
}

export interface AssessmentRequest {
  companyName: string;
  topics: readonly Topic[];
  dateRange?: DateRange;
  now?: Date;
}

export interface AssessmentDependencies extends AnalysisDependencies {
  newsSource: NewsSource;
  fetchLimit: number;
}

export interface IngestOptions {
  now?: Date;
  classifier?: SentimentClassifier;
}

function isSentimentLabel(value: string): value is SentimentLabel {
  return SENTIMENT_LABELS.some((label) => label === value);
}

function malformed(index: number, reason: string, id?: string): Result<never, MalformedArticle> {
  return err({ kind: 'MalformedArticle', index, id, reason });
}

/**
 * Validate one incoming record. Title, body and a parseable publish date are
 * required; a missing or unknown sentiment label is filled in by the
 * classifier.
 */
export function ingestArticle(
  raw: unknown,
  index: number,
  opts: IngestOptions = {},
): Result<Article, MalformedArticle> {
  const parsed = IncomingArticleSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'record';
    return malformed(index, `invalid ${where}: ${issue?.message ?? 'unreadable record'}`);
  }

  const record = parsed.data;
  const id = record.id === undefined ? `article-${index + 1}` : String(record.id);
  const title = stripMarkup(record.title ?? '');
  const description = stripMarkup(record.description ?? '');
  const content = stripMarkup(record.content ?? '') || description;

  if (!title) return malformed(index, 'missing title', id);
  if (!content) return malformed(index, 'missing body', id);
  if (!record.publishedAt) return malformed(index, 'missing publish date', id);

  const published = parseTimestamp(record.publishedAt, opts.now);
  if (!published) return malformed(index, `unparseable publish date '${record.publishedAt}'`, id);

  const label = record.sentiment?.trim().toLowerCase() ?? '';
  let sentiment: SentimentLabel;
  let sentimentConfidence: number;
  if (isSentimentLabel(label)) {
    sentiment = label;
    sentimentConfidence = clamp(record.sentimentConfidence ?? DEFAULT_LABEL_CONFIDENCE, 0, 1);
  } else {
    const classified = (opts.classifier ?? new LexiconSentimentClassifier()).classify(`${title} ${content}`);
    sentiment = classified.label;
    sentimentConfidence = classified.confidence;
  }

  return ok({
    id,
    title,
    description,
    content,
    publishedAt: published.toISOString(),
    sentiment,
    sentimentConfidence,
    source: record.source?.trim() || 'unknown',
    url: record.url ?? undefined,
    matchedKeywords: record.matchedKeywords ?? [],
  });
}

export function ingestArticles(raw: readonly unknown[], opts: IngestOptions = {}): Result<Article, MalformedArticle>[] {
  const classifier = opts.classifier ?? new LexiconSentimentClassifier();
  return raw.map((record, index) => ingestArticle(record, index, { ...opts, classifier }));
}

/**
 * Run the whole pipeline over already retrieved articles and assemble the
 * report. Throws InsufficientDataError when no article survives ingestion.
 */
export function runMaterialityAnalysis(
  input: MaterialityAnalysisInput,
  deps: AnalysisDependencies,
): MaterialityReport {
  const cfg = deps.config ?? DEFAULT_SCORING_CONFIG;
  const now = input.now ?? new Date();

  const results = ingestArticles(input.articles, { now, classifier: deps.classifier });
  const accepted: Article[] = [];
  const skipped: MalformedArticle[] = [];
  for (const result of results) {
    if (result.ok) accepted.push(result.value);
    else skipped.push(result.error);
  }
  for (const item of skipped) {
    log.debug({ index: item.index, id: item.id, reason: item.reason }, 'Skipped malformed article');
  }

  if (!accepted.length) {
    throw new InsufficientDataError({ supplied: input.articles.length, skipped: skipped.length });
  }

  const articles = dedupeInBatches(accepted, cfg.dedup.threshold, cfg.dedup.batchSize, cfg.similarity);
  log.info(
    {
      company: input.companyName,
      supplied: input.articles.length,
      accepted: accepted.length,
      afterDedup: articles.length,
      topics: input.topics.length,
    },
    'Starting materiality analysis',
  );

  const maxPriorityRank = input.topics.reduce((max, topic) => Math.max(max, topic.priority), input.topics.length);

  const topicAnalyses = input.topics.map((topic) => {
    const keywords = keywordsForTopic(topic, deps.dictionary, input.companyName);
    return analyzeTopicNews(topic, articles, keywords, { companyName: input.companyName, now, config: cfg });
  });

  const changes = input.topics.map((topic, index) =>
    detectChange(topic, topicAnalyses[index], maxPriorityRank, cfg.change),
  );
  const topicChanges = withMentionRanks(changes, rankTopicsByMentions(topicAnalyses));

  const newIssues = discoverNewIssues(
    articles,
    input.topics.map((topic) => topic.name),
    {
      now,
      stopwords: deps.stopwords,
      excludedTerms: [input.companyName],
      standardMapper: deps.standardMapper,
      config: cfg,
    },
  );

  const overallTrend = aggregateTrend(topicChanges, newIssues, cfg.trend);
  const recommendations = recommend(topicChanges, newIssues, overallTrend, {
    significantChange: cfg.change.significantChange,
    maxRecommendations: cfg.recommendations.maxRecommendations,
    standardMapper: deps.standardMapper,
    topics: input.topics,
  });

  log.info(
    {
      company: input.companyName,
      direction: overallTrend.overallDirection,
      necessity: overallTrend.updateNecessity,
      newIssues: newIssues.length,
      recommendations: recommendations.length,
    },
    'Materiality analysis complete',
  );

  return {
    companyName: input.companyName,
    analyzedAt: now.toISOString(),
    articleSummary: {
      supplied: input.articles.length,
      accepted: accepted.length,
      skipped: skipped.length,
      afterDedup: articles.length,
    },
    skippedArticles: skipped.map(({ index, id, reason }) => ({ index, id, reason })),
    topicAnalyses,
    topicChanges,
    newIssues,
    overallTrend,
    updatePriorities: computeUpdatePriorities(topicChanges, newIssues),
    recommendations,
    guidance: describeUpdateGuidance(overallTrend, newIssues),
  };
}

/**
 * Fetch the company's coverage from the news source, then analyze it.
 * The search keywords are the company name followed by every topic name.
 */
export async function assessMaterialityUpdates(
  request: AssessmentRequest,
  deps: AssessmentDependencies,
): Promise<MaterialityReport> {
  const now = request.now ?? new Date();
  const dateRange = request.dateRange ?? yearToDate(now);
  const keywords = [request.companyName, ...request.topics.map((topic) => topic.name)];

  const articles = await deps.newsSource.fetch(keywords, dateRange, deps.fetchLimit);
  if (!articles.length) {
    throw new InsufficientDataError({ supplied: 0, skipped: 0 });
  }

  return runMaterialityAnalysis(
    { companyName: request.companyName, topics: request.topics, articles, now },
    deps,
  );
}

/**
 * Load the static tables named in the configuration (or the bundled ones)
 * and build the scoring configuration from the tuning variables.
 */
export function createAnalysisDependencies(cfg: AppConfig): Required<AnalysisDependencies> {
  return {
    dictionary: loadKeywordDictionary(cfg.dataFiles.keywordDictionary),
    stopwords: loadStopwords(cfg.dataFiles.stopwords),
    standardMapper: StaticStandardMapper.fromFile(cfg.dataFiles.standardMap),
    classifier: new LexiconSentimentClassifier(),
    config: createScoringConfig(overridesFromTuning(cfg.pipeline)),
  };
}
