import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import { moduleLogger } from '../logger.js';
import type { Article, NewIssueCandidate } from '../types.js';
import { isWithinDays } from '../utils/date.js';
import { normalizeText, round3, tokenize } from '../utils/normalize.js';
import type { StandardMapper } from './standards.js';
import { emptySentimentDistribution } from './topicAnalysis.js';

const log = moduleLogger('discovery');

export interface DiscoveryOptions {
  now?: Date;
  stopwords?: ReadonlySet<string>;
  excludedTerms?: readonly string[]; // e.g. the company's own name
  standardMapper?: StandardMapper;
  config?: Pick<ScoringConfig, 'discovery' | 'relevance'>;
}

interface KeywordCount {
  keyword: string;
  frequency: number;
}

/**
 * Token frequencies over title and body, most frequent first. Equal counts
 * keep first-seen order.
 */
export function countKeywordFrequencies(
  articles: readonly Pick<Article, 'title' | 'content'>[],
  minTokenLength: number,
  excluded: ReadonlySet<string>,
): KeywordCount[] {
  const counts = new Map<string, number>();
  for (const article of articles) {
    for (const token of tokenize(`${article.title} ${article.content}`)) {
      if (token.length < minTokenLength || excluded.has(token) || /^\d+$/.test(token)) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return Array.from(counts, ([keyword, frequency]) => ({ keyword, frequency })).sort(
    (a, b) => b.frequency - a.frequency,
  );
}

/**
 * True when the keyword is contained in, or contains, an existing topic name.
 */
export function overlapsExistingTopic(keyword: string, existingTopicNames: readonly string[]): boolean {
  const k = keyword.toLowerCase();
  return existingTopicNames.some((name) => {
    const topic = name.trim().toLowerCase();
    return topic.length > 0 && (topic.includes(k) || k.includes(topic));
  });
}

/**
 * issueScore = 0.3 * ln(freq + 1) / 10
 *            + 0.3 * min(related / 10, 1)
 *            + 0.2 * recent fraction
 *            + 0.2 * distinct sentiment labels / 3
 */
export function issueScore(frequency: number, related: number, recent: number, distinctSentiments: number): number {
  const frequencyScore = Math.log(frequency + 1) / 10;
  const articleScore = Math.min(related / 10, 1);
  const recencyScore = related ? recent / related : 0;
  const diversityScore = distinctSentiments / 3;
  return round3(frequencyScore * 0.3 + articleScore * 0.3 + recencyScore * 0.2 + diversityScore * 0.2);
}

/**
 * Mine frequent keywords that no existing topic covers and score them as
 * candidate new issues. At most maxCandidates are returned, best first.
 */
export function discoverNewIssues(
  articles: readonly Article[],
  existingTopicNames: readonly string[],
  opts: DiscoveryOptions = {},
): NewIssueCandidate[] {
  const cfg = opts.config ?? DEFAULT_SCORING_CONFIG;
  const now = opts.now ?? new Date();
  const excluded = new Set(opts.stopwords);
  for (const term of opts.excludedTerms ?? []) {
    for (const token of tokenize(term)) excluded.add(token);
  }

  const top = countKeywordFrequencies(articles, cfg.discovery.minTokenLength, excluded).slice(
    0,
    cfg.discovery.topKeywords,
  );
  const fresh = top.filter(({ keyword }) => !overlapsExistingTopic(keyword, existingTopicNames));
  const normalizedTexts = articles.map((article) => normalizeText(`${article.title} ${article.content}`));

  const candidates: NewIssueCandidate[] = [];
  for (const { keyword, frequency } of fresh) {
    if (frequency < cfg.discovery.minFrequency) continue;

    const related = articles.filter((_, index) => normalizedTexts[index].includes(keyword));
    const recent = related.filter((article) =>
      isWithinDays(article.publishedAt, now, cfg.relevance.recencyWindowDays),
    ).length;
    const sentimentDistribution = emptySentimentDistribution();
    for (const article of related) sentimentDistribution[article.sentiment] += 1;
    const distinctSentiments = Object.values(sentimentDistribution).filter((count) => count > 0).length;

    const score = issueScore(frequency, related.length, recent, distinctSentiments);
    if (score <= cfg.discovery.scoreThreshold) continue;

    candidates.push({
      keyword,
      frequency,
      issueScore: score,
      confidence: round3(Math.min(score / 2, 1)),
      relatedArticleIds: related.map((article) => article.id),
      recentArticleCount: recent,
      sentimentDistribution,
      standardCode: opts.standardMapper?.mapTopicToCode(keyword),
      rationale:
        `'${keyword}' appeared ${frequency} times across ${related.length} articles ` +
        `(${recent} recent); issue score ${score.toFixed(3)}`,
    });
  }

  const result = candidates
    .sort((a, b) => b.issueScore - a.issueScore)
    .slice(0, cfg.discovery.maxCandidates);

  log.debug(
    { scanned: top.length, overlapping: top.length - fresh.length, accepted: result.length },
    'New issue discovery complete',
  );
  return result;
}
