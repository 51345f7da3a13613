import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import type { Article } from '../types.js';
import { isWithinDays } from '../utils/date.js';
import { countOccurrences, escapeRegExp } from '../utils/normalize.js';

export interface RelevanceOptions {
  now?: Date;
  weights?: ScoringConfig['relevance'];
}

export interface MatchCounts {
  exact: number;
  partial: number;
}

export interface RelevanceBreakdown {
  score: number;
  title: MatchCounts;
  content: MatchCounts;
  companyMentioned: boolean;
  recent: boolean;
  density: number;
}

type ScorableArticle = Pick<Article, 'title' | 'content' | 'sentiment' | 'publishedAt'>;

// \b only knows ASCII word characters; Hangul keywords need Unicode-aware edges.
function boundaryPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}_])`, 'u');
}

function prepareKeywords(keywords: readonly string[]): string[] {
  const prepared = new Set<string>();
  for (const keyword of keywords) {
    const k = keyword.trim().toLowerCase();
    if (k) prepared.add(k);
  }
  return Array.from(prepared);
}

/**
 * Count keywords found as whole words (exact) and keywords found only inside
 * longer words (partial). Each keyword counts at most once per text.
 */
export function countMatches(text: string, keywords: readonly string[]): MatchCounts {
  const lower = text.toLowerCase();
  if (!lower) return { exact: 0, partial: 0 };
  let exact = 0;
  let partial = 0;
  for (const keyword of keywords) {
    if (!lower.includes(keyword)) continue;
    if (boundaryPattern(keyword).test(lower)) exact++;
    else partial++;
  }
  return { exact, partial };
}

/**
 * Keyword occurrences per word of text.
 */
export function keywordDensity(text: string, keywords: readonly string[]): number {
  const lower = text.toLowerCase();
  const words = lower.split(/\s+/).filter(Boolean).length;
  if (!words) return 0;
  const occurrences = keywords.reduce((sum, keyword) => sum + countOccurrences(lower, keyword), 0);
  return occurrences / words;
}

/**
 * Score an article against a topic keyword set, with the contributing parts.
 *
 * Matches in the title and the body are weighted separately, then the
 * company bonus is added, sentiment and recency multiply the sum, and the
 * keyword density term is added last.
 */
export function explainRelevance(
  article: ScorableArticle,
  topicKeywords: readonly string[],
  companyName: string,
  opts: RelevanceOptions = {},
): RelevanceBreakdown {
  const w = opts.weights ?? DEFAULT_SCORING_CONFIG.relevance;
  const now = opts.now ?? new Date();
  const keywords = prepareKeywords(topicKeywords);
  const fullText = `${article.title} ${article.content}`.trim();

  const empty: RelevanceBreakdown = {
    score: 0,
    title: { exact: 0, partial: 0 },
    content: { exact: 0, partial: 0 },
    companyMentioned: false,
    recent: false,
    density: 0,
  };
  if (!keywords.length || !fullText) return empty;

  const title = countMatches(article.title, keywords);
  const content = countMatches(article.content, keywords);

  let score = 0;
  score += title.exact * w.titleWeight * w.exactMatch;
  score += title.partial * w.titleWeight * w.partialMatch;
  score += content.exact * w.contentWeight * w.exactMatch;
  score += content.partial * w.contentWeight * w.partialMatch;

  const company = companyName.trim().toLowerCase();
  const companyMentioned = company.length > 0 && fullText.toLowerCase().includes(company);
  if (companyMentioned) score += w.companyMention;

  score *= w.sentiment[article.sentiment];

  const recent = isWithinDays(article.publishedAt, now, w.recencyWindowDays);
  if (recent) score *= w.recencyMultiplier;

  const density = keywordDensity(fullText, keywords);
  score += density * w.keywordDensity;

  return {
    score: Math.max(0, score),
    title,
    content,
    companyMentioned,
    recent,
    density,
  };
}

export function scoreArticle(
  article: ScorableArticle,
  topicKeywords: readonly string[],
  companyName: string,
  opts: RelevanceOptions = {},
): number {
  return explainRelevance(article, topicKeywords, companyName, opts).score;
}

/**
 * Keywords (as given) that occur anywhere in the title or body.
 */
export function findMatchedKeywords(
  article: Pick<Article, 'title' | 'content'>,
  topicKeywords: readonly string[],
): string[] {
  const fullText = `${article.title} ${article.content}`.toLowerCase();
  const matched = new Set<string>();
  for (const keyword of topicKeywords) {
    const k = keyword.trim().toLowerCase();
    if (k && fullText.includes(k)) matched.add(keyword);
  }
  return Array.from(matched);
}
