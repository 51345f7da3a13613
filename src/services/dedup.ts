import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import { moduleLogger } from '../logger.js';
import type { Article, DedupedArticle } from '../types.js';
import { articleSimilarityText, similarity } from './similarity.js';

const log = moduleLogger('dedup');

interface Cluster {
  representative: Article;
  text: string;
  keywords: Set<string>;
  mentionCount: number;
}

function mentionsOf(article: Article | DedupedArticle): number {
  return 'mentionCount' in article ? article.mentionCount : 1;
}

/**
 * Fold near-duplicate articles into one representative per cluster.
 *
 * Articles are visited in input order and compared with every representative
 * accepted so far; the first one at or above the threshold absorbs the
 * article (keyword union, mention count). O(n²) in the number of clusters.
 */
export function dedupe(
  articles: readonly (Article | DedupedArticle)[],
  threshold: number = DEFAULT_SCORING_CONFIG.dedup.threshold,
  weights: ScoringConfig['similarity'] = DEFAULT_SCORING_CONFIG.similarity,
): DedupedArticle[] {
  const clusters: Cluster[] = [];

  for (const article of articles) {
    const text = articleSimilarityText(article);
    const match = clusters.find((cluster) => similarity(cluster.text, text, weights) >= threshold);

    if (match) {
      for (const keyword of article.matchedKeywords) match.keywords.add(keyword);
      match.mentionCount += mentionsOf(article);
      continue;
    }

    clusters.push({
      representative: article,
      text,
      keywords: new Set(article.matchedKeywords),
      mentionCount: mentionsOf(article),
    });
  }

  return clusters.map(({ representative, keywords, mentionCount }) => ({
    ...representative,
    matchedKeywords: Array.from(keywords),
    mentionCount,
  }));
}

/**
 * Dedupe in bounded batches, then run a second pass over the batch
 * representatives so clusters spanning two batches still collapse.
 */
export function dedupeInBatches(
  articles: readonly Article[],
  threshold: number = DEFAULT_SCORING_CONFIG.dedup.threshold,
  batchSize: number = DEFAULT_SCORING_CONFIG.dedup.batchSize,
  weights: ScoringConfig['similarity'] = DEFAULT_SCORING_CONFIG.similarity,
): DedupedArticle[] {
  if (articles.length <= batchSize) {
    return dedupe(articles, threshold, weights);
  }

  const representatives: DedupedArticle[] = [];
  for (let start = 0; start < articles.length; start += batchSize) {
    representatives.push(...dedupe(articles.slice(start, start + batchSize), threshold, weights));
  }
  const merged = dedupe(representatives, threshold, weights);

  log.debug(
    { input: articles.length, batches: Math.ceil(articles.length / batchSize), output: merged.length },
    'Batched deduplication complete',
  );
  return merged;
}
