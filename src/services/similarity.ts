import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import type { Article } from '../types.js';
import { normalizeText, round3 } from '../utils/normalize.js';

/**
 * Token-overlap similarity of two texts in [0, 1].
 *
 * Blends Jaccard similarity, the overlap coefficient (intersection over the
 * smaller set, which stays high when one text is a subset of the other) and a
 * length-ratio term. Symmetric in its arguments; rounded to 3 decimals.
 */
export function similarity(
  a: string,
  b: string,
  weights: ScoringConfig['similarity'] = DEFAULT_SCORING_CONFIG.similarity,
): number {
  const normA = normalizeText(a);
  const normB = normalizeText(b);
  if (!normA || !normB) return 0;
  if (normA === normB) return 1;

  const tokensA = new Set(normA.split(' '));
  const tokensB = new Set(normB.split(' '));

  let intersection = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) intersection++;
  }
  const union = tokensA.size + tokensB.size - intersection;
  const smaller = Math.min(tokensA.size, tokensB.size);
  const larger = Math.max(tokensA.size, tokensB.size);

  const jaccard = intersection / union;
  const overlap = intersection / smaller;
  const lengthRatio = smaller / larger;

  const blended =
    weights.jaccardWeight * jaccard +
    weights.overlapWeight * overlap +
    weights.lengthRatioWeight * lengthRatio;
  return round3(Math.min(1, Math.max(0, blended)));
}

/**
 * Comparison text for an article: title (listed twice), description, content.
 */
export function articleSimilarityText(article: Pick<Article, 'title' | 'description' | 'content'>): string {
  return [article.title, article.title, article.description, article.content]
    .filter(Boolean)
    .join(' ');
}
