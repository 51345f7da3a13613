import { describe, expect, it } from 'vitest';
import { analyzeTopicNews, analyzeTrend, dominantSentiment } from '../src/services/topicAnalysis.js';
import { makeArticle } from './helpers.js';

const now = new Date('2026-10-01T00:00:00Z');

describe('dominantSentiment', () => {
  it('picks the majority label', () => {
    expect(dominantSentiment({ positive: 2, negative: 1, neutral: 0 })).toBe('positive');
  });

  it('falls back to neutral on a tie or no articles', () => {
    expect(dominantSentiment({ positive: 1, negative: 1, neutral: 0 })).toBe('neutral');
    expect(dominantSentiment({ positive: 0, negative: 0, neutral: 0 })).toBe('neutral');
  });
});

describe('analyzeTrend', () => {
  it('reports increasing when the latest month exceeds 1.5x the prior one', () => {
    const trend = analyzeTrend([
      '2026-08-05T00:00:00Z',
      '2026-09-01T00:00:00Z',
      '2026-09-10T00:00:00Z',
      '2026-09-20T00:00:00Z',
    ]);
    expect(trend.direction).toBe('increasing');
    expect(trend.recentIncrease).toBe(true);
    expect(trend.peakPeriod).toBe('2026-09');
    expect(trend.monthlyDistribution).toEqual({ '2026-08': 1, '2026-09': 3 });
  });

  it('reports decreasing when the latest month drops below half', () => {
    const trend = analyzeTrend([
      '2026-08-01T00:00:00Z',
      '2026-08-02T00:00:00Z',
      '2026-08-03T00:00:00Z',
      '2026-08-04T00:00:00Z',
      '2026-09-01T00:00:00Z',
    ]);
    expect(trend.direction).toBe('decreasing');
    expect(trend.peakPeriod).toBe('2026-08');
  });

  it('is stable with a single month or none', () => {
    expect(analyzeTrend(['2026-09-01T00:00:00Z']).direction).toBe('stable');
    expect(analyzeTrend([])).toEqual({
      direction: 'stable',
      recentIncrease: false,
      peakPeriod: null,
      monthlyDistribution: {},
    });
  });
});

describe('analyzeTopicNews', () => {
  const relevant = makeArticle({
    id: 'r1',
    title: 'Solar expansion announced',
    content: 'The company plans solar and wind projects.',
    publishedAt: '2025-01-01T00:00:00Z',
  });
  const irrelevant = makeArticle({
    id: 'x1',
    title: 'Quarterly results published',
    content: 'Revenue grew slightly.',
    publishedAt: '2025-01-02T00:00:00Z',
  });

  it('aggregates the relevant articles into a comprehensive score', () => {
    const analysis = analyzeTopicNews({ name: 'Clean Energy' }, [relevant, irrelevant], ['solar', 'wind', 'hydro'], {
      companyName: 'Acme',
      now,
    });

    expect(analysis.totalArticles).toBe(2);
    expect(analysis.relevantArticles).toBe(1);
    expect(analysis.matchedKeywords).toEqual(['solar', 'wind']);
    // 0.4 * 1 + 0.3 * ln(2) + 0.3 * 2/3
    expect(analysis.comprehensiveScore).toBe(0.808);
    expect(analysis.dominantSentiment).toBe('neutral');
    expect(analysis.sentimentDistribution).toEqual({ positive: 0, negative: 0, neutral: 1 });
    expect(analysis.topArticles).toEqual([
      { id: 'r1', title: 'Solar expansion announced', relevance: 1, matchedKeywords: ['solar', 'wind'] },
    ]);
  });

  it('counts an article whose only match is inside a longer title word', () => {
    const partial = makeArticle({ id: 'p1', title: 'Windfarm output rises', content: 'Output climbed this quarter.' });
    const analysis = analyzeTopicNews({ name: 'Wind Power' }, [partial], ['wind'], { companyName: 'Acme', now });

    // raw 5 * 1 + 2.5 / 7 = 5.357, normalized to 0.268
    expect(analysis.relevantArticles).toBe(1);
    expect(analysis.topArticles[0].relevance).toBe(0.268);
    // 0.4 * 0.268 + 0.3 * ln(2) + 0.3 * 1
    expect(analysis.comprehensiveScore).toBe(0.615);
  });

  it('scores zero when nothing is relevant', () => {
    const analysis = analyzeTopicNews({ name: 'Clean Energy' }, [irrelevant], ['solar'], { companyName: 'Acme', now });
    expect(analysis.relevantArticles).toBe(0);
    expect(analysis.comprehensiveScore).toBe(0);
    expect(analysis.trend.peakPeriod).toBeNull();
    expect(analysis.topArticles).toEqual([]);
  });
});
