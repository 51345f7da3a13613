import type { Article, NewIssueCandidate, OverallTrend, TopicChange, TopicNewsAnalysis } from '../src/types.js';

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: 'a1',
    title: 'Untitled',
    description: '',
    content: 'No content.',
    publishedAt: '2025-01-01T00:00:00.000Z',
    sentiment: 'neutral',
    sentimentConfidence: 0.5,
    source: 'test-wire',
    matchedKeywords: [],
    ...overrides,
  };
}

export function makeAnalysis(overrides: Partial<TopicNewsAnalysis> = {}): TopicNewsAnalysis {
  return {
    topic: 'Climate Action',
    keywords: ['climate'],
    matchedKeywords: ['climate'],
    totalArticles: 10,
    relevantArticles: 5,
    comprehensiveScore: 0.5,
    trend: { direction: 'stable', recentIncrease: false, peakPeriod: '2026-09', monthlyDistribution: { '2026-09': 5 } },
    dominantSentiment: 'neutral',
    sentimentDistribution: { positive: 1, negative: 1, neutral: 3 },
    topArticles: [],
    ...overrides,
  };
}

export function makeChange(overrides: Partial<TopicChange> = {}): TopicChange {
  return {
    topic: 'Climate Action',
    previousPriority: 1,
    currentScore: 0.8,
    changeMagnitude: 0,
    changeType: 'ongoing',
    confidence: 0.5,
    reasons: [],
    trendDirection: 'stable',
    evidence: {
      totalArticles: 10,
      relevantArticles: 4,
      dominantSentiment: 'neutral',
      sentimentDistribution: { positive: 1, negative: 1, neutral: 2 },
    },
    ...overrides,
  };
}

export function makeIssue(overrides: Partial<NewIssueCandidate> = {}): NewIssueCandidate {
  return {
    keyword: 'microplastics',
    frequency: 5,
    issueScore: 0.574,
    confidence: 0.287,
    relatedArticleIds: ['a1', 'a2', 'a3', 'a4'],
    recentArticleCount: 4,
    sentimentDistribution: { positive: 1, negative: 1, neutral: 2 },
    rationale: "'microplastics' appeared 5 times across 4 articles (4 recent); issue score 0.574",
    ...overrides,
  };
}

export function makeTrend(overrides: Partial<OverallTrend> = {}): OverallTrend {
  return {
    overallDirection: 'stable',
    changeDistribution: { emerging: 0, ongoing: 0, maturing: 0, declining: 0 },
    meanChangeMagnitude: 0,
    meanConfidence: 0,
    newIssueCount: 0,
    updateNecessity: 'low',
    summary: 'Overall direction: stable. Changes: emerging 0, ongoing 0, maturing 0, declining 0.',
    ...overrides,
  };
}
