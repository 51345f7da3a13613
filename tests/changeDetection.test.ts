import { describe, expect, it } from 'vitest';
import {
  INSUFFICIENT_COVERAGE_REASON,
  changeConfidence,
  classifyChange,
  detectChange,
  normalizePriority,
  rankTopicsByMentions,
  withMentionRanks,
} from '../src/services/changeDetection.js';
import { makeAnalysis, makeChange } from './helpers.js';

describe('classifyChange', () => {
  it('classifies by magnitude first', () => {
    expect(classifyChange(0.31, 0.2)).toBe('emerging');
    expect(classifyChange(-0.31, 0.9)).toBe('declining');
  });

  it('falls back to the comprehensive score inside the band', () => {
    expect(classifyChange(0.3, 0.6)).toBe('ongoing');
    expect(classifyChange(-0.2, 0.8)).toBe('ongoing');
    expect(classifyChange(-0.1, 0.4)).toBe('maturing');
  });
});

describe('normalizePriority', () => {
  it('maps rank 1 to 1 and the last rank to 1/N', () => {
    expect(normalizePriority(1, 5)).toBe(1);
    expect(normalizePriority(5, 5)).toBe(0.2);
  });
});

describe('changeConfidence', () => {
  it('blends coverage, relevance ratio and score', () => {
    expect(changeConfidence({ relevantArticles: 30, totalArticles: 40, comprehensiveScore: 1.2 })).toBe(0.9);
    expect(changeConfidence({ relevantArticles: 2, totalArticles: 20, comprehensiveScore: 0.5 })).toBe(0.25);
  });
});

describe('detectChange', () => {
  it('reports a topic without coverage as declining with low confidence', () => {
    const change = detectChange(
      { name: 'Water Management', priority: 2 },
      makeAnalysis({ topic: 'Water Management', relevantArticles: 0, comprehensiveScore: 0 }),
      5,
    );
    expect(change.changeType).toBe('declining');
    expect(change.changeMagnitude).toBe(-1);
    expect(change.confidence).toBe(0.3);
    expect(change.reasons).toEqual([INSUFFICIENT_COVERAGE_REASON]);
  });

  it('compares the score with the normalized prior rank', () => {
    const change = detectChange(
      { name: 'Climate Action', priority: 3 },
      makeAnalysis({ relevantArticles: 30, totalArticles: 40, comprehensiveScore: 1.2 }),
      5,
    );
    // prior score (5 - 3 + 1) / 5 = 0.6
    expect(change.changeMagnitude).toBe(0.6);
    expect(change.changeType).toBe('emerging');
    expect(change.reasons[0]).toBe('news relevance score up (+0.600)');
    expect(change.evidence.relevantArticles).toBe(30);
  });

  it('clamps the magnitude to [-1, 1]', () => {
    const change = detectChange(
      { name: 'Climate Action', priority: 10 },
      makeAnalysis({ comprehensiveScore: 1.9 }),
      10,
    );
    expect(change.changeMagnitude).toBe(1);
  });
});

describe('mention ranks', () => {
  it('ranks by relevant coverage, keeping input order on ties', () => {
    const ranks = rankTopicsByMentions([
      { topic: 'A', relevantArticles: 5 },
      { topic: 'B', relevantArticles: 9 },
      { topic: 'C', relevantArticles: 5 },
    ]);
    expect(Array.from(ranks)).toEqual([
      ['B', 1],
      ['A', 2],
      ['C', 3],
    ]);
  });

  it('explains shifts of two places or more', () => {
    const [shifted, uncovered] = withMentionRanks(
      [
        makeChange({ topic: 'C', previousPriority: 1, reasons: ['sustained news exposure'] }),
        makeChange({
          topic: 'D',
          previousPriority: 4,
          reasons: [INSUFFICIENT_COVERAGE_REASON],
          evidence: {
            totalArticles: 10,
            relevantArticles: 0,
            dominantSentiment: 'neutral',
            sentimentDistribution: { positive: 0, negative: 0, neutral: 0 },
          },
        }),
      ],
      new Map([
        ['C', 3],
        ['D', 1],
      ]),
    );
    expect(shifted.rankShift).toBe(2);
    expect(shifted.reasons).toEqual(['sustained news exposure', 'coverage rank 3, down 2 places from prior rank 1']);
    expect(uncovered.rankShift).toBe(-3);
    expect(uncovered.reasons).toEqual([INSUFFICIENT_COVERAGE_REASON]);
  });
});
