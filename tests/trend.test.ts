import { describe, expect, it } from 'vitest';
import { aggregateTrend, assessUpdateNecessity, changeDistribution } from '../src/services/trend.js';
import { makeChange, makeIssue } from './helpers.js';

describe('changeDistribution', () => {
  it('counts every change type, including absent ones', () => {
    expect(changeDistribution([{ changeType: 'emerging' }, { changeType: 'emerging' }, { changeType: 'maturing' }])).toEqual({
      emerging: 2,
      ongoing: 0,
      maturing: 1,
      declining: 0,
    });
  });
});

describe('assessUpdateNecessity', () => {
  it('is high on many emerging topics, several new issues or large shifts', () => {
    expect(assessUpdateNecessity({ emerging: 3, ongoing: 0, maturing: 0, declining: 0 }, 0.1, 0)).toBe('high');
    expect(assessUpdateNecessity({ emerging: 0, ongoing: 2, maturing: 0, declining: 0 }, 0.1, 2)).toBe('high');
    expect(assessUpdateNecessity({ emerging: 0, ongoing: 2, maturing: 0, declining: 0 }, 0.51, 0)).toBe('high');
  });

  it('is medium on moderate movement', () => {
    expect(assessUpdateNecessity({ emerging: 1, ongoing: 2, maturing: 0, declining: 0 }, 0.1, 0)).toBe('medium');
    expect(assessUpdateNecessity({ emerging: 0, ongoing: 0, maturing: 0, declining: 2 }, 0.1, 0)).toBe('medium');
    expect(assessUpdateNecessity({ emerging: 0, ongoing: 2, maturing: 0, declining: 0 }, 0.31, 1)).toBe('medium');
  });

  it('is low otherwise', () => {
    expect(assessUpdateNecessity({ emerging: 0, ongoing: 3, maturing: 0, declining: 1 }, 0.1, 1)).toBe('low');
  });
});

describe('aggregateTrend', () => {
  it('balances emerging against declining topics', () => {
    const trend = aggregateTrend(
      [
        makeChange({ topic: 'A', changeType: 'emerging', changeMagnitude: 0.4, confidence: 0.6 }),
        makeChange({ topic: 'B', changeType: 'declining', changeMagnitude: -0.4, confidence: 0.4 }),
      ],
      [],
    );
    expect(trend).toEqual({
      overallDirection: 'stable',
      changeDistribution: { emerging: 1, ongoing: 0, maturing: 0, declining: 1 },
      meanChangeMagnitude: 0.4,
      meanConfidence: 0.5,
      newIssueCount: 0,
      updateNecessity: 'medium',
      summary: 'Overall direction: stable. Changes: emerging 1, ongoing 0, maturing 0, declining 1.',
    });
  });

  it('reports expansion and counts new issues', () => {
    const trend = aggregateTrend(
      [makeChange({ changeType: 'emerging', changeMagnitude: 0.35, confidence: 0.7 })],
      [makeIssue(), makeIssue({ keyword: 'hydrogen' })],
    );
    expect(trend.overallDirection).toBe('expanding');
    expect(trend.updateNecessity).toBe('high');
    expect(trend.summary).toBe(
      'Overall direction: expanding. Changes: emerging 1, ongoing 0, maturing 0, declining 0. 2 new issue(s) discovered.',
    );
  });

  it('judges necessity on the unrounded mean magnitude', () => {
    const trend = aggregateTrend(
      [
        makeChange({ topic: 'A', changeType: 'ongoing', changeMagnitude: 0.501 }),
        makeChange({ topic: 'B', changeType: 'ongoing', changeMagnitude: 0.5 }),
        makeChange({ topic: 'C', changeType: 'ongoing', changeMagnitude: -0.5 }),
      ],
      [],
    );
    // mean is 0.500333, reported as 0.5
    expect(trend.meanChangeMagnitude).toBe(0.5);
    expect(trend.updateNecessity).toBe('high');
  });

  it('is low and stable with nothing to aggregate', () => {
    const trend = aggregateTrend([], []);
    expect(trend.overallDirection).toBe('stable');
    expect(trend.updateNecessity).toBe('low');
    expect(trend.meanChangeMagnitude).toBe(0);
  });
});
