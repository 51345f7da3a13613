import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import type { ChangeType, Topic, TopicChange, TopicNewsAnalysis } from '../types.js';
import { clamp, round3 } from '../utils/normalize.js';

export const INSUFFICIENT_COVERAGE_REASON = 'insufficient news coverage';

type ChangeThresholds = ScoringConfig['change'];

function formatSigned(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(3)}`;
}

/**
 * Prior rank mapped onto (0, 1]: rank 1 of N scores 1, rank N scores 1/N.
 */
export function normalizePriority(previousPriority: number, maxPriorityRank: number): number {
  if (maxPriorityRank <= 0) return 0;
  return (maxPriorityRank - previousPriority + 1) / maxPriorityRank;
}

/**
 * A magnitude above significantChange is emerging, below its negative is
 * declining. Otherwise a comprehensive score above emergingIssueThreshold is
 * ongoing and anything lower maturing, so a high-scoring topic can read as
 * ongoing even with a slightly negative magnitude.
 */
export function classifyChange(
  changeMagnitude: number,
  comprehensiveScore: number,
  thresholds: Pick<ChangeThresholds, 'significantChange' | 'emergingIssueThreshold'> = DEFAULT_SCORING_CONFIG.change,
): ChangeType {
  if (changeMagnitude > thresholds.significantChange) return 'emerging';
  if (changeMagnitude < -thresholds.significantChange) return 'declining';
  if (comprehensiveScore > thresholds.emergingIssueThreshold) return 'ongoing';
  return 'maturing';
}

export function changeConfidence(
  analysis: Pick<TopicNewsAnalysis, 'relevantArticles' | 'totalArticles' | 'comprehensiveScore'>,
  thresholds: ChangeThresholds = DEFAULT_SCORING_CONFIG.change,
): number {
  const coverage = Math.min(analysis.relevantArticles / thresholds.coverageSaturation, 1);
  const ratio = analysis.totalArticles ? analysis.relevantArticles / analysis.totalArticles : 0;
  const score = Math.min(analysis.comprehensiveScore, 1);
  const blended =
    coverage * thresholds.coverageWeight +
    ratio * thresholds.relevanceRatioWeight +
    score * thresholds.scoreWeight;
  return round3(clamp(blended, 0, 1));
}

function changeReasons(changeType: ChangeType, analysis: TopicNewsAnalysis, magnitude: number): string[] {
  const reasons: string[] = [];
  switch (changeType) {
    case 'emerging':
      reasons.push(`news relevance score up (${formatSigned(magnitude)})`);
      if (analysis.trend.recentIncrease) reasons.push('coverage increasing in the latest month');
      if (analysis.dominantSentiment === 'positive') reasons.push('mostly positive coverage');
      break;
    case 'declining':
      reasons.push(`news relevance score down (${formatSigned(magnitude)})`);
      if (analysis.relevantArticles < 5) reasons.push('few related articles');
      if (analysis.dominantSentiment === 'negative') reasons.push('mostly negative coverage');
      break;
    case 'ongoing':
      reasons.push('sustained news exposure');
      if (analysis.relevantArticles > 10) reasons.push('ample related coverage');
      break;
    case 'maturing':
      reasons.push('stable issue profile');
      if (analysis.trend.direction === 'stable') reasons.push('coverage volume steady');
      break;
  }
  return reasons;
}

/**
 * Compare a topic's prior rank with its current comprehensive score.
 *
 * magnitude = comprehensiveScore - normalizePriority(prior), rounded to
 * 3 decimals and clamped to [-1, 1]. A topic without any relevant article is
 * reported as declining at -1 with a fixed low confidence instead of failing.
 */
export function detectChange(
  topic: Topic,
  analysis: TopicNewsAnalysis,
  maxPriorityRank: number,
  thresholds: ChangeThresholds = DEFAULT_SCORING_CONFIG.change,
): TopicChange {
  const evidence = {
    totalArticles: analysis.totalArticles,
    relevantArticles: analysis.relevantArticles,
    dominantSentiment: analysis.dominantSentiment,
    sentimentDistribution: { ...analysis.sentimentDistribution },
  };

  if (analysis.relevantArticles === 0) {
    return {
      topic: topic.name,
      previousPriority: topic.priority,
      currentScore: 0,
      changeMagnitude: -1,
      changeType: 'declining',
      confidence: thresholds.noCoverageConfidence,
      reasons: [INSUFFICIENT_COVERAGE_REASON],
      trendDirection: analysis.trend.direction,
      evidence,
    };
  }

  const priorScore = normalizePriority(topic.priority, maxPriorityRank);
  const changeMagnitude = clamp(round3(analysis.comprehensiveScore - priorScore), -1, 1);
  const changeType = classifyChange(changeMagnitude, analysis.comprehensiveScore, thresholds);

  return {
    topic: topic.name,
    previousPriority: topic.priority,
    currentScore: analysis.comprehensiveScore,
    changeMagnitude,
    changeType,
    confidence: changeConfidence(analysis, thresholds),
    reasons: changeReasons(changeType, analysis, changeMagnitude),
    trendDirection: analysis.trend.direction,
    evidence,
  };
}

/**
 * Rank topics by relevant article count, most covered first. Equal counts
 * keep the order of the input.
 */
export function rankTopicsByMentions(
  analyses: readonly Pick<TopicNewsAnalysis, 'topic' | 'relevantArticles'>[],
): Map<string, number> {
  const ordered = analyses
    .map((analysis, index) => ({ topic: analysis.topic, count: analysis.relevantArticles, index }))
    .sort((a, b) => b.count - a.count || a.index - b.index);
  return new Map(ordered.map((entry, position): [string, number] => [entry.topic, position + 1]));
}

/**
 * Attach mention ranks. A shift of two or more places adds a reason, except
 * for topics without coverage, whose reason list stays fixed.
 */
export function withMentionRanks(changes: readonly TopicChange[], ranks: ReadonlyMap<string, number>): TopicChange[] {
  return changes.map((change) => {
    const mentionRank = ranks.get(change.topic);
    if (mentionRank === undefined) return change;

    const rankShift = mentionRank - change.previousPriority;
    const reasons = [...change.reasons];
    if (change.evidence.relevantArticles === 0) {
      return { ...change, mentionRank, rankShift };
    }
    if (rankShift <= -2) {
      reasons.push(`coverage rank ${mentionRank}, up ${-rankShift} places from prior rank ${change.previousPriority}`);
    } else if (rankShift >= 2) {
      reasons.push(`coverage rank ${mentionRank}, down ${rankShift} places from prior rank ${change.previousPriority}`);
    }
    return { ...change, reasons, mentionRank, rankShift };
  });
}
