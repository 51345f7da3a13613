import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../constants/scoring.js';
import {
  CHANGE_TYPES,
  type ChangeType,
  type NewIssueCandidate,
  type OverallDirection,
  type OverallTrend,
  type TopicChange,
  type UpdateNecessity,
} from '../types.js';
import { mean, round3 } from '../utils/normalize.js';

type TrendRules = ScoringConfig['trend'];

export function changeDistribution(changes: readonly Pick<TopicChange, 'changeType'>[]): Record<ChangeType, number> {
  const distribution: Record<ChangeType, number> = { emerging: 0, ongoing: 0, maturing: 0, declining: 0 };
  for (const change of changes) distribution[change.changeType] += 1;
  return distribution;
}

export function assessUpdateNecessity(
  distribution: Record<ChangeType, number>,
  meanMagnitude: number,
  newIssueCount: number,
  rules: TrendRules = DEFAULT_SCORING_CONFIG.trend,
): UpdateNecessity {
  if (
    distribution.emerging >= rules.highEmergingCount ||
    newIssueCount >= rules.highNewIssueCount ||
    meanMagnitude > rules.highMeanMagnitude
  ) {
    return 'high';
  }
  if (
    distribution.emerging >= rules.mediumEmergingCount ||
    distribution.declining >= rules.mediumDecliningCount ||
    meanMagnitude > rules.mediumMeanMagnitude
  ) {
    return 'medium';
  }
  return 'low';
}

function summarize(
  direction: OverallDirection,
  distribution: Record<ChangeType, number>,
  newIssueCount: number,
): string {
  const parts = CHANGE_TYPES.map((type) => `${type} ${distribution[type]}`);
  let summary = `Overall direction: ${direction}. Changes: ${parts.join(', ')}.`;
  if (newIssueCount > 0) summary += ` ${newIssueCount} new issue(s) discovered.`;
  return summary;
}

/**
 * Roll per-topic changes and new issues up into one overall signal.
 * Necessity is judged on the unrounded mean magnitude.
 */
export function aggregateTrend(
  changes: readonly TopicChange[],
  newIssues: readonly NewIssueCandidate[],
  rules: TrendRules = DEFAULT_SCORING_CONFIG.trend,
): OverallTrend {
  const distribution = changeDistribution(changes);
  const rawMeanMagnitude = mean(changes.map((change) => Math.abs(change.changeMagnitude)));
  const meanConfidence = round3(mean(changes.map((change) => change.confidence)));

  let overallDirection: OverallDirection = 'stable';
  if (distribution.emerging > distribution.declining) overallDirection = 'expanding';
  else if (distribution.declining > distribution.emerging) overallDirection = 'contracting';

  return {
    overallDirection,
    changeDistribution: distribution,
    meanChangeMagnitude: round3(rawMeanMagnitude),
    meanConfidence,
    newIssueCount: newIssues.length,
    updateNecessity: assessUpdateNecessity(distribution, rawMeanMagnitude, newIssues.length, rules),
    summary: summarize(overallDirection, distribution, newIssues.length),
  };
}
