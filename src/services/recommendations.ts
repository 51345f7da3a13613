import { DEFAULT_SCORING_CONFIG } from '../constants/scoring.js';
import type {
  NewIssueCandidate,
  OverallTrend,
  Recommendation,
  SentimentDistribution,
  Topic,
  TopicChange,
  UpdatePriority,
} from '../types.js';
import { round3 } from '../utils/normalize.js';
import { resolveStandardAlignment, type StandardMapper } from './standards.js';
import { emptySentimentDistribution } from './topicAnalysis.js';

export const OVERALL_REVIEW_SUBJECT = 'materiality assessment';

export const ACTIONS = {
  upward: 'upward priority review',
  downward: 'downward priority review',
  newIssue: 'review for inclusion',
  comprehensive: 'comprehensive review',
} as const;

export interface RecommendOptions {
  significantChange?: number;
  maxRecommendations?: number;
  standardMapper?: StandardMapper;
  topics?: readonly Topic[]; // explicit standard codes win over the mapper
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(3)}`;
}

function addDistributions(a: SentimentDistribution, b: SentimentDistribution): SentimentDistribution {
  return {
    positive: a.positive + b.positive,
    negative: a.negative + b.negative,
    neutral: a.neutral + b.neutral,
  };
}

function fromChange(
  change: TopicChange,
  standardAlignment: string,
): Recommendation {
  const upward = change.changeMagnitude > 0;
  const rationale =
    `Change magnitude ${signed(change.changeMagnitude)} against prior rank ${change.previousPriority} ` +
    `(current score ${change.currentScore.toFixed(3)}, ${change.changeType}): ${change.reasons.join('; ')}`;
  return {
    subject: change.topic,
    type: 'priority_review',
    action: upward ? ACTIONS.upward : ACTIONS.downward,
    rationale,
    confidence: change.confidence,
    standardAlignment,
    evidence: {
      articleCount: change.evidence.totalArticles,
      relevantArticleCount: change.evidence.relevantArticles,
      sentimentMix: { ...change.evidence.sentimentDistribution },
    },
  };
}

function fromNewIssue(issue: NewIssueCandidate, standardAlignment: string): Recommendation {
  return {
    subject: issue.keyword,
    type: 'new_issue',
    action: ACTIONS.newIssue,
    rationale: issue.rationale,
    confidence: issue.confidence,
    standardAlignment,
    evidence: {
      articleCount: issue.relatedArticleIds.length,
      relevantArticleCount: issue.relatedArticleIds.length,
      sentimentMix: { ...issue.sentimentDistribution },
    },
  };
}

function comprehensiveReview(changes: readonly TopicChange[], trend: OverallTrend): Recommendation {
  const sentimentMix = changes.reduce(
    (mix, change) => addDistributions(mix, change.evidence.sentimentDistribution),
    emptySentimentDistribution(),
  );
  return {
    subject: OVERALL_REVIEW_SUBJECT,
    type: 'overall_review',
    action: ACTIONS.comprehensive,
    rationale: `Update necessity is high. ${trend.summary}`,
    confidence: trend.meanConfidence,
    standardAlignment: 'n/a',
    evidence: {
      articleCount: changes.reduce((max, change) => Math.max(max, change.evidence.totalArticles), 0),
      relevantArticleCount: changes.reduce((sum, change) => sum + change.evidence.relevantArticles, 0),
      sentimentMix,
    },
  };
}

/**
 * Sort by confidence (stable), keep the first entry per subject, cap the list.
 */
export function rankRecommendations(candidates: readonly Recommendation[], maxRecommendations: number): Recommendation[] {
  const sorted = [...candidates].sort((a, b) => b.confidence - a.confidence);
  const seen = new Set<string>();
  const result: Recommendation[] = [];
  for (const recommendation of sorted) {
    if (result.length >= maxRecommendations) break;
    if (seen.has(recommendation.subject)) continue;
    seen.add(recommendation.subject);
    result.push(recommendation);
  }
  return result;
}

/**
 * Merge topic changes, new issues and the overall trend into one ranked,
 * deduplicated recommendation list.
 */
export function recommend(
  changes: readonly TopicChange[],
  newIssues: readonly NewIssueCandidate[],
  overallTrend: OverallTrend,
  opts: RecommendOptions = {},
): Recommendation[] {
  const significantChange = opts.significantChange ?? DEFAULT_SCORING_CONFIG.change.significantChange;
  const maxRecommendations = opts.maxRecommendations ?? DEFAULT_SCORING_CONFIG.recommendations.maxRecommendations;
  const explicitCodes = new Map((opts.topics ?? []).map((topic): [string, string | undefined] => [topic.name, topic.standardCode]));

  const candidates: Recommendation[] = [];

  for (const change of changes) {
    if (Math.abs(change.changeMagnitude) <= significantChange) continue;
    const alignment = resolveStandardAlignment(change.topic, explicitCodes.get(change.topic), opts.standardMapper);
    candidates.push(fromChange(change, alignment));
  }

  for (const issue of newIssues) {
    const alignment = resolveStandardAlignment(issue.keyword, issue.standardCode, opts.standardMapper);
    candidates.push(fromNewIssue(issue, alignment));
  }

  if (overallTrend.updateNecessity === 'high') {
    candidates.push(comprehensiveReview(changes, overallTrend));
  }

  return rankRecommendations(candidates, maxRecommendations);
}

/**
 * Order in which the assessment should be revisited: emerging and declining
 * topics by |magnitude| × confidence, new issues by issue score × confidence.
 */
export function computeUpdatePriorities(
  changes: readonly TopicChange[],
  newIssues: readonly NewIssueCandidate[],
): UpdatePriority[] {
  const priorities: UpdatePriority[] = [];

  for (const change of changes) {
    if (change.changeType !== 'emerging' && change.changeType !== 'declining') continue;
    priorities.push({
      subject: change.topic,
      kind: 'topic_change',
      changeType: change.changeType,
      priorityScore: round3(Math.abs(change.changeMagnitude) * change.confidence),
      rationale: `existing topic ${change.changeType}`,
    });
  }

  for (const issue of newIssues) {
    priorities.push({
      subject: issue.keyword,
      kind: 'new_issue',
      changeType: 'new',
      priorityScore: round3(issue.issueScore * issue.confidence),
      rationale: `new issue: ${issue.rationale}`,
    });
  }

  return priorities.sort((a, b) => b.priorityScore - a.priorityScore);
}
