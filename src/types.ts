/**
 * Shared types for Materiality Pulse.
 * Every entity is created fresh for one analysis run and never mutated afterwards.
 */

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ['positive', 'negative', 'neutral'];

export interface Topic {
  name: string; // unique key within an assessment
  priority: number; // 1 = most important
  standardCode?: string; // external reporting standard code, e.g. a SASB disclosure topic
}

/**
 * Article record as it arrives from a NewsSource, before validation.
 * Sentiment may be missing when the upstream classifier was skipped.
 */
export interface RawArticle {
  id?: string;
  title?: string | null;
  description?: string | null;
  content?: string | null;
  publishedAt?: string | null;
  sentiment?: string | null;
  sentimentConfidence?: number | null;
  source?: string | null;
  url?: string | null;
  matchedKeywords?: string[] | null;
}

export interface Article {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly content: string;
  readonly publishedAt: string; // ISO-8601 datetime (UTC)
  readonly sentiment: SentimentLabel;
  readonly sentimentConfidence: number; // 0..1
  readonly source: string;
  readonly url?: string;
  readonly matchedKeywords: readonly string[]; // search keywords that retrieved the article
}

export interface DedupedArticle extends Article {
  readonly mentionCount: number; // articles folded into this representative, itself included
}

export type SentimentDistribution = Record<SentimentLabel, number>;

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface NewsTrend {
  direction: TrendDirection;
  recentIncrease: boolean;
  peakPeriod: string | null; // YYYY-MM
  monthlyDistribution: Record<string, number>;
}

export interface ScoredArticleSummary {
  id: string;
  title: string;
  relevance: number; // normalized 0..1
  matchedKeywords: string[];
}

export interface TopicNewsAnalysis {
  topic: string;
  keywords: readonly string[];
  matchedKeywords: string[];
  totalArticles: number;
  relevantArticles: number;
  comprehensiveScore: number; // >= 0, practically below ~2
  trend: NewsTrend;
  dominantSentiment: SentimentLabel;
  sentimentDistribution: SentimentDistribution;
  topArticles: ScoredArticleSummary[];
}

export type ChangeType = 'emerging' | 'ongoing' | 'maturing' | 'declining';

export const CHANGE_TYPES: readonly ChangeType[] = ['emerging', 'ongoing', 'maturing', 'declining'];

export interface ChangeEvidence {
  totalArticles: number;
  relevantArticles: number;
  dominantSentiment: SentimentLabel;
  sentimentDistribution: SentimentDistribution;
}

export interface TopicChange {
  topic: string;
  previousPriority: number;
  currentScore: number;
  changeMagnitude: number; // -1..1
  changeType: ChangeType;
  confidence: number; // 0..1
  reasons: string[];
  trendDirection: TrendDirection;
  evidence: ChangeEvidence;
  mentionRank?: number; // rank by relevant coverage among all prior topics
  rankShift?: number; // mentionRank - previousPriority; negative means moving up
}

export interface NewIssueCandidate {
  keyword: string;
  frequency: number;
  issueScore: number;
  confidence: number; // 0..1
  relatedArticleIds: string[];
  recentArticleCount: number;
  sentimentDistribution: SentimentDistribution;
  standardCode?: string;
  rationale: string;
}

export type OverallDirection = 'expanding' | 'contracting' | 'stable';

export type UpdateNecessity = 'low' | 'medium' | 'high';

export interface OverallTrend {
  overallDirection: OverallDirection;
  changeDistribution: Record<ChangeType, number>;
  meanChangeMagnitude: number;
  meanConfidence: number;
  newIssueCount: number;
  updateNecessity: UpdateNecessity;
  summary: string;
}

export type RecommendationType = 'priority_review' | 'overall_review' | 'new_issue';

export interface RecommendationEvidence {
  articleCount: number;
  relevantArticleCount: number;
  sentimentMix: SentimentDistribution;
}

export interface Recommendation {
  subject: string; // topic name or candidate keyword
  type: RecommendationType;
  action: string;
  rationale: string;
  confidence: number; // 0..1
  standardAlignment: string; // mapped standard code or 'unmapped'
  evidence: RecommendationEvidence;
}

export interface UpdatePriority {
  subject: string;
  kind: 'topic_change' | 'new_issue';
  changeType: ChangeType | 'new';
  priorityScore: number;
  rationale: string;
}

export interface SkippedArticle {
  index: number;
  id?: string;
  reason: string;
}

export interface MaterialityReport {
  companyName: string;
  analyzedAt: string; // ISO-8601
  articleSummary: {
    supplied: number;
    accepted: number;
    skipped: number;
    afterDedup: number;
  };
  skippedArticles: SkippedArticle[];
  topicAnalyses: TopicNewsAnalysis[];
  topicChanges: TopicChange[];
  newIssues: NewIssueCandidate[];
  overallTrend: OverallTrend;
  updatePriorities: UpdatePriority[];
  recommendations: Recommendation[];
  guidance: string[];
}

export interface DateRange {
  start: string; // YYYY-MM-DD
  end: string; // YYYY-MM-DD
}
