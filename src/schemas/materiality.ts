import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const SentimentLabelSchema = z.enum(['positive', 'negative', 'neutral']);
const ChangeTypeSchema = z.enum(['emerging', 'ongoing', 'maturing', 'declining']);

const SentimentDistributionSchema = z.object({
  positive: z.number(),
  negative: z.number(),
  neutral: z.number(),
});

export const TopicSchema = z.object({
  name: z.string().trim().min(1),
  priority: z.number().int().positive(),
  standardCode: z.string().optional(),
});

export const AssessMaterialitySchema = z
  .object({
    companyName: z.string().trim().min(1),
    topics: z.array(TopicSchema).min(1),
    articles: z.array(z.unknown()).optional(),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
  })
  .refine((input) => new Set(input.topics.map((topic) => topic.name)).size === input.topics.length, {
    message: 'Topic names must be unique',
    path: ['topics'],
  });

export type AssessMaterialityInput = z.infer<typeof AssessMaterialitySchema>;

const NewsTrendSchema = z.object({
  direction: z.enum(['increasing', 'decreasing', 'stable']),
  recentIncrease: z.boolean(),
  peakPeriod: z.string().nullable(),
  monthlyDistribution: z.record(z.number()),
});

const TopicNewsAnalysisSchema = z.object({
  topic: z.string(),
  keywords: z.array(z.string()),
  matchedKeywords: z.array(z.string()),
  totalArticles: z.number(),
  relevantArticles: z.number(),
  comprehensiveScore: z.number().nonnegative(),
  trend: NewsTrendSchema,
  dominantSentiment: SentimentLabelSchema,
  sentimentDistribution: SentimentDistributionSchema,
  topArticles: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      relevance: z.number(),
      matchedKeywords: z.array(z.string()),
    }),
  ),
});

const TopicChangeSchema = z.object({
  topic: z.string(),
  previousPriority: z.number(),
  currentScore: z.number(),
  changeMagnitude: z.number().min(-1).max(1),
  changeType: ChangeTypeSchema,
  confidence: z.number().min(0).max(1),
  reasons: z.array(z.string()),
  trendDirection: z.enum(['increasing', 'decreasing', 'stable']),
  evidence: z.object({
    totalArticles: z.number(),
    relevantArticles: z.number(),
    dominantSentiment: SentimentLabelSchema,
    sentimentDistribution: SentimentDistributionSchema,
  }),
  mentionRank: z.number().optional(),
  rankShift: z.number().optional(),
});

const NewIssueCandidateSchema = z.object({
  keyword: z.string(),
  frequency: z.number(),
  issueScore: z.number(),
  confidence: z.number().min(0).max(1),
  relatedArticleIds: z.array(z.string()),
  recentArticleCount: z.number(),
  sentimentDistribution: SentimentDistributionSchema,
  standardCode: z.string().optional(),
  rationale: z.string(),
});

export const MaterialityReportSchema = z.object({
  companyName: z.string(),
  analyzedAt: z.string(),
  articleSummary: z.object({
    supplied: z.number(),
    accepted: z.number(),
    skipped: z.number(),
    afterDedup: z.number(),
  }),
  skippedArticles: z.array(
    z.object({
      index: z.number(),
      id: z.string().optional(),
      reason: z.string(),
    }),
  ),
  topicAnalyses: z.array(TopicNewsAnalysisSchema),
  topicChanges: z.array(TopicChangeSchema),
  newIssues: z.array(NewIssueCandidateSchema),
  overallTrend: z.object({
    overallDirection: z.enum(['expanding', 'contracting', 'stable']),
    changeDistribution: z.record(ChangeTypeSchema, z.number()),
    meanChangeMagnitude: z.number(),
    meanConfidence: z.number(),
    newIssueCount: z.number(),
    updateNecessity: z.enum(['low', 'medium', 'high']),
    summary: z.string(),
  }),
  updatePriorities: z.array(
    z.object({
      subject: z.string(),
      kind: z.enum(['topic_change', 'new_issue']),
      changeType: z.union([ChangeTypeSchema, z.literal('new')]),
      priorityScore: z.number(),
      rationale: z.string(),
    }),
  ),
  recommendations: z.array(
    z.object({
      subject: z.string(),
      type: z.enum(['priority_review', 'overall_review', 'new_issue']),
      action: z.string(),
      rationale: z.string(),
      confidence: z.number().min(0).max(1),
      standardAlignment: z.string(),
      evidence: z.object({
        articleCount: z.number(),
        relevantArticleCount: z.number(),
        sentimentMix: SentimentDistributionSchema,
      }),
    }),
  ),
  guidance: z.array(z.string()),
});

// Tool schemas must be inline object schemas, so no $ref indirection.
function toToolSchema(schema: z.ZodTypeAny) {
  return { ...zodToJsonSchema(schema, { $refStrategy: 'none' }), type: 'object' as const };
}

export const assessMaterialityInputJsonSchema = toToolSchema(AssessMaterialitySchema);

export const materialityReportJsonSchema = toToolSchema(MaterialityReportSchema);
