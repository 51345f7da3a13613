import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { assertNewsSourceConfig, getConfig } from '../config.js';
import { NewsSourceError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { DateRange, RawArticle } from '../types.js';

const log = moduleLogger('news-source');

export interface NewsSource {
  fetch(keywords: readonly string[], dateRange: DateRange, limit: number): Promise<RawArticle[]>;
}

const SEARCH_PATH = 'news/search';

/**
 * Article shape emitted by the news gateway. Records are passed through
 * loosely; ingestion decides what is usable.
 */
const GatewayArticleSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    content: z.string().nullish(),
    published_at: z.string().nullish(),
    sentiment: z.string().nullish(),
    sentiment_score: z.number().nullish(),
    source: z.string().nullish(),
    url: z.string().nullish(),
    matched_keywords: z.array(z.string()).nullish(),
  })
  .passthrough();

const GatewayResponseSchema = z.object({
  articles: z.array(GatewayArticleSchema).default([]),
  total: z.number().optional(),
});

type GatewayArticle = z.infer<typeof GatewayArticleSchema>;

export function mapGatewayArticle(article: GatewayArticle): RawArticle {
  return {
    id: article.id === undefined ? undefined : String(article.id),
    title: article.title,
    description: article.description,
    content: article.content,
    publishedAt: article.published_at,
    sentiment: article.sentiment,
    sentimentConfidence: article.sentiment_score,
    source: article.source,
    url: article.url,
    matchedKeywords: article.matched_keywords,
  };
}

export interface GatewayNewsSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Client for the internal news gateway, which runs the keyword search and
 * sentiment labelling upstream of this service.
 */
export class GatewayNewsSource implements NewsSource {
  private readonly http: AxiosInstance;

  constructor(opts: GatewayNewsSourceOptions = {}) {
    const cfg = getConfig();
    const baseURL = opts.baseUrl ?? assertNewsSourceConfig(cfg);
    this.http = axios.create({
      baseURL,
      timeout: opts.timeoutMs ?? cfg.newsGateway.timeoutMs,
    });
  }

  async fetch(keywords: readonly string[], dateRange: DateRange, limit: number): Promise<RawArticle[]> {
    const body = {
      keywords,
      start_date: dateRange.start,
      end_date: dateRange.end,
      limit,
    };
    log.info({ path: SEARCH_PATH, keywords: keywords.length, ...dateRange, limit }, 'Fetching articles from gateway');

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>(SEARCH_PATH, body));
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        log.error({ status, message: error.message }, 'News gateway request failed');
        throw new NewsSourceError(`News gateway request failed: ${error.message}`, { status });
      }
      throw error;
    }

    const parsed = GatewayResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new NewsSourceError('News gateway returned an unexpected payload', parsed.error.flatten());
    }

    const articles = parsed.data.articles.slice(0, limit).map(mapGatewayArticle);
    log.info({ received: parsed.data.articles.length, kept: articles.length }, 'Gateway fetch complete');
    return articles;
  }
}
