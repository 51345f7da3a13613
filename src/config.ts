/**
 * Centralized configuration loader for Materiality Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport)
 * - HOST, ALLOWED_HOSTS, ALLOWED_ORIGINS (http transport only)
 * - LOG_LEVEL (default: info)
 * - NEWS_GATEWAY_URL (required only when articles are fetched rather than supplied)
 * - NEWS_GATEWAY_TIMEOUT_MS (default: 30000)
 * - NEWS_FETCH_LIMIT (default: 500)
 * - DEDUP_THRESHOLD, DEDUP_BATCH_SIZE, RELEVANCE_THRESHOLD
 * - NEW_ISSUE_MIN_FREQUENCY, NEW_ISSUE_SCORE_THRESHOLD, MAX_RECOMMENDATIONS
 * - KEYWORD_DICTIONARY_PATH, STOPWORDS_PATH, STANDARD_MAP_PATH (optional data overrides)
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

export interface PipelineTuning {
  dedupThreshold: number;
  dedupBatchSize: number;
  relevanceThreshold: number;
  newIssueMinFrequency: number;
  newIssueScoreThreshold: number;
  maxRecommendations: number;
}

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  newsGateway: {
    baseUrl?: string;
    timeoutMs: number;
    fetchLimit: number;
  };
  pipeline: PipelineTuning;
  dataFiles: {
    keywordDictionary?: string;
    stopwords?: string;
    standardMap?: string;
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function getConfig(): AppConfig {
  const transport: Transport = process.env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const port = parseNumber(process.env.PORT) ?? 3000;
  const httpHost = process.env.HOST?.trim() || '0.0.0.0';
  const logLevel = process.env.LOG_LEVEL?.trim() || 'info';

  const newsGateway = {
    baseUrl: optionalString(process.env.NEWS_GATEWAY_URL),
    timeoutMs: parseNumber(process.env.NEWS_GATEWAY_TIMEOUT_MS) ?? 30000,
    fetchLimit: parseNumber(process.env.NEWS_FETCH_LIMIT) ?? 500,
  };

  const pipeline: PipelineTuning = {
    dedupThreshold: parseNumber(process.env.DEDUP_THRESHOLD) ?? 0.75,
    dedupBatchSize: parseNumber(process.env.DEDUP_BATCH_SIZE) ?? 100,
    relevanceThreshold: parseNumber(process.env.RELEVANCE_THRESHOLD) ?? 0.3,
    newIssueMinFrequency: parseNumber(process.env.NEW_ISSUE_MIN_FREQUENCY) ?? 3,
    newIssueScoreThreshold: parseNumber(process.env.NEW_ISSUE_SCORE_THRESHOLD) ?? 0.4,
    maxRecommendations: parseNumber(process.env.MAX_RECOMMENDATIONS) ?? 10,
  };

  return {
    transport,
    port,
    httpHost,
    allowedHosts: parseList(process.env.ALLOWED_HOSTS),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS),
    logLevel,
    newsGateway,
    pipeline,
    dataFiles: {
      keywordDictionary: optionalString(process.env.KEYWORD_DICTIONARY_PATH),
      stopwords: optionalString(process.env.STOPWORDS_PATH),
      standardMap: optionalString(process.env.STANDARD_MAP_PATH),
    },
  };
}

function assertUnitInterval(name: string, value: number) {
  if (value < 0 || value > 1) {
    throw new Error(`${name} must lie in [0, 1], got ${value}`);
  }
}

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Guard against tuning values that would make the pipeline meaningless.
 * The dedup threshold is a similarity, so it stays inside [0, 1].
 */
export function assertRequiredConfig(cfg: AppConfig) {
  assertUnitInterval('DEDUP_THRESHOLD', cfg.pipeline.dedupThreshold);
  assertPositiveInteger('DEDUP_BATCH_SIZE', cfg.pipeline.dedupBatchSize);
  assertPositiveInteger('NEW_ISSUE_MIN_FREQUENCY', cfg.pipeline.newIssueMinFrequency);
  assertPositiveInteger('MAX_RECOMMENDATIONS', cfg.pipeline.maxRecommendations);
  assertPositiveInteger('NEWS_FETCH_LIMIT', cfg.newsGateway.fetchLimit);
  if (cfg.pipeline.relevanceThreshold < 0) {
    throw new Error('RELEVANCE_THRESHOLD must be non-negative');
  }
  if (cfg.pipeline.newIssueScoreThreshold < 0) {
    throw new Error('NEW_ISSUE_SCORE_THRESHOLD must be non-negative');
  }
}

/**
 * Articles are normally supplied inline; the gateway URL is only needed when
 * the server has to fetch them itself.
 */
export function assertNewsSourceConfig(cfg: AppConfig): string {
  if (!cfg.newsGateway.baseUrl) {
    throw new Error('NEWS_GATEWAY_URL environment variable is required to fetch articles');
  }
  return cfg.newsGateway.baseUrl;
}
