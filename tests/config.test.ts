import { afterEach, describe, expect, it, vi } from 'vitest';
import { assertNewsSourceConfig, assertRequiredConfig, getConfig } from '../src/config.js';
import { createScoringConfig, DEFAULT_SCORING_CONFIG, overridesFromTuning } from '../src/constants/scoring.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('getConfig', () => {
  it('reads pipeline tuning from the environment', () => {
    vi.stubEnv('DEDUP_THRESHOLD', '0.8');
    vi.stubEnv('MAX_RECOMMENDATIONS', '5');
    const cfg = getConfig();
    expect(cfg.pipeline.dedupThreshold).toBe(0.8);
    expect(cfg.pipeline.maxRecommendations).toBe(5);
  });

  it('falls back to defaults for malformed numbers', () => {
    vi.stubEnv('DEDUP_BATCH_SIZE', 'lots');
    vi.stubEnv('NEWS_FETCH_LIMIT', '');
    const cfg = getConfig();
    expect(cfg.pipeline.dedupBatchSize).toBe(100);
    expect(cfg.newsGateway.fetchLimit).toBe(500);
  });

  it('parses allow-lists', () => {
    vi.stubEnv('ALLOWED_HOSTS', 'localhost, example.test ,');
    expect(getConfig().allowedHosts).toEqual(['localhost', 'example.test']);
  });
});

describe('config assertions', () => {
  it('rejects a dedup threshold outside [0, 1]', () => {
    vi.stubEnv('DEDUP_THRESHOLD', '1.5');
    expect(() => assertRequiredConfig(getConfig())).toThrow('DEDUP_THRESHOLD must lie in [0, 1], got 1.5');
  });

  it('takes relevance thresholds on the raw score scale', () => {
    vi.stubEnv('RELEVANCE_THRESHOLD', '1.5');
    expect(() => assertRequiredConfig(getConfig())).not.toThrow();
    vi.stubEnv('RELEVANCE_THRESHOLD', '-1');
    expect(() => assertRequiredConfig(getConfig())).toThrow('RELEVANCE_THRESHOLD must be non-negative');
  });

  it('requires a gateway URL only when fetching', () => {
    vi.stubEnv('NEWS_GATEWAY_URL', '');
    const cfg = getConfig();
    expect(() => assertRequiredConfig(cfg)).not.toThrow();
    expect(() => assertNewsSourceConfig(cfg)).toThrow('NEWS_GATEWAY_URL');

    vi.stubEnv('NEWS_GATEWAY_URL', 'http://gateway.test/');
    expect(assertNewsSourceConfig(getConfig())).toBe('http://gateway.test/');
  });
});

describe('createScoringConfig', () => {
  it('merges overrides section by section', () => {
    const cfg = createScoringConfig({ dedup: { threshold: 0.9 }, relevance: { sentiment: { positive: 1.5 } } });
    expect(cfg.dedup).toEqual({ threshold: 0.9, batchSize: 100 });
    expect(cfg.relevance.sentiment).toEqual({ positive: 1.5, negative: 0.9, neutral: 1.0 });
    expect(cfg.relevance.titleWeight).toBe(DEFAULT_SCORING_CONFIG.relevance.titleWeight);
  });

  it('returns a frozen configuration', () => {
    const cfg = createScoringConfig();
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.relevance.sentiment)).toBe(true);
  });

  it('maps environment tuning onto scoring sections', () => {
    const cfg = createScoringConfig(
      overridesFromTuning({
        dedupThreshold: 0.7,
        dedupBatchSize: 50,
        relevanceThreshold: 0.4,
        newIssueMinFrequency: 4,
        newIssueScoreThreshold: 0.5,
        maxRecommendations: 6,
      }),
    );
    expect(cfg.dedup).toEqual({ threshold: 0.7, batchSize: 50 });
    expect(cfg.analysis.relevanceThreshold).toBe(0.4);
    expect(cfg.discovery.minFrequency).toBe(4);
    expect(cfg.discovery.scoreThreshold).toBe(0.5);
    expect(cfg.recommendations.maxRecommendations).toBe(6);
  });
});
