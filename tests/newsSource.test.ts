import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => ({ post })),
    isAxiosError: (error: unknown) => error instanceof Error && 'isAxiosError' in error,
  },
}));

import { NewsSourceError } from '../src/errors.js';
import { GatewayNewsSource } from '../src/services/newsSource.js';

const range = { start: '2026-01-01', end: '2026-10-01' };

beforeEach(() => {
  post.mockReset();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('GatewayNewsSource', () => {
  it('posts the search and maps gateway records', async () => {
    post.mockResolvedValue({
      data: {
        articles: [
          {
            id: 7,
            title: 'Net zero plan',
            content: 'Plan body.',
            published_at: '2026-09-01T00:00:00Z',
            sentiment: 'positive',
            sentiment_score: 0.9,
            source: 'wire',
            matched_keywords: ['climate'],
          },
          { id: 'b', title: 'Second' },
          { id: 'c', title: 'Third' },
        ],
      },
    });

    const source = new GatewayNewsSource({ baseUrl: 'http://gateway.test/' });
    const articles = await source.fetch(['Acme', 'climate'], range, 2);

    expect(post).toHaveBeenCalledWith('news/search', {
      keywords: ['Acme', 'climate'],
      start_date: '2026-01-01',
      end_date: '2026-10-01',
      limit: 2,
    });
    expect(articles).toHaveLength(2);
    expect(articles[0]).toEqual({
      id: '7',
      title: 'Net zero plan',
      description: undefined,
      content: 'Plan body.',
      publishedAt: '2026-09-01T00:00:00Z',
      sentiment: 'positive',
      sentimentConfidence: 0.9,
      source: 'wire',
      url: undefined,
      matchedKeywords: ['climate'],
    });
  });

  it('wraps transport failures', async () => {
    post.mockRejectedValue(Object.assign(new Error('timeout of 30000ms exceeded'), { isAxiosError: true }));
    const source = new GatewayNewsSource({ baseUrl: 'http://gateway.test/' });
    await expect(source.fetch(['Acme'], range, 10)).rejects.toBeInstanceOf(NewsSourceError);
  });

  it('rejects payloads it cannot read', async () => {
    post.mockResolvedValue({ data: { articles: 'none' } });
    const source = new GatewayNewsSource({ baseUrl: 'http://gateway.test/' });
    await expect(source.fetch(['Acme'], range, 10)).rejects.toThrow('News gateway returned an unexpected payload');
  });

  it('treats a missing article list as empty', async () => {
    post.mockResolvedValue({ data: {} });
    const source = new GatewayNewsSource({ baseUrl: 'http://gateway.test/' });
    await expect(source.fetch(['Acme'], range, 10)).resolves.toEqual([]);
  });

  it('needs a gateway URL', () => {
    vi.stubEnv('NEWS_GATEWAY_URL', '');
    expect(() => new GatewayNewsSource()).toThrow('NEWS_GATEWAY_URL');
  });
});
