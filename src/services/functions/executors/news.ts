// News for a city (NewsAPI "everything" search)

import { z } from 'zod';
import { env } from '../../../env.js';
import type { ExecutionContext, NewsArgs } from '../types.js';
import { NEWS_PAGE_SIZE_MAX } from '../catalog.js';
import { fetchJson } from './http.js';

const ArticlesSchema = z.object({
  articles: z.array(
    z.object({
      title: z.string().nullish(),
      source: z.object({ name: z.string().nullish() }).nullish(),
      publishedAt: z.string().nullish(),
      url: z.string().nullish(),
      description: z.string().nullish(),
    }),
  ),
});

export interface NewsArticle {
  title: string;
  source: string | null;
  publishedAt: string | null;
  url: string | null;
  description: string | null;
}

export interface NewsDigest {
  city: string;
  count: number;
  articles: NewsArticle[];
}

export async function getNewsForCity(args: NewsArgs, context: ExecutionContext): Promise<NewsDigest> {
  if (!env.NEWSAPI_KEY) {
    throw new Error('NEWSAPI_KEY is not configured');
  }

  const pageSize = Math.max(1, Math.min(args.page_size, NEWS_PAGE_SIZE_MAX));
  const endpoint = new URL('/v2/everything', env.NEWSAPI_BASE_URL);
  endpoint.searchParams.set('q', args.city);
  endpoint.searchParams.set('pageSize', String(pageSize));
  endpoint.searchParams.set('sortBy', 'publishedAt');
  endpoint.searchParams.set('language', 'en');
  endpoint.searchParams.set('apiKey', env.NEWSAPI_KEY);

  const payload = await fetchJson(endpoint, ArticlesSchema, { provider: 'NewsAPI', signal: context.signal });

  const articles = payload.articles
    .map(article => ({
      title: (article.title ?? '').trim(),
      source: article.source?.name ?? null,
      publishedAt: article.publishedAt ?? null,
      url: article.url ?? null,
      description: article.description ?? null,
    }))
    .filter(article => article.title)
    .slice(0, pageSize);

  return {
    city: args.city,
    count: articles.length,
    articles,
  };
}
