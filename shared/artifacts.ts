import type { Article, DailyArticles, RunMetadata } from './types';

export interface ArticleRecord {
  article_id: string | null;
  url: string;
  title: string | null;
  subtitle: string | null;
  section: string | null;
  source: string | null;
  location: string | null;
  date: string | null;
  body: string | null;
  body_html: string | null;
  images: Array<{ url: string; caption: string }>;
  keywords: string[];
  scraped_at: string;
}

export interface RunMetadataRecord {
  date: string;
  start_time: string;
  end_time: string | null;
  total_articles: number;
  successful_articles: number;
  failed_articles: number;
  errors: string[];
  proxy_used: boolean;
  duration_seconds: number | null;
}

export interface DailyArticlesRecord {
  date: string;
  total_articles: number;
  articles: ArticleRecord[];
  metadata: RunMetadataRecord;
}

export interface SavedArtifacts {
  articlesPath: string;
  metadataPath: string;
}

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveDailyArticles: (daily: DailyArticles) => Promise<SavedArtifacts>;
}

export const toArticleRecord = (article: Article): ArticleRecord => ({
  article_id: article.articleId,
  url: article.url,
  title: article.title,
  subtitle: article.subtitle,
  section: article.section,
  source: article.source,
  location: article.location,
  date: article.date,
  body: article.body,
  body_html: article.bodyHtml,
  images: article.images.map((image) => ({ url: image.url, caption: image.caption })),
  keywords: [...article.keywords],
  scraped_at: article.scrapedAt,
});

export const toRunMetadataRecord = (metadata: RunMetadata): RunMetadataRecord => ({
  date: metadata.date,
  start_time: metadata.startTime,
  end_time: metadata.endTime,
  total_articles: metadata.totalArticles,
  successful_articles: metadata.successfulArticles,
  failed_articles: metadata.failedArticles,
  errors: [...metadata.errors],
  proxy_used: metadata.proxyUsed,
  duration_seconds: metadata.durationSeconds,
});

export const toDailyArticlesRecord = (daily: DailyArticles): DailyArticlesRecord => ({
  date: daily.date,
  total_articles: daily.articles.length,
  articles: daily.articles.map(toArticleRecord),
  metadata: toRunMetadataRecord(daily.metadata),
});
