import type { Article, BackfillProgress, InsertResult, ScrapeRunRecord } from '../../shared/types';

export type UpsertOutcome = 'inserted' | 'updated';

/**
 * Relational side of persistence. Articles are keyed by `(source, articleId)`
 * and a second write for the same key replaces the first.
 */
export interface ArticleSink {
  upsertArticle: (article: Article, source: string) => Promise<UpsertOutcome>;
  /** Sequential upserts; a failing item is reported in `errors` and the rest still run. */
  bulkUpsertArticles: (articles: readonly Article[], source: string) => Promise<InsertResult>;
  recordScrapeRun: (run: ScrapeRunRecord) => Promise<string>;
  getBackfillProgress: (source: string) => Promise<BackfillProgress | null>;
  updateBackfillProgress: (progress: BackfillProgress) => Promise<void>;
  healthCheck: () => Promise<boolean>;
  countArticles: (source?: string) => Promise<number>;
  applySchema: () => Promise<void>;
  close: () => Promise<void>;
}
