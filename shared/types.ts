export type PipelineStage = 'discovering' | 'fetching' | 'aggregating' | 'persisting';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  date: string;
  stage: PipelineStage;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export interface ArticleRef {
  url: string;
  /** 1-based position of the link in the listing markup. */
  position: number;
}

export interface ArticleImage {
  url: string;
  caption: string;
}

export interface Article {
  readonly articleId: string | null;
  readonly url: string;
  readonly title: string | null;
  readonly subtitle: string | null;
  readonly section: string | null;
  /** Byline: agency or author text from the header. */
  readonly source: string | null;
  readonly location: string | null;
  /** Publication day, `YYYY-MM-DD`. */
  readonly date: string | null;
  readonly body: string | null;
  readonly bodyHtml: string | null;
  readonly images: readonly ArticleImage[];
  readonly keywords: readonly string[];
  readonly scrapedAt: string;
}

export interface RunMetadata {
  date: string;
  startTime: string;
  endTime: string | null;
  totalArticles: number;
  successfulArticles: number;
  failedArticles: number;
  errors: string[];
  proxyUsed: boolean;
  durationSeconds: number | null;
}

export interface DailyArticles {
  date: string;
  articles: Article[];
  metadata: RunMetadata;
}

export interface InsertResult {
  total: number;
  inserted: number;
  updated: number;
  errors: string[];
}

export type BackfillStatus = 'in_progress' | 'paused' | 'completed';

export interface BackfillProgress {
  source: string;
  lastCompletedDate: string;
  status: BackfillStatus;
}

export type RunType = 'daily' | 'range' | 'backfill';

export interface ScrapeRunRecord {
  source: string;
  runType: RunType;
  targetDate: string;
  startedAt: string;
  completedAt: string | null;
  totalArticles: number;
  successfulArticles: number;
  failedArticles: number;
  newArticles: number;
  updatedArticles: number;
  errors: string[];
  proxyUsed: boolean;
  durationSeconds: number | null;
  status: 'completed' | 'failed';
}

export type FailureKind = 'transient' | 'permanent' | 'parse';

export type ExtractionResult =
  | { ok: true; article: Article; finishedAt: number }
  | { ok: false; url: string; kind: FailureKind; error: string; finishedAt: number };

export const emptyInsertResult = (total = 0): InsertResult => ({ total, inserted: 0, updated: 0, errors: [] });
