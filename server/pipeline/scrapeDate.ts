import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import type {
  ArticleRef,
  DailyArticles,
  ExtractionResult,
  InsertResult,
  PipelineStage,
  RunType,
  ScrapeRunRecord,
} from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import type { ArticleSink } from '../persistence/types';
import { FetchError, type Fetcher } from '../retrieval/fetcher';
import type { PageParser } from '../retrieval/pageParser';
import { sleep as defaultSleep, type Sleep } from '../utils/async';
import { enumerateDays } from '../utils/dates';
import { makeStageEmitter, type StageEventSender } from './stageEmitter';
import { aggregateResults, finishRunMetadata, startRunMetadata, summarizeRun } from './summary';

export type ListingResult = { ok: true; refs: ArticleRef[] } | { ok: false; error: string };

export interface DateOutcome {
  daily: DailyArticles;
  /** Null when the sink is disabled or there was nothing to write. */
  insertResult: InsertResult | null;
}

export interface ScrapeDateOptions {
  runType?: RunType;
}

export interface ArticlePipelineOptions {
  config: Pick<AppConfig, 'site' | 'http'>;
  logger: Logger;
  fetcher: Fetcher;
  parser: PageParser;
  /** File artifacts; null disables them. */
  artifactStore: ArtifactStore | null;
  /** Relational sink; null disables it. */
  sink: ArticleSink | null;
  sleep?: Sleep;
  now?: () => Date;
  onStage?: StageEventSender;
}

export interface ArticlePipeline {
  listArticles: (date: string) => Promise<ListingResult>;
  discoverArticleUrls: (date: string) => Promise<string[]>;
  extractArticle: (url: string, index: number, total: number) => Promise<ExtractionResult>;
  scrapeDate: (date: string, options?: ScrapeDateOptions) => Promise<DateOutcome>;
  scrapeDateRange: (startDate: string, endDate: string, options?: ScrapeDateOptions) => Promise<DateOutcome[]>;
  close: () => Promise<void>;
}

export const createArticlePipeline = ({
  config,
  logger,
  fetcher,
  parser,
  artifactStore,
  sink,
  sleep = defaultSleep,
  now = () => new Date(),
  onStage,
}: ArticlePipelineOptions): ArticlePipeline => {
  const { site, http } = config;
  // Spread the configured per-request delay over the worker slots.
  const courtesyDelayMs = http.requestDelayMs / fetcher.concurrency;

  const listingUrl = (date: string) => `${site.baseUrl}${site.archivePath}?fn=${encodeURIComponent(date)}`;

  const listArticles = async (date: string): Promise<ListingResult> => {
    try {
      const html = await fetcher.fetchText(listingUrl(date));
      return { ok: true, refs: parser.parseListing(html, date) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  };

  const discoverArticleUrls = async (date: string): Promise<string[]> => {
    const listing = await listArticles(date);
    if (!listing.ok) {
      logger.error('Failed to list articles', { date, error: listing.error });
      return [];
    }
    logger.info('Found articles', { date, count: listing.refs.length });
    return listing.refs.map((ref) => ref.url);
  };

  const extractArticle = (url: string, index: number, total: number): Promise<ExtractionResult> =>
    fetcher.runLimited(async (): Promise<ExtractionResult> => {
      logger.info('Scraping article', { index, total, url });
      let html: string;
      try {
        html = await fetcher.fetchText(url);
      } catch (error) {
        const kind = error instanceof FetchError ? error.kind : 'transient';
        logger.error('Article fetch failed', { url, kind, error: errorMessage(error) });
        return { ok: false, url, kind, error: errorMessage(error), finishedAt: now().getTime() };
      }

      try {
        const article = parser.parseDetail(html, url);
        const finishedAt = now().getTime();
        logger.debug('Extracted article', { url, title: article.title });
        await sleep(courtesyDelayMs);
        return { ok: true, article, finishedAt };
      } catch (error) {
        logger.error('Article parse failed', { url, error: errorMessage(error) });
        return { ok: false, url, kind: 'parse', error: errorMessage(error), finishedAt: now().getTime() };
      }
    });

  const persist = async (daily: DailyArticles, runType: RunType): Promise<InsertResult | null> => {
    const { metadata, articles } = daily;
    if (artifactStore) {
      try {
        const saved = await artifactStore.saveDailyArticles(daily);
        logger.info('Saved artifacts', { date: daily.date, ...saved });
      } catch (error) {
        logger.error('Failed to save artifacts', { date: daily.date, error: errorMessage(error) });
        metadata.errors.push(`Failed to save artifacts: ${errorMessage(error)}`);
      }
    }

    if (!sink) {
      return null;
    }

    let insertResult: InsertResult | null = null;
    if (articles.length) {
      try {
        insertResult = await sink.bulkUpsertArticles(articles, site.sourceName);
        metadata.errors.push(...insertResult.errors);
        logger.info('Database write complete', {
          date: daily.date,
          inserted: insertResult.inserted,
          updated: insertResult.updated,
          errors: insertResult.errors.length,
        });
      } catch (error) {
        logger.error('Database write failed', { date: daily.date, error: errorMessage(error) });
        metadata.errors.push(`Database write failed: ${errorMessage(error)}`);
      }
    }

    const run: ScrapeRunRecord = {
      source: site.sourceName,
      runType,
      targetDate: daily.date,
      startedAt: metadata.startTime,
      completedAt: metadata.endTime,
      totalArticles: metadata.totalArticles,
      successfulArticles: metadata.successfulArticles,
      failedArticles: metadata.failedArticles,
      newArticles: insertResult?.inserted ?? 0,
      updatedArticles: insertResult?.updated ?? 0,
      errors: [...metadata.errors],
      proxyUsed: metadata.proxyUsed,
      durationSeconds: metadata.durationSeconds,
      status: metadata.successfulArticles === 0 && metadata.failedArticles > 0 ? 'failed' : 'completed',
    };
    try {
      await sink.recordScrapeRun(run);
    } catch (error) {
      logger.error('Failed to record scrape run', { date: daily.date, error: errorMessage(error) });
      metadata.errors.push(`Failed to record scrape run: ${errorMessage(error)}`);
    }
    return insertResult;
  };

  const scrapeDate = async (date: string, options: ScrapeDateOptions = {}): Promise<DateOutcome> => {
    const runId = randomUUID();
    const stage = makeStageEmitter(runId, date, logger, onStage);
    const metadata = startRunMetadata(date, now(), fetcher.proxyUsed);
    let currentStage: PipelineStage = 'discovering';

    try {
      logger.info('Starting scrape', { date, runId });
      stage.start('discovering', { message: `Listing articles for ${date}` });
      const urls = await discoverArticleUrls(date);
      metadata.totalArticles = urls.length;
      stage.success('discovering', { data: { count: urls.length } });

      if (!urls.length) {
        logger.warn('No articles found', { date });
        finishRunMetadata(metadata, now());
        logger.info('Completed date', { ...summarizeRun(metadata) });
        return { daily: { date, articles: [], metadata }, insertResult: null };
      }

      currentStage = 'fetching';
      stage.start('fetching', { message: `Fetching ${urls.length} articles`, data: { concurrency: fetcher.concurrency } });
      let completed = 0;
      const results = await Promise.all(
        urls.map(async (url, i) => {
          const result = await extractArticle(url, i + 1, urls.length);
          completed += 1;
          stage.progress('fetching', { data: { completed, total: urls.length, ok: result.ok } });
          return result;
        }),
      );
      stage.success('fetching', { data: { completed } });

      currentStage = 'aggregating';
      stage.start('aggregating');
      const { articles, failures } = aggregateResults(results);
      metadata.successfulArticles = articles.length;
      metadata.failedArticles = failures.length;
      metadata.errors.push(...failures.map((failure) => `${failure.url}: ${failure.error}`));
      finishRunMetadata(metadata, now());
      logger.info('Completed date', { ...summarizeRun(metadata) });
      stage.success('aggregating', { data: { successful: articles.length, failed: failures.length } });

      const daily: DailyArticles = { date, articles, metadata };

      currentStage = 'persisting';
      stage.start('persisting');
      const insertResult = await persist(daily, options.runType ?? 'daily');
      stage.success('persisting', { data: { errors: metadata.errors.length } });

      return { daily, insertResult };
    } catch (error) {
      logger.error('Scrape failed', { date, runId, stage: currentStage, error: errorMessage(error) });
      stage.failure(currentStage, error);
      metadata.errors.push(errorMessage(error));
      finishRunMetadata(metadata, now());
      logger.info('Completed date', { ...summarizeRun(metadata) });
      return { daily: { date, articles: [], metadata }, insertResult: null };
    }
  };

  const scrapeDateRange = async (
    startDate: string,
    endDate: string,
    options: ScrapeDateOptions = {},
  ): Promise<DateOutcome[]> => {
    const outcomes: DateOutcome[] = [];
    for (const day of enumerateDays(startDate, endDate)) {
      outcomes.push(await scrapeDate(day, { runType: options.runType ?? 'range' }));
    }
    logger.info('Completed date range', { startDate, endDate, days: outcomes.length });
    return outcomes;
  };

  return {
    listArticles,
    discoverArticleUrls,
    extractArticle,
    scrapeDate,
    scrapeDateRange,
    close: () => fetcher.close(),
  };
};
