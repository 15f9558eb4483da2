import type { AppConfig } from '../../shared/config';
import type { BackfillStatus } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import type { ArticleSink } from '../persistence/types';
import { elapsedSeconds, sleep as defaultSleep, type Sleep } from '../utils/async';
import { addDays, compareDays, daysBetween, localDay, midpointDay } from '../utils/dates';
import { formatDuration } from '../utils/text';
import type { ArticlePipeline } from './scrapeDate';

/** Probe date for discovery sits this many days before today. */
const DISCOVERY_LOOKBACK_DAYS = 365;
const PROBE_ATTEMPTS = 2;

export interface BackfillRunOptions {
  /** Oldest day to reach. Falls back to configuration, then discovery. */
  startDate?: string;
  /** Newest day; yesterday when omitted. */
  endDate?: string;
  resume?: boolean;
  signal?: AbortSignal;
}

export interface BackfillSummary {
  startDate: string;
  endDate: string;
  totalDays: number;
  completedDays: number;
  totalArticles: number;
  newArticles: number;
  updatedArticles: number;
  errors: number;
  durationSeconds: number;
  status: Exclude<BackfillStatus, 'in_progress'>;
  lastCompletedDate: string | null;
}

export interface BackfillControllerOptions {
  config: Pick<AppConfig, 'site' | 'backfill'>;
  logger: Logger;
  pipeline: Pick<ArticlePipeline, 'scrapeDate' | 'listArticles'>;
  sink: ArticleSink | null;
  sleep?: Sleep;
  now?: () => Date;
}

export interface BackfillController {
  run: (options?: BackfillRunOptions) => Promise<BackfillSummary>;
  /** Earliest day whose listing is non-empty, by binary search between the floor and a year ago. */
  discoverEarliestDate: () => Promise<string>;
}

export const createBackfillController = ({
  config,
  logger,
  pipeline,
  sink,
  sleep = defaultSleep,
  now = () => new Date(),
}: BackfillControllerOptions): BackfillController => {
  const { sourceName } = config.site;
  const { floorDate, batchSize, probeDelayMs } = config.backfill;

  /** Article count on `day`, or null when the listing could not be fetched twice. */
  const probe = async (day: string): Promise<number | null> => {
    for (let attempt = 1; attempt <= PROBE_ATTEMPTS; attempt += 1) {
      const listing = await pipeline.listArticles(day);
      if (listing.ok) {
        return listing.refs.length;
      }
      logger.warn('Discovery probe failed', { date: day, attempt, error: listing.error });
      if (attempt < PROBE_ATTEMPTS) {
        await sleep(probeDelayMs);
      }
    }
    return null;
  };

  const discoverEarliestDate = async (): Promise<string> => {
    const upper = addDays(localDay(now()), -DISCOVERY_LOOKBACK_DAYS);
    logger.info('Discovering earliest available date', { floor: floorDate, probe: upper });

    const upperCount = await probe(upper);
    if (upperCount === null) {
      logger.warn('Discovery aborted; using floor date', { floor: floorDate });
      return floorDate;
    }
    if (upperCount === 0) {
      logger.warn('No articles on probe date; using floor date', { date: upper, floor: floorDate });
      return floorDate;
    }

    let low = floorDate;
    let high = upper;
    let earliest = upper;
    while (compareDays(low, high) <= 0) {
      await sleep(probeDelayMs);
      const mid = midpointDay(low, high);
      const count = await probe(mid);
      if (count === null) {
        logger.warn('Discovery aborted; using floor date', { floor: floorDate });
        return floorDate;
      }
      if (count > 0) {
        earliest = mid;
        high = addDays(mid, -1);
        logger.debug('Articles found, searching earlier', { date: mid, count });
      } else {
        low = addDays(mid, 1);
        logger.debug('No articles, searching later', { date: mid });
      }
    }

    logger.info('Earliest date with articles', { date: earliest });
    return earliest;
  };

  const run = async ({ startDate, endDate, resume = false, signal }: BackfillRunOptions = {}): Promise<BackfillSummary> => {
    const startedAtMs = now().getTime();
    const end = endDate ?? addDays(localDay(now()), -1);
    let cursor = end;
    let checkpointDate: string | null = null;

    if (resume) {
      if (!sink) {
        logger.warn('Resume requested without a database; starting from the end date', { endDate: end });
      } else {
        const progress = await sink.getBackfillProgress(sourceName);
        if (progress && progress.status !== 'completed') {
          checkpointDate = progress.lastCompletedDate;
          cursor = addDays(progress.lastCompletedDate, -1);
          logger.info('Resuming backfill', { lastCompletedDate: progress.lastCompletedDate, from: cursor });
        } else if (progress) {
          logger.info('Previous backfill completed; starting from the end date', {
            lastCompletedDate: progress.lastCompletedDate,
          });
        } else {
          logger.info('No backfill checkpoint found; starting from the end date');
        }
      }
    }

    const start = startDate ?? config.backfill.startDate ?? (await discoverEarliestDate());
    const totalDays = Math.max(0, daysBetween(start, cursor) + 1);
    logger.info('Backfill plan', { startDate: start, from: cursor, endDate: end, totalDays });

    const stats = { completedDays: 0, totalArticles: 0, newArticles: 0, updatedArticles: 0, errors: 0 };
    let lastCompletedDate: string | null = null;
    let paused = false;

    while (compareDays(cursor, start) >= 0) {
      if (signal?.aborted) {
        logger.warn('Shutdown requested; stopping before next date', { next: cursor });
        paused = true;
        break;
      }

      const { daily, insertResult } = await pipeline.scrapeDate(cursor, { runType: 'backfill' });
      stats.completedDays += 1;
      stats.totalArticles += daily.metadata.successfulArticles;
      stats.errors += daily.metadata.failedArticles;
      stats.newArticles += insertResult?.inserted ?? 0;
      stats.updatedArticles += insertResult?.updated ?? 0;
      lastCompletedDate = cursor;

      if (sink) {
        try {
          await sink.updateBackfillProgress({ source: sourceName, lastCompletedDate: cursor, status: 'in_progress' });
        } catch (error) {
          stats.errors += 1;
          logger.error('Failed to save backfill progress', { date: cursor, error: errorMessage(error) });
        }
      }

      if (stats.completedDays % batchSize === 0) {
        const elapsed = elapsedSeconds(startedAtMs, now().getTime());
        const remainingDays = daysBetween(start, cursor);
        logger.info('Backfill progress', {
          completedDays: stats.completedDays,
          totalDays,
          articles: stats.totalArticles,
          newArticles: stats.newArticles,
          updatedArticles: stats.updatedArticles,
          eta: formatDuration((elapsed / stats.completedDays) * remainingDays),
        });
      }

      cursor = addDays(cursor, -1);
    }

    const status = paused ? 'paused' : 'completed';
    const finalDate = lastCompletedDate ?? checkpointDate;
    if (sink && finalDate) {
      try {
        await sink.updateBackfillProgress({ source: sourceName, lastCompletedDate: finalDate, status });
      } catch (error) {
        logger.error('Failed to save final backfill status', { status, error: errorMessage(error) });
      }
    }

    const durationSeconds = elapsedSeconds(startedAtMs, now().getTime());
    const summary: BackfillSummary = {
      startDate: start,
      endDate: end,
      totalDays,
      ...stats,
      durationSeconds,
      status,
      lastCompletedDate,
    };
    logger.info('Backfill summary', {
      days: `${stats.completedDays}/${totalDays}`,
      articles: stats.totalArticles,
      newArticles: stats.newArticles,
      updatedArticles: stats.updatedArticles,
      errors: stats.errors,
      duration: formatDuration(durationSeconds),
    });
    logger.info(paused ? 'Backfill paused; run with --resume to continue' : 'Backfill completed');
    return summary;
  };

  return { run, discoverEarliestDate };
};
