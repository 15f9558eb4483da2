import fs from 'node:fs/promises';
import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { Article, BackfillProgress, InsertResult, ScrapeRunRecord } from '../../shared/types';
import { emptyInsertResult } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import { isIsoDay } from '../utils/dates';
import type { ArticleSink, UpsertOutcome } from './types';

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

export interface SqlClient {
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) => Promise<SqlResult<R>>;
  release: () => void;
}

export interface SqlPool {
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) => Promise<SqlResult<R>>;
  connect: () => Promise<SqlClient>;
  end: () => Promise<void>;
}

const SCHEMA_FILE = new URL('../../sql/schema.sql', import.meta.url);

const UPSERT_ARTICLE = `
  WITH previous AS (
    SELECT url FROM articles WHERE source = $1 AND article_id = $2
  )
  INSERT INTO articles (
    source, article_id, url, title, subtitle, section,
    author, location, publication_date, body, body_html,
    keywords, scraped_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
  ON CONFLICT (source, article_id) DO UPDATE SET
    url = EXCLUDED.url,
    title = EXCLUDED.title,
    subtitle = EXCLUDED.subtitle,
    section = EXCLUDED.section,
    author = EXCLUDED.author,
    location = EXCLUDED.location,
    publication_date = EXCLUDED.publication_date,
    body = EXCLUDED.body,
    body_html = EXCLUDED.body_html,
    keywords = EXCLUDED.keywords,
    scraped_at = EXCLUDED.scraped_at,
    updated_at = NOW()
  RETURNING id, (xmax = 0) AS inserted, (SELECT url FROM previous) AS previous_url
`;

const DELETE_IMAGES = 'DELETE FROM article_images WHERE article_id = $1';

const INSERT_IMAGE = `
  INSERT INTO article_images (article_id, url, caption, position)
  VALUES ($1, $2, $3, $4)
`;

const INSERT_SCRAPE_RUN = `
  INSERT INTO scrape_runs (
    source, run_type, target_date, started_at, completed_at,
    total_articles, successful_articles, failed_articles,
    new_articles, updated_articles, errors, status,
    proxy_used, duration_seconds
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
  RETURNING id::text AS id
`;

const SELECT_PROGRESS = `
  SELECT last_completed_date::text AS last_completed_date, status
  FROM backfill_progress
  WHERE source = $1
`;

const UPSERT_PROGRESS = `
  INSERT INTO backfill_progress (source, last_completed_date, status, started_at, updated_at)
  VALUES ($1, $2, $3, NOW(), NOW())
  ON CONFLICT (source) DO UPDATE SET
    last_completed_date = EXCLUDED.last_completed_date,
    status = EXCLUDED.status,
    updated_at = NOW()
`;

interface UpsertRow extends QueryResultRow {
  id: string;
  inserted: boolean;
  previous_url: string | null;
}

const ProgressRowSchema = z.object({
  last_completed_date: z.string(),
  status: z.enum(['in_progress', 'paused', 'completed']),
});

export const createPgPool = (config: Pick<AppConfig, 'database'>, logger: Logger): SqlPool => {
  const { database } = config;
  const pool = new pg.Pool({
    connectionString: database.url,
    min: database.poolMin,
    max: database.poolMax,
    idleTimeoutMillis: database.idleTimeoutMs,
    statement_timeout: database.statementTimeoutMs,
  });
  pool.on('error', (error) => {
    logger.error('Idle database client error', { error: error.message });
  });

  return {
    query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) => pool.query<R>(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
          client.query<R>(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
};

export interface PgArticleSinkOptions {
  pool: SqlPool;
  logger: Logger;
}

export const createPgArticleSink = ({ pool, logger }: PgArticleSinkOptions): ArticleSink => {
  const upsertArticle = async (article: Article, source: string): Promise<UpsertOutcome> => {
    if (!article.articleId) {
      throw new Error(`Article has no id: ${article.url}`);
    }

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const { rows } = await client.query<UpsertRow>(UPSERT_ARTICLE, [
        source,
        article.articleId,
        article.url,
        article.title,
        article.subtitle,
        article.section,
        article.source,
        article.location,
        article.date && isIsoDay(article.date) ? article.date : null,
        article.body,
        article.bodyHtml,
        [...article.keywords],
        article.scrapedAt,
      ]);
      const row = rows[0];
      if (!row) {
        throw new Error(`Upsert returned no row for article ${article.articleId}`);
      }

      // Images are replaced wholesale on every write.
      if (!row.inserted) {
        await client.query(DELETE_IMAGES, [row.id]);
      }
      for (const [position, image] of article.images.entries()) {
        await client.query(INSERT_IMAGE, [row.id, image.url, image.caption, position]);
      }
      await client.query('COMMIT');

      if (!row.inserted && row.previous_url && row.previous_url !== article.url) {
        logger.warn('Article id reused by a different URL; stored row overwritten', {
          source,
          articleId: article.articleId,
          previousUrl: row.previous_url,
          url: article.url,
        });
      }
      return row.inserted ? 'inserted' : 'updated';
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.warn('Rollback failed', { articleId: article.articleId, error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  };

  const bulkUpsertArticles = async (articles: readonly Article[], source: string): Promise<InsertResult> => {
    const result = emptyInsertResult(articles.length);
    for (const article of articles) {
      try {
        const outcome = await upsertArticle(article, source);
        if (outcome === 'inserted') {
          result.inserted += 1;
        } else {
          result.updated += 1;
        }
      } catch (error) {
        const message = `Failed to upsert article ${article.articleId ?? article.url}: ${errorMessage(error)}`;
        logger.error('Article upsert failed', { source, url: article.url, error: errorMessage(error) });
        result.errors.push(message);
      }
    }
    logger.info('Bulk upsert complete', {
      source,
      total: result.total,
      inserted: result.inserted,
      updated: result.updated,
      errors: result.errors.length,
    });
    return result;
  };

  const recordScrapeRun = async (run: ScrapeRunRecord): Promise<string> => {
    const { rows } = await pool.query<{ id: string }>(INSERT_SCRAPE_RUN, [
      run.source,
      run.runType,
      run.targetDate,
      run.startedAt,
      run.completedAt,
      run.totalArticles,
      run.successfulArticles,
      run.failedArticles,
      run.newArticles,
      run.updatedArticles,
      run.errors.length ? JSON.stringify(run.errors) : null,
      run.status,
      run.proxyUsed,
      run.durationSeconds,
    ]);
    return rows[0]?.id ?? '';
  };

  const getBackfillProgress = async (source: string): Promise<BackfillProgress | null> => {
    const { rows } = await pool.query(SELECT_PROGRESS, [source]);
    if (!rows.length) {
      return null;
    }
    const row = ProgressRowSchema.parse(rows[0]);
    return { source, lastCompletedDate: row.last_completed_date, status: row.status };
  };

  const updateBackfillProgress = async (progress: BackfillProgress): Promise<void> => {
    await pool.query(UPSERT_PROGRESS, [progress.source, progress.lastCompletedDate, progress.status]);
  };

  const healthCheck = async (): Promise<boolean> => {
    try {
      const { rows } = await pool.query<{ ok: number }>('SELECT 1 AS ok');
      return rows[0]?.ok === 1;
    } catch (error) {
      logger.error('Database health check failed', { error: errorMessage(error) });
      return false;
    }
  };

  const countArticles = async (source?: string): Promise<number> => {
    const { rows } = source
      ? await pool.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM articles WHERE source = $1', [source])
      : await pool.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM articles');
    return rows[0]?.count ?? 0;
  };

  const applySchema = async (): Promise<void> => {
    const sql = await fs.readFile(SCHEMA_FILE, 'utf-8');
    await pool.query(sql);
    logger.info('Database schema applied');
  };

  return {
    upsertArticle,
    bulkUpsertArticles,
    recordScrapeRun,
    getBackfillProgress,
    updateBackfillProgress,
    healthCheck,
    countArticles,
    applySchema,
    close: () => pool.end(),
  };
};
