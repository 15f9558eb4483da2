import type { Article, ExtractionResult, RunMetadata } from '../../shared/types';
import { perSecond } from '../utils/text';

export interface AggregatedResults {
  /** Successful extractions in completion order. */
  articles: Article[];
  failures: Array<Extract<ExtractionResult, { ok: false }>>;
}

export const aggregateResults = (results: readonly ExtractionResult[]): AggregatedResults => {
  const successes: Array<Extract<ExtractionResult, { ok: true }>> = [];
  const failures: Array<Extract<ExtractionResult, { ok: false }>> = [];
  for (const result of results) {
    if (result.ok) {
      successes.push(result);
    } else {
      failures.push(result);
    }
  }
  successes.sort((a, b) => a.finishedAt - b.finishedAt);
  return { articles: successes.map((result) => result.article), failures };
};

export const startRunMetadata = (date: string, startedAt: Date, proxyUsed: boolean): RunMetadata => ({
  date,
  startTime: startedAt.toISOString(),
  endTime: null,
  totalArticles: 0,
  successfulArticles: 0,
  failedArticles: 0,
  errors: [],
  proxyUsed,
  durationSeconds: null,
});

export const finishRunMetadata = (metadata: RunMetadata, endedAt: Date): RunMetadata => {
  metadata.endTime = endedAt.toISOString();
  metadata.durationSeconds = Math.max(0, (endedAt.getTime() - Date.parse(metadata.startTime)) / 1000);
  return metadata;
};

export interface RunSummary {
  date: string;
  successful: number;
  failed: number;
  total: number;
  durationSeconds: number;
  articlesPerSecond: number;
}

export const summarizeRun = (metadata: RunMetadata): RunSummary => {
  const durationSeconds = metadata.durationSeconds ?? 0;
  return {
    date: metadata.date,
    successful: metadata.successfulArticles,
    failed: metadata.failedArticles,
    total: metadata.totalArticles,
    durationSeconds: Number(durationSeconds.toFixed(2)),
    articlesPerSecond: perSecond(metadata.totalArticles, durationSeconds),
  };
};
