import type { ArtifactStore } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import { loadConfig } from '../config/config';
import { createLogger, errorMessage, type Logger } from '../obs/logger';
import { createFsArtifactStore } from '../persistence/fsStore';
import { createPgArticleSink, createPgPool } from '../persistence/pgStore';
import type { ArticleSink } from '../persistence/types';
import { createBackfillController } from '../pipeline/backfill';
import { createArticlePipeline, type ArticlePipeline } from '../pipeline/scrapeDate';
import { createFetcher, type FetchFn } from '../retrieval/fetcher';
import { createPageParser } from '../retrieval/pageParser';
import type { Sleep } from '../utils/async';
import { addDays, localDay } from '../utils/dates';
import { CliUsageError, USAGE, parseCliArgs, type CliCommand, type CliOptions } from './args';

/** Where shutdown signals come from; `process` outside tests. */
export interface SignalSource {
  on: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
  off: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
}

export interface RunCliDeps {
  loadConfig?: () => AppConfig;
  /** Builds the relational sink; defaults to PostgreSQL. */
  createSink?: (config: AppConfig, logger: Logger) => ArticleSink;
  /** Transport for every site request; defaults to undici's fetch. */
  fetchFn?: FetchFn;
  sleep?: Sleep;
  now?: () => Date;
  signals?: SignalSource;
}

type ScrapeDeps = Required<Pick<RunCliDeps, 'createSink' | 'now' | 'signals'>> & Pick<RunCliDeps, 'fetchFn' | 'sleep'>;

const defaultCreateSink = (config: AppConfig, logger: Logger): ArticleSink =>
  createPgArticleSink({ pool: createPgPool(config, logger), logger });

const connectSink = async (
  config: AppConfig,
  logger: Logger,
  createSink: NonNullable<RunCliDeps['createSink']>,
): Promise<ArticleSink | null> => {
  const sink = createSink(config, logger);
  if (await sink.healthCheck()) {
    logger.info('Database connected');
    return sink;
  }
  logger.warn('Database connection failed; continuing in file-only mode');
  await sink.close();
  return null;
};

const runHealthCheck = async (config: AppConfig, logger: Logger, sink: ArticleSink): Promise<number> => {
  logger.info('Running health check');
  try {
    if (!(await sink.healthCheck())) {
      return 1;
    }
    const count = await sink.countArticles(config.site.sourceName);
    logger.info('Database connection OK', { source: config.site.sourceName, articles: count });
    return 0;
  } finally {
    await sink.close();
  }
};

const runInitDb = async (logger: Logger, sink: ArticleSink): Promise<number> => {
  try {
    await sink.applySchema();
    logger.info('Database initialised');
    return 0;
  } finally {
    await sink.close();
  }
};

const runBackfill = async (
  config: AppConfig,
  logger: Logger,
  pipeline: ArticlePipeline,
  sink: ArticleSink | null,
  command: Extract<CliCommand, { kind: 'backfill' }>,
  deps: Pick<ScrapeDeps, 'sleep' | 'now' | 'signals'>,
) => {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn('Shutdown signal received; finishing current date', { signal });
    controller.abort();
  };
  const { signals } = deps;
  signals.on('SIGINT', onSignal);
  signals.on('SIGTERM', onSignal);
  try {
    const backfill = createBackfillController({ config, logger, pipeline, sink, sleep: deps.sleep, now: deps.now });
    await backfill.run({ startDate: command.startDate, resume: command.resume, signal: controller.signal });
  } finally {
    signals.off('SIGINT', onSignal);
    signals.off('SIGTERM', onSignal);
  }
};

const runScrape = async (
  config: AppConfig,
  logger: Logger,
  options: CliOptions,
  deps: ScrapeDeps,
): Promise<number> => {
  const { createSink, fetchFn, sleep, now, signals } = deps;
  const concurrency = options.concurrency ?? config.scrape.concurrency;
  let saveFiles = options.saveFiles;
  logger.info('Scraper starting', {
    source: config.site.sourceName,
    outputDir: config.persistence.rootDir,
    concurrency,
    storage: { files: saveFiles, database: options.useDatabase },
  });

  let sink: ArticleSink | null = null;
  if (options.useDatabase) {
    try {
      sink = await connectSink(config, logger, createSink);
    } catch (error) {
      logger.warn('Database connection failed; continuing in file-only mode', { error: errorMessage(error) });
    }
    if (!sink && !saveFiles) {
      saveFiles = true;
    }
  }

  const artifactStore: ArtifactStore | null = saveFiles ? createFsArtifactStore(config) : null;
  if (artifactStore) {
    await artifactStore.ensureLayout();
  }

  const fetcher = createFetcher({ config, concurrency, logger, fetchFn, sleep });
  const parser = createPageParser({ site: config.site, now });
  const pipeline = createArticlePipeline({ config, logger, fetcher, parser, artifactStore, sink, sleep, now });

  try {
    const { command } = options;
    switch (command.kind) {
      case 'date':
        await pipeline.scrapeDate(command.date);
        break;
      case 'range':
        await pipeline.scrapeDateRange(command.startDate, command.endDate);
        break;
      case 'today': {
        const today = localDay(now());
        const { rescrapeDays } = config.scrape;
        if (rescrapeDays > 0) {
          logger.info('Scraping today and recent days', { from: addDays(today, -rescrapeDays), to: today });
          await pipeline.scrapeDateRange(addDays(today, -rescrapeDays), today, { runType: 'daily' });
        } else {
          await pipeline.scrapeDate(today);
        }
        break;
      }
      case 'backfill':
        await runBackfill(config, logger, pipeline, sink, command, { sleep, now, signals });
        break;
      default:
        throw new Error(`Unsupported command: ${command.kind}`);
    }
  } finally {
    await pipeline.close();
    await sink?.close();
  }

  logger.info('Scraping completed');
  return 0;
};

/** Runs one CLI invocation and resolves to the process exit code. */
export const runCli = async (argv: string[], deps: RunCliDeps = {}): Promise<number> => {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 1;
    }
    throw error;
  }

  if (options.command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let logger = createLogger({ observability: { logLevel: 'info', logsDir: null } });
  try {
    const config = (deps.loadConfig ?? loadConfig)();
    const now = deps.now ?? (() => new Date());
    logger = createLogger(config, { now });
    const createSink = deps.createSink ?? defaultCreateSink;

    switch (options.command.kind) {
      case 'health-check':
        return await runHealthCheck(config, logger, createSink(config, logger));
      case 'init-db':
        return await runInitDb(logger, createSink(config, logger));
      default:
        return await runScrape(config, logger, options, {
          createSink,
          now,
          signals: deps.signals ?? process,
          fetchFn: deps.fetchFn,
          sleep: deps.sleep,
        });
    }
  } catch (error) {
    logger.error('Fatal error', { error: errorMessage(error) });
    return 1;
  }
};
