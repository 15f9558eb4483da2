import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { compactDay, localDay } from '../utils/dates';

type LogLevel = AppConfig['observability']['logLevel'];
type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export interface LoggerOptions {
  now?: () => Date;
}

type LineSink = (level: LogLevel, line: string) => void;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** One file per local calendar day, e.g. `scraper_20241215.log`. */
export const dailyLogFileName = (at: Date): string => `scraper_${compactDay(localDay(at))}.log`;

// Errors always reach the console, whatever the threshold.
const consoleSink =
  (threshold: number): LineSink =>
  (level, line) => {
    if (level !== 'error' && levelWeights[level] < threshold) {
      return;
    }
    /* eslint-disable no-console */
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
    /* eslint-enable no-console */
  };

/**
 * Appends every line, debug included, to the current day's file. The first
 * write failure turns the file sink off and is reported once on the console.
 */
const dailyFileSink = (logsDir: string, now: () => Date): LineSink => {
  let dirReady = false;
  let disabled = false;
  return (_level, line) => {
    if (disabled) {
      return;
    }
    try {
      if (!dirReady) {
        fs.mkdirSync(logsDir, { recursive: true });
        dirReady = true;
      }
      fs.appendFileSync(path.join(logsDir, dailyLogFileName(now())), `${line}\n`, 'utf-8');
    } catch (error) {
      disabled = true;
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({
          level: 'error',
          message: 'Log file unavailable; logging to console only',
          ts: now().toISOString(),
          logsDir,
          error: errorMessage(error),
        }),
      );
    }
  };
};

export const createLogger = (
  config: Pick<AppConfig, 'observability'>,
  { now = () => new Date() }: LoggerOptions = {},
): Logger => {
  const { logLevel, logsDir } = config.observability;
  const sinks: LineSink[] = [consoleSink(levelWeights[logLevel])];
  if (logsDir) {
    sinks.push(dailyFileSink(logsDir, now));
  }

  const write =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      const line = JSON.stringify({ level, message, ts: now().toISOString(), ...meta });
      for (const sink of sinks) {
        sink(level, line);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
};
