import { parseArgs } from 'node:util';
import { z } from 'zod';
import { clampConcurrency } from '../../shared/config';
import { isIsoDay } from '../utils/dates';

export const USAGE = `Usage: daily-archive-scraper [options]

  --date YYYY-MM-DD           Scrape a single day
  --start-date YYYY-MM-DD     Range start (with --end-date), or oldest day for --backfill
  --end-date YYYY-MM-DD       Range end
  --today                     Scrape today plus the last RESCRAPE_DAYS days
  --backfill                  Walk history backward from yesterday
  --resume                    Continue the last backfill from its checkpoint
  --concurrent N              Parallel article fetches (1-20)
  --db-only                   Skip JSON files
  --no-db                     Skip the database
  --health-check              Check the database connection and exit
  --init-db                   Apply sql/schema.sql and exit
  --help                      Show this message`;

const isoDay = z.string().refine(isIsoDay, (value) => ({ message: `Invalid date "${value}", expected YYYY-MM-DD` }));

const concurrency = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform((value) => clampConcurrency(Number(value)));

const RawArgsSchema = z
  .object({
    date: isoDay.optional(),
    'start-date': isoDay.optional(),
    'end-date': isoDay.optional(),
    today: z.boolean().default(false),
    backfill: z.boolean().default(false),
    resume: z.boolean().default(false),
    concurrent: concurrency.optional(),
    'db-only': z.boolean().default(false),
    'no-db': z.boolean().default(false),
    'health-check': z.boolean().default(false),
    'init-db': z.boolean().default(false),
    help: z.boolean().default(false),
  })
  .superRefine((args, ctx) => {
    if (args['db-only'] && args['no-db']) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--db-only and --no-db are mutually exclusive' });
    }
    if (args['start-date'] && args['end-date'] && args['start-date'] > args['end-date']) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--start-date must not be after --end-date' });
    }
  });

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'health-check' }
  | { kind: 'init-db' }
  | { kind: 'date'; date: string }
  | { kind: 'range'; startDate: string; endDate: string }
  | { kind: 'today' }
  | { kind: 'backfill'; startDate?: string; resume: boolean };

export interface CliOptions {
  command: CliCommand;
  /** Unset when the flag was not given; the configured value applies. */
  concurrency?: number;
  saveFiles: boolean;
  useDatabase: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const resolveCommand = (args: z.infer<typeof RawArgsSchema>): CliCommand => {
  if (args.help) return { kind: 'help' };
  if (args['health-check']) return { kind: 'health-check' };
  if (args['init-db']) return { kind: 'init-db' };
  if (args.backfill) return { kind: 'backfill', startDate: args['start-date'], resume: args.resume };
  if (args.resume) {
    throw new CliUsageError('--resume only applies to --backfill');
  }
  if (args.today) return { kind: 'today' };
  if (args.date) return { kind: 'date', date: args.date };
  if (args['start-date'] && args['end-date']) {
    return { kind: 'range', startDate: args['start-date'], endDate: args['end-date'] };
  }
  throw new CliUsageError('Must specify --date, --today, --start-date/--end-date, or --backfill');
};

export const parseCliArgs = (argv: string[]): CliOptions => {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        date: { type: 'string' },
        'start-date': { type: 'string' },
        'end-date': { type: 'string' },
        today: { type: 'boolean' },
        backfill: { type: 'boolean' },
        resume: { type: 'boolean' },
        concurrent: { type: 'string' },
        'db-only': { type: 'boolean' },
        'no-db': { type: 'boolean' },
        'health-check': { type: 'boolean' },
        'init-db': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  const parsed = RawArgsSchema.safeParse(values);
  if (!parsed.success) {
    throw new CliUsageError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  const args = parsed.data;

  return {
    command: resolveCommand(args),
    concurrency: args.concurrent,
    saveFiles: !args['db-only'],
    useDatabase: !args['no-db'],
  };
};
