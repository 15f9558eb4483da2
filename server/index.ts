#!/usr/bin/env tsx
import 'dotenv/config';
import { runCli } from './cli/run';

const exitCode = await runCli(process.argv.slice(2));
process.exit(exitCode);
