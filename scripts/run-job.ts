/**
 * Run a lifecycle job once
 * Usage: npx tsx scripts/run-job.ts <expire|renew|reset-usage> [--dry-run] [--limit N] [--period daily|monthly|yearly|all]
 *
 * Meant for cron. Exits 1 when any item failed.
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';

import { createEngine } from '../src/bootstrap.js';
import type { JobOptions, JobReport, ResettablePeriod } from '../src/workers/index.js';
import { RESETTABLE_PERIODS } from '../src/workers/index.js';

const USAGE =
  'Usage: run-job <expire|renew|reset-usage> [--dry-run] [--limit N] [--period daily|monthly|yearly|all]';

function parsePeriod(raw: string | undefined): ResettablePeriod | 'all' {
  if (raw === undefined || raw === 'all') {
    return 'all';
  }
  const match = RESETTABLE_PERIODS.find((p) => p === raw);
  if (match === undefined) {
    throw new Error(`Unknown period: ${raw}`);
  }
  return match;
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error('--limit must be a positive integer');
  }
  return limit;
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'dry-run': { type: 'boolean', default: false },
      limit: { type: 'string' },
      period: { type: 'string' },
    },
  });

  const [job] = positionals;
  const limit = parseLimit(values.limit);
  const options: JobOptions = {
    dryRun: values['dry-run'] === true,
    ...(limit !== undefined && { limit }),
  };

  const { jobs } = createEngine();

  let report: JobReport;
  switch (job) {
    case 'expire':
      report = await jobs.expireOverdue(options);
      break;
    case 'renew':
      report = await jobs.autoRenew(options);
      break;
    case 'reset-usage':
      report = await jobs.resetDueUsage(parsePeriod(values.period), options);
      break;
    default:
      console.error(USAGE);
      return 2;
  }

  console.log(JSON.stringify(report, null, 2));
  return report.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Job failed:', error);
    process.exitCode = 1;
  });
