/**
 * Job Routes
 * HTTP trigger for the lifecycle sweeps, for schedulers that call URLs
 * (cron services, queue webhooks) instead of running scripts/run-job.ts
 */

import { Hono } from 'hono';

import type { JobOptions, LifecycleJobs } from '@/workers/lifecycle-jobs.js';

import { jobSchema, resetUsageJobSchema } from '../schemas/subscription.schemas.js';
import { getRequestId, parseBody, successResponse } from '../utils/response.js';

interface JobRoutesDeps {
  jobs: LifecycleJobs;
}

function toOptions(body: { dryRun: boolean; limit?: number | undefined }): JobOptions {
  return {
    dryRun: body.dryRun,
    ...(body.limit !== undefined && { limit: body.limit }),
  };
}

export function createJobRoutes(deps: JobRoutesDeps): Hono {
  const { jobs } = deps;
  const app = new Hono();

  /**
   * POST /jobs/expire
   */
  app.post('/jobs/expire', async (c) => {
    const body = await parseBody(c, jobSchema);
    if (!body.success) {
      return body.response;
    }
    const report = await jobs.expireOverdue(toOptions(body.data));
    return successResponse(c, report, getRequestId(c));
  });

  /**
   * POST /jobs/renew
   */
  app.post('/jobs/renew', async (c) => {
    const body = await parseBody(c, jobSchema);
    if (!body.success) {
      return body.response;
    }
    const report = await jobs.autoRenew(toOptions(body.data));
    return successResponse(c, report, getRequestId(c));
  });

  /**
   * POST /jobs/reset-usage
   */
  app.post('/jobs/reset-usage', async (c) => {
    const body = await parseBody(c, resetUsageJobSchema);
    if (!body.success) {
      return body.response;
    }
    const report = await jobs.resetDueUsage(body.data.period, toOptions(body.data));
    return successResponse(c, report, getRequestId(c));
  });

  return app;
}
