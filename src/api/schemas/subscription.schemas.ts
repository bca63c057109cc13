/**
 * Request body schemas for the subscription endpoints
 */

import { z } from 'zod';

const id = z.string().trim().min(1);

export const subscribeSchema = z.object({
  planId: id,
  pricingId: id,
  trialDays: z.number().int().min(0).optional(),
});

export const startTrialSchema = z.object({
  planId: id,
  trialDays: z.number().int().positive().optional(),
});

export const changePlanSchema = z.object({
  planId: id,
  pricingId: id,
  currency: z.string().length(3).optional(),
  resetUsage: z.boolean().optional(),
});

export const duplicateSchema = z.object({
  startDate: z.string().datetime({ offset: true }).optional(),
  withTrial: z.boolean().optional(),
});

export const consumeSchema = z.object({
  amount: z.number().int().positive().default(1),
});

export const jobSchema = z.object({
  dryRun: z.boolean().default(false),
  limit: z.number().int().positive().max(10_000).optional(),
});

export const resetUsageJobSchema = jobSchema.extend({
  period: z.enum(['daily', 'monthly', 'yearly', 'all']).default('all'),
});

export type SubscribeBody = z.infer<typeof subscribeSchema>;
export type ChangePlanBody = z.infer<typeof changePlanSchema>;
