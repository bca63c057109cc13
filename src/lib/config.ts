/**
 * Configuration
 *
 * Engine settings are parsed with zod; every field has a default, so
 * engineConfigSchema.parse({}) is the stock configuration. Server
 * settings are read lazily and throw when a required one is missing.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// ENGINE CONFIG
// ─────────────────────────────────────────────────────────────

const DEFAULT_CURRENCIES = [
  'EGP',
  'USD',
  'EUR',
  'GBP',
  'CAD',
  'AUD',
  'JPY',
  'CHF',
  'SEK',
  'NOK',
  'DKK',
];

const DEFAULT_SYMBOLS: Record<string, string> = {
  EGP: 'E£',
  USD: '$',
  EUR: '€',
  GBP: '£',
  CAD: 'C$',
  AUD: 'A$',
  JPY: '¥',
  CHF: 'CHF',
  SEK: 'kr',
  NOK: 'kr',
  DKK: 'kr',
};

const days = z.number().int().min(0);

export const currencyConfigSchema = z.object({
  default: z.string().length(3).default('EGP'),
  supported: z.array(z.string()).min(1).default(() => [...DEFAULT_CURRENCIES]),
  symbols: z.record(z.string()).default(() => ({ ...DEFAULT_SYMBOLS })),
  fallbackToDefault: z.boolean().default(true),
});

export const engineConfigSchema = z
  .object({
    gracePeriodDays: days.default(3),
    trialPeriodDays: days.default(14),
    autoRenewalDefault: z.boolean().default(true),
    expiringSoonDays: days.default(7),
    trial: z
      .object({
        minDays: days.default(3),
        maxDays: days.default(30),
        allowMultipleTrialsPerPlan: z.boolean().default(false),
      })
      .default({}),
    planChanges: z
      .object({
        allowDowngrades: z.boolean().default(true),
        preventDowngradeWithExcessUsage: z.boolean().default(true),
        allowPlanChangeDuringTrial: z.boolean().default(true),
        resetUsageOnPlanChange: z.boolean().default(true),
      })
      .default({}),
    renewal: z
      .object({
        lookaheadHours: z.number().min(0).default(0),
      })
      .default({}),
    locale: z
      .object({
        default: z.string().default('en'),
        fallback: z.string().default('en'),
      })
      .default({}),
    currency: currencyConfigSchema.default({}),
  })
  .refine((config) => config.trial.minDays <= config.trial.maxDays, {
    message: 'trial.minDays must not exceed trial.maxDays',
    path: ['trial'],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type CurrencyConfig = z.infer<typeof currencyConfigSchema>;

export function defineEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return engineConfigSchema.parse(input);
}

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer`);
  }
  return value;
}

function readBool(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  if (raw === 'false' || raw === '0') {
    return false;
  }
  throw new Error(`${name} must be true or false`);
}

function readList(env: Env, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item !== '');
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Build engine config from SUBSCRIPTION_* variables
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return defineEngineConfig({
    gracePeriodDays: readInt(env, 'SUBSCRIPTION_GRACE_PERIOD_DAYS'),
    trialPeriodDays: readInt(env, 'SUBSCRIPTION_TRIAL_PERIOD_DAYS'),
    autoRenewalDefault: readBool(env, 'SUBSCRIPTION_AUTO_RENEWAL_DEFAULT'),
    expiringSoonDays: readInt(env, 'SUBSCRIPTION_EXPIRING_SOON_DAYS'),
    trial: {
      minDays: readInt(env, 'SUBSCRIPTION_TRIAL_MIN_DAYS'),
      maxDays: readInt(env, 'SUBSCRIPTION_TRIAL_MAX_DAYS'),
      allowMultipleTrialsPerPlan: readBool(env, 'SUBSCRIPTION_ALLOW_MULTIPLE_TRIALS'),
    },
    planChanges: {
      allowDowngrades: readBool(env, 'SUBSCRIPTION_ALLOW_DOWNGRADES'),
      preventDowngradeWithExcessUsage: readBool(
        env,
        'SUBSCRIPTION_PREVENT_DOWNGRADE_WITH_EXCESS_USAGE'
      ),
      allowPlanChangeDuringTrial: readBool(env, 'SUBSCRIPTION_ALLOW_CHANGE_DURING_TRIAL'),
      resetUsageOnPlanChange: readBool(env, 'SUBSCRIPTION_RESET_USAGE_ON_PLAN_CHANGE'),
    },
    renewal: {
      lookaheadHours: readInt(env, 'SUBSCRIPTION_RENEWAL_LOOKAHEAD_HOURS'),
    },
    locale: {
      default: readString(env, 'SUBSCRIPTION_DEFAULT_LOCALE'),
      fallback: readString(env, 'SUBSCRIPTION_FALLBACK_LOCALE'),
    },
    currency: {
      default: readString(env, 'SUBSCRIPTION_DEFAULT_CURRENCY')?.toUpperCase(),
      supported: readList(env, 'SUBSCRIPTION_SUPPORTED_CURRENCIES'),
      fallbackToDefault: readBool(env, 'SUBSCRIPTION_CURRENCY_FALLBACK'),
    },
  });
}

// ─────────────────────────────────────────────────────────────
// SERVER CONFIG
// ─────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  port: number;
  apiKey: string;
  allowedOrigins: string[];
  logLevel: LogLevel;
}

function required(env: Env, name: string): string {
  const value = env[name];
  if (value === undefined || value === '') {
    throw new Error(`${name} is required`);
  }
  return value;
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']).default('info');

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readInt(env, 'PORT') ?? 3000,
    apiKey: required(env, 'ENGINE_API_KEY'),
    allowedOrigins: (env.ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    logLevel: logLevelSchema.parse(readString(env, 'LOG_LEVEL')),
  };
}

// ─────────────────────────────────────────────────────────────
// BACKING STORES
// ─────────────────────────────────────────────────────────────

export interface SupabaseSettings {
  url: string;
  serviceKey: string;
}

export interface RedisSettings {
  url: string;
  token: string;
}

export function loadSupabaseSettings(env: Env = process.env): SupabaseSettings {
  return {
    url: required(env, 'SUPABASE_URL'),
    serviceKey: required(env, 'SUPABASE_SERVICE_KEY'),
  };
}

/**
 * Upstash settings, or null when either variable is unset
 */
export function loadRedisSettings(env: Env = process.env): RedisSettings | null {
  const url = readString(env, 'UPSTASH_REDIS_URL');
  const token = readString(env, 'UPSTASH_REDIS_TOKEN');
  if (url === undefined || token === undefined) {
    return null;
  }
  return { url, token };
}
