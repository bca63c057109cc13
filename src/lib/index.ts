/**
 * Shared Library Exports
 */

export { createSupabaseAdmin } from './supabase.js';
export { getRedis } from './redis.js';
export * from './config.js';
export * from './dates.js';
export * from './locks.js';
export * from './logger.js';
