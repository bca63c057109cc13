/**
 * Type Exports
 */

export * from './result.js';
export * from './errors.js';
export * from './auth.js';
export * from './flexible-value.js';
export * from './entitlement.js';
export * from './events.js';
