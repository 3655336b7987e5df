/**
 * Shared configuration: .env loading and typed storage settings
 */

export * from './env.js';
export * from './storage.js';
