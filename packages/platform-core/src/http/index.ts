/**
 * HTTP Module - Index
 *
 * Exports all HTTP functionality for platform-core
 */

// Response helpers
export * from './response-helpers.js';
