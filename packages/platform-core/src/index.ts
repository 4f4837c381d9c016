/**
 * Platform Core - Shared Utilities for netkpi services
 *
 * Provides consistent platform patterns across services:
 * - Structured logging with correlation tracking
 * - Error handling patterns
 * - Configuration management utilities
 * - PostgreSQL connection management
 * - HTTP response helpers and request validation
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './health/index.js';
export * from './http/index.js';
export * from './logging/index.js';
export * from './database/index.js';
export * from './middleware/index.js';
