/**
 * Configuration Module - Index
 *
 * Exports all configuration functionality for platform-core
 */

// Database configuration utilities
export * from './database-config.js';

// Environment configuration utilities
export * from './environment-config.js';
