/**
 * Health Module - Index
 *
 * Exports all health checking functionality for platform-core
 */

// Types and interfaces
export * from './types.js';

// Utilities
export * from './utilities.js';
