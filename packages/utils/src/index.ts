/**
 * @servefs/utils
 *
 * Shared utilities for servefs packages
 */

// Error classes
export * from './errors';
