/**
 * Shared utilities index file
 * Exports all utility functions and classes
 */

export * from './lambda-response';
export * from './validation';
export * from './logger';
