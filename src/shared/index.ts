/**
 * Shared utilities and configuration exports
 */

// Utilities
export * from './utils';

// Configuration
export * from './config';

// Types (re-export for convenience)
export * from '../types';
