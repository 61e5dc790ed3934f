/**
 * Main types export file for the Potato Chamber Twin
 */

// Core types
export * from './core';

// Potato twin types
export * from './potato-twin';
