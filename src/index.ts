/**
 * Public entry point: simulation engine, response functions and shared utilities
 */

export * from './digital-twin-engine/response-functions';
export * from './digital-twin-engine/chamber-thermal';
export * from './digital-twin-engine/potato-growth-simulation';
export * from './digital-twin-engine/scenario-comparison';
export * from './shared';
