/**
 * Monitor Type Definitions
 */

export * from './telemetry.js';
export * from './monitor-config.js';
export * from './events.js';
