/**
 * System Monitor Component
 */

export * from './system-monitor.js';
