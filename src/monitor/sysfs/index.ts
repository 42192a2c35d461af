/**
 * sysfs Data Sources
 */

export * from './sysfs-reader.js';
export * from './temperature.js';
export * from './battery.js';
export * from './diagnostics.js';
