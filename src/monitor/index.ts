/**
 * sysfs-monitor
 *
 * Terminal display of thermal zone, hwmon and battery telemetry with
 * pluggable sensor groups and a size-aware full/compact layout.
 */

export * from './types/index.js';
export * from './sensors/index.js';
export * from './sysfs/index.js';
export * from './render/index.js';
export * from './config/configuration.js';
export * from './system-monitor/index.js';
export * from './runtime/terminal-host.js';
