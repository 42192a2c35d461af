/**
 * Sensor Components
 */

export * from './sensor.js';
export * from './adapters.js';
export * from './system-sensors.js';
