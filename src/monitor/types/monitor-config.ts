/**
 * MonitorConfig Interface
 *
 * Refresh cadence, layout width, sysfs locations and logging options
 * for the monitor and its command-line entry point.
 */

import type { LogLevel } from '../../logging/subsystem.js';

export interface SysfsPaths {
  /** Directory holding thermal_zone* entries */
  thermal: string;
  /** Directory holding hwmon* chips */
  hwmon: string;
  /** Directory holding power supply nodes */
  powerSupply: string;
}

export interface MonitorConfig {
  /** Delay between refresh ticks in milliseconds */
  refreshIntervalMs: number;
  /** Minimum width for the side-by-side temperature/battery layout */
  twoColumnMinWidth: number;
  paths: SysfsPaths;
  /** Register the built-in System sensor group */
  systemGroup: boolean;
  logLevel: LogLevel;
  logFile?: string;
}
