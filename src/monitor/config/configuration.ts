/**
 * Monitor Configuration
 *
 * Defaults, environment overrides and validation for MonitorConfig.
 */

import { posix } from 'node:path';
import { isLogLevel } from '../../logging/subsystem.js';
import type { MonitorConfig } from '../types/monitor-config.js';
import { HWMON_BASE_PATH, THERMAL_BASE_PATH } from '../sysfs/temperature.js';
import { POWER_SUPPLY_BASE_PATH } from '../sysfs/battery.js';

export const MIN_REFRESH_INTERVAL_MS = 100;
// Node.js timers fire after 1ms for any longer delay
export const MAX_REFRESH_INTERVAL_MS = 2_147_483_647;

export const ENV_KEYS = {
  refreshIntervalMs: 'SYSFS_MONITOR_REFRESH_MS',
  twoColumnMinWidth: 'SYSFS_MONITOR_TWO_COLUMN_WIDTH',
  thermalPath: 'SYSFS_MONITOR_THERMAL_PATH',
  hwmonPath: 'SYSFS_MONITOR_HWMON_PATH',
  powerSupplyPath: 'SYSFS_MONITOR_POWER_SUPPLY_PATH',
  systemGroup: 'SYSFS_MONITOR_SYSTEM_GROUP',
  logLevel: 'SYSFS_MONITOR_LOG_LEVEL',
  logFile: 'SYSFS_MONITOR_LOG_FILE',
} as const;

export type Environment = Record<string, string | undefined>;

export function createDefaultMonitorConfig(): MonitorConfig {
  return {
    refreshIntervalMs: 2000,
    twoColumnMinWidth: 80,
    paths: {
      thermal: THERMAL_BASE_PATH,
      hwmon: HWMON_BASE_PATH,
      powerSupply: POWER_SUPPLY_BASE_PATH,
    },
    systemGroup: true,
    logLevel: 'info',
  };
}

function isValidRefreshInterval(ms: number): boolean {
  return Number.isInteger(ms) && ms >= MIN_REFRESH_INTERVAL_MS && ms <= MAX_REFRESH_INTERVAL_MS;
}

/**
 * Validates configuration for consistency. Returns one message per problem.
 */
export function validateMonitorConfig(config: MonitorConfig): string[] {
  const errors: string[] = [];

  if (!isValidRefreshInterval(config.refreshIntervalMs)) {
    errors.push(
      `Refresh interval must be an integer from ${MIN_REFRESH_INTERVAL_MS} to ${MAX_REFRESH_INTERVAL_MS}ms`,
    );
  }
  if (!Number.isInteger(config.twoColumnMinWidth) || config.twoColumnMinWidth <= 0) {
    errors.push('Two-column minimum width must be a positive integer');
  }

  for (const [key, path] of Object.entries(config.paths)) {
    if (!posix.isAbsolute(path)) {
      errors.push(`Path for ${key} must be absolute: ${path}`);
    }
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`Unknown log level: ${String(config.logLevel)}`);
  }

  return errors;
}

/**
 * Applies environment overrides on top of the defaults. Overrides that fail
 * validation are dropped in favour of the default and reported in `errors`.
 */
export function loadMonitorConfig(env: Environment = process.env): { config: MonitorConfig; errors: string[] } {
  const defaults = createDefaultMonitorConfig();
  const config = createDefaultMonitorConfig();
  const errors: string[] = [];

  const integer = (key: string): number | undefined => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const parsed = Number(raw.trim());
    if (!Number.isInteger(parsed)) {
      errors.push(`${key} must be an integer, got "${raw}"`);
      return undefined;
    }
    return parsed;
  };

  config.refreshIntervalMs = integer(ENV_KEYS.refreshIntervalMs) ?? defaults.refreshIntervalMs;
  config.twoColumnMinWidth = integer(ENV_KEYS.twoColumnMinWidth) ?? defaults.twoColumnMinWidth;

  config.paths.thermal = env[ENV_KEYS.thermalPath] || defaults.paths.thermal;
  config.paths.hwmon = env[ENV_KEYS.hwmonPath] || defaults.paths.hwmon;
  config.paths.powerSupply = env[ENV_KEYS.powerSupplyPath] || defaults.paths.powerSupply;

  const systemGroup = env[ENV_KEYS.systemGroup];
  if (systemGroup !== undefined && systemGroup !== '') {
    const normalized = systemGroup.trim().toLowerCase();
    if (normalized === '1' || normalized === 'true') {
      config.systemGroup = true;
    } else if (normalized === '0' || normalized === 'false') {
      config.systemGroup = false;
    } else {
      errors.push(`${ENV_KEYS.systemGroup} must be 0, 1, true or false, got "${systemGroup}"`);
    }
  }

  const logLevel = env[ENV_KEYS.logLevel];
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      errors.push(`${ENV_KEYS.logLevel} must be one of trace, debug, info, warn, error, fatal, got "${logLevel}"`);
    }
  }

  const logFile = env[ENV_KEYS.logFile];
  if (logFile) {
    config.logFile = logFile;
  }

  // Fall back field by field for values that parsed but are out of range
  const validation = validateMonitorConfig(config);
  if (validation.length > 0) {
    errors.push(...validation);
    if (!isValidRefreshInterval(config.refreshIntervalMs)) {
      config.refreshIntervalMs = defaults.refreshIntervalMs;
    }
    if (config.twoColumnMinWidth <= 0) {
      config.twoColumnMinWidth = defaults.twoColumnMinWidth;
    }
    for (const key of ['thermal', 'hwmon', 'powerSupply'] as const) {
      if (!posix.isAbsolute(config.paths[key])) {
        config.paths[key] = defaults.paths[key];
      }
    }
  }

  return { config, errors };
}
