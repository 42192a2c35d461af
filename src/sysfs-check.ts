#!/usr/bin/env node
/**
 * sysfs-check
 *
 * One-shot diagnostic that prints what the monitor would read from sysfs.
 */

import { logError, logInfo, logWarn } from './logger.js';
import { configureLogging } from './logging/subsystem.js';
import { loadMonitorConfig } from './monitor/config/configuration.js';
import { describeSysfs } from './monitor/sysfs/diagnostics.js';

try {
  const { config, errors } = loadMonitorConfig(process.env);
  configureLogging({ level: config.logLevel, file: config.logFile });
  for (const error of errors) {
    logWarn(`sysfs-check: ${error}`);
  }
  for (const line of describeSysfs(config.paths)) {
    logInfo(line);
  }
} catch (error) {
  logError(`sysfs-check: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
