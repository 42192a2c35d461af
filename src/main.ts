#!/usr/bin/env node
/**
 * sysfs-monitor entry point
 *
 * Runs the telemetry display in the current terminal until 'q' or Ctrl+C.
 */

import { emitKeypressEvents } from 'node:readline';
import { logError, logWarn } from './logger.js';
import { configureLogging, createSubsystemLogger } from './logging/subsystem.js';
import { loadMonitorConfig } from './monitor/config/configuration.js';
import { TerminalHost } from './monitor/runtime/terminal-host.js';
import { createSystemSensorGroup } from './monitor/sensors/system-sensors.js';
import { SystemMonitor } from './monitor/system-monitor/system-monitor.js';

async function main(): Promise<void> {
  const { config, errors } = loadMonitorConfig(process.env);
  configureLogging({ level: config.logLevel, file: config.logFile });
  for (const error of errors) {
    logWarn(`sysfs-monitor: ${error}`);
  }

  const log = createSubsystemLogger('main');
  const monitor = new SystemMonitor({ config });
  if (config.systemGroup) {
    monitor.registerSensorGroup(createSystemSensorGroup());
  }

  emitKeypressEvents(process.stdin);
  const host = new TerminalHost(monitor, { input: process.stdin, output: process.stdout });
  await host.start();
  log.info('Exiting');
}

try {
  await main();
} catch (error) {
  logError(`sysfs-monitor: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
