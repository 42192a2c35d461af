/**
 * Built-in "System" sensor group backed by node:os.
 */

import { cpus, freemem, loadavg, totalmem, uptime } from 'node:os';
import { GenericSensor, type SensorGroup, type SensorReading } from './sensor.js';

export const MEMORY_WARNING_PERCENT = 80;
export const MEMORY_CRITICAL_PERCENT = 90;

export interface SystemProbe {
  loadAverage(): number;
  cpuCount(): number;
  memory(): { total: number; free: number };
  uptimeSeconds(): number;
}

export const osSystemProbe: SystemProbe = {
  loadAverage: () => loadavg()[0] ?? 0,
  cpuCount: () => cpus().length,
  memory: () => ({ total: totalmem(), free: freemem() }),
  uptimeSeconds: () => uptime(),
};

export function readLoad(probe: SystemProbe): SensorReading {
  const load = probe.loadAverage();
  const cores = Math.max(1, probe.cpuCount());
  return {
    value: load.toFixed(2),
    warning: load >= cores,
    critical: load >= cores * 2,
  };
}

export function readMemory(probe: SystemProbe): SensorReading {
  const { total, free } = probe.memory();
  if (total <= 0) {
    throw new Error('Total memory unavailable');
  }
  const usedPercent = ((total - free) * 100) / total;
  return {
    value: `${usedPercent.toFixed(1)}%`,
    warning: usedPercent >= MEMORY_WARNING_PERCENT,
    critical: usedPercent >= MEMORY_CRITICAL_PERCENT,
  };
}

export function formatUptime(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600) % 24;
  const days = Math.floor(totalSeconds / 86400);
  return `${days}d ${hours}h ${minutes}m`;
}

export function createSystemSensorGroup(probe: SystemProbe = osSystemProbe): SensorGroup {
  return {
    name: 'System',
    sensors: [
      new GenericSensor('Load (1m)', () => readLoad(probe)),
      new GenericSensor('Memory', () => readMemory(probe)),
      new GenericSensor('Uptime', () => ({
        value: formatUptime(probe.uptimeSeconds()),
        warning: false,
        critical: false,
      })),
    ],
  };
}
