/**
 * Battery data source
 *
 * Reads the first power supply node of type "Battery" under
 * /sys/class/power_supply. Electrical values are reported in micro-units,
 * temperature in tenths of a degree.
 */

import { posix } from 'node:path';
import { createAbsentBattery, type BatteryRecord } from '../types/telemetry.js';
import { nodeSysfsReader, parseInteger, type SysfsReader } from './sysfs-reader.js';

export const POWER_SUPPLY_BASE_PATH = '/sys/class/power_supply';

export interface BatterySourceOptions {
  reader?: SysfsReader;
  powerSupplyBasePath?: string;
}

export function findBatteryPath(options: BatterySourceOptions = {}): string | undefined {
  const reader = options.reader ?? nodeSysfsReader;
  const base = options.powerSupplyBasePath ?? POWER_SUPPLY_BASE_PATH;

  for (const entry of reader.listEntries(base)) {
    const supplyPath = posix.join(base, entry);
    if (reader.readText(posix.join(supplyPath, 'type')) === 'Battery') {
      return supplyPath;
    }
  }
  return undefined;
}

export function hasBattery(options: BatterySourceOptions = {}): boolean {
  return findBatteryPath(options) !== undefined;
}

/**
 * Returns the absent-battery record when no battery node exists. Fields that
 * are missing or malformed stay at their zero value.
 */
export function readBatteryStatus(options: BatterySourceOptions = {}): BatteryRecord {
  const reader = options.reader ?? nodeSysfsReader;
  const status = createAbsentBattery();

  const batteryPath = findBatteryPath({ ...options, reader });
  if (!batteryPath) {
    return status;
  }

  const text = (attribute: string): string | undefined => reader.readText(posix.join(batteryPath, attribute));
  const scaled = (attribute: string, divisor: number): number => {
    const raw = parseInteger(text(attribute));
    return raw === undefined ? 0 : raw / divisor;
  };

  status.capacityPercent = parseInteger(text('capacity')) ?? 0;
  status.status = text('status') ?? '';
  status.voltage = scaled('voltage_now', 1_000_000);
  status.current = scaled('current_now', 1_000_000);
  status.power = scaled('power_now', 1_000_000);
  if (status.power === 0 && status.voltage > 0 && status.current !== 0) {
    status.power = status.voltage * status.current;
  }
  status.health = text('health') ?? '';
  status.temperature = scaled('temp', 10);
  status.energy = scaled('energy_now', 1_000_000);
  status.capacityLevel = text('capacity_level') ?? '';

  return status;
}
