/**
 * Temperature data source
 *
 * Collects readings from thermal zones (/sys/class/thermal/thermal_zone*) and
 * hwmon chips (/sys/class/hwmon/hwmon*). Values are reported by the kernel in
 * millidegrees Celsius.
 */

import { posix } from 'node:path';
import {
  DEFAULT_CRITICAL_THRESHOLD,
  DEFAULT_HIGH_THRESHOLD,
  type TemperatureRecord,
} from '../types/telemetry.js';
import { nodeSysfsReader, parseInteger, type SysfsReader } from './sysfs-reader.js';

export const THERMAL_BASE_PATH = '/sys/class/thermal';
export const HWMON_BASE_PATH = '/sys/class/hwmon';

export interface TemperatureSourceOptions {
  reader?: SysfsReader;
  thermalBasePath?: string;
  hwmonBasePath?: string;
}

const HWMON_INPUT_PATTERN = /^(temp\d+)_input$/;

export function readTemperatures(options: TemperatureSourceOptions = {}): TemperatureRecord[] {
  const reader = options.reader ?? nodeSysfsReader;
  const thermalBase = options.thermalBasePath ?? THERMAL_BASE_PATH;
  const hwmonBase = options.hwmonBasePath ?? HWMON_BASE_PATH;

  const records: TemperatureRecord[] = [];

  for (const entry of reader.listEntries(thermalBase)) {
    if (!entry.startsWith('thermal_zone')) {
      continue;
    }
    const record = readThermalZone(reader, posix.join(thermalBase, entry));
    if (record) {
      records.push(record);
    }
  }

  for (const entry of reader.listEntries(hwmonBase)) {
    if (entry.startsWith('hwmon')) {
      records.push(...readHwmonChip(reader, posix.join(hwmonBase, entry)));
    }
  }

  return records;
}

/**
 * Reads one thermal zone. Zones without a parseable `temp` are skipped.
 * Trip point 0 is taken as the high threshold and trip point 1 as critical.
 */
export function readThermalZone(reader: SysfsReader, zonePath: string): TemperatureRecord | undefined {
  const milli = parseInteger(reader.readText(posix.join(zonePath, 'temp')));
  if (milli === undefined) {
    return undefined;
  }

  return {
    name: reader.readText(posix.join(zonePath, 'type')) || posix.basename(zonePath),
    value: milli / 1000,
    highThreshold: readThreshold(reader, posix.join(zonePath, 'trip_point_0_temp'), DEFAULT_HIGH_THRESHOLD),
    criticalThreshold: readThreshold(reader, posix.join(zonePath, 'trip_point_1_temp'), DEFAULT_CRITICAL_THRESHOLD),
    sourcePath: zonePath,
  };
}

/**
 * Reads every temp*_input of one hwmon chip. Chips without a `name` are skipped.
 */
export function readHwmonChip(reader: SysfsReader, chipPath: string): TemperatureRecord[] {
  const chipName = reader.readText(posix.join(chipPath, 'name'));
  if (chipName === undefined) {
    return [];
  }

  const records: TemperatureRecord[] = [];
  for (const entry of reader.listEntries(chipPath)) {
    const match = HWMON_INPUT_PATTERN.exec(entry);
    if (!match) {
      continue;
    }
    const base = match[1];
    const inputPath = posix.join(chipPath, entry);
    const milli = parseInteger(reader.readText(inputPath));
    if (milli === undefined) {
      continue;
    }

    records.push({
      name: reader.readText(posix.join(chipPath, `${base}_label`)) || `${chipName}_${base}`,
      value: milli / 1000,
      // Drivers write 0 to _max/_crit when no limit is set, so 0 means the default here
      highThreshold: readThreshold(reader, posix.join(chipPath, `${base}_max`), DEFAULT_HIGH_THRESHOLD),
      criticalThreshold: readThreshold(reader, posix.join(chipPath, `${base}_crit`), DEFAULT_CRITICAL_THRESHOLD),
      sourcePath: inputPath,
    });
  }
  return records;
}

// Missing, unparseable, negative and zero thresholds all fall back to the default
function readThreshold(reader: SysfsReader, path: string, fallback: number): number {
  const milli = parseInteger(reader.readText(path));
  if (milli === undefined || milli <= 0) {
    return fallback;
  }
  return milli / 1000;
}
