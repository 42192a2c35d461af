/**
 * Shared test utilities for the monitor components: an in-memory sysfs tree,
 * fast-check generators for telemetry records, and fixed timestamps.
 */

import * as fc from 'fast-check';
import { GenericSensor, type SensorGroup } from './sensors/sensor.js';
import { sortEntries, type SysfsReader } from './sysfs/sysfs-reader.js';
import { createPalette } from './render/palette.js';
import type { MonitorSnapshot, RenderOptions } from './render/snapshot.js';
import { createAbsentBattery, type BatteryRecord, type TemperatureRecord } from './types/telemetry.js';

/**
 * In-memory stand-in for sysfs. Keys are absolute file paths, values the raw
 * file content (sysfs files end with a newline).
 */
export function createMemorySysfs(files: Record<string, string>): SysfsReader & { reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    readText(path) {
      reads.push(path);
      const content = files[path];
      return content === undefined ? undefined : content.trim();
    },
    listEntries(dir) {
      const prefix = `${dir.replace(/\/+$/, '')}/`;
      const names = new Set<string>();
      for (const path of Object.keys(files)) {
        if (path.startsWith(prefix)) {
          names.add(path.slice(prefix.length).split('/')[0]);
        }
      }
      return sortEntries([...names]);
    },
  };
}

/** 09:05:07 local time */
export const FIXED_TIME = new Date(2026, 0, 15, 9, 5, 7);

export const plainPalette = createPalette(0);

export const plainRenderOptions: RenderOptions = {
  palette: plainPalette,
  twoColumnMinWidth: 80,
};

export function temperature(overrides: Partial<TemperatureRecord> = {}): TemperatureRecord {
  return {
    name: 'x86_pkg_temp',
    value: 45.0,
    highThreshold: 80.0,
    criticalThreshold: 100.0,
    sourcePath: '/sys/class/thermal/thermal_zone0',
    ...overrides,
  };
}

export function battery(overrides: Partial<BatteryRecord> = {}): BatteryRecord {
  return { ...createAbsentBattery(), ...overrides };
}

export function snapshot(overrides: Partial<MonitorSnapshot> = {}): MonitorSnapshot {
  return {
    temperatures: [],
    battery: createAbsentBattery(),
    extraGroups: [],
    lastRefresh: FIXED_TIME,
    ...overrides,
  };
}

export function fixedSensor(name: string, value: string, warning = false, critical = false): GenericSensor {
  const sensor = new GenericSensor(name, () => ({ value, warning, critical }));
  sensor.refresh();
  return sensor;
}

/**
 * Fast-check generators
 */

export const temperatureRecordArbitrary: fc.Arbitrary<TemperatureRecord> = fc
  .record({
    name: fc.constantFrom('acpitz', 'x86_pkg_temp', 'Package id 0', 'Core 0', 'nvme_temp1'),
    value: fc.integer({ min: -20000, max: 130000 }).map((milli) => milli / 1000),
    highThreshold: fc.integer({ min: 40, max: 100 }),
    criticalOffset: fc.integer({ min: 0, max: 40 }),
    zone: fc.integer({ min: 0, max: 12 }),
  })
  .map(({ name, value, highThreshold, criticalOffset, zone }) => ({
    name,
    value,
    highThreshold,
    criticalThreshold: highThreshold + criticalOffset,
    sourcePath: `/sys/class/thermal/thermal_zone${zone}`,
  }));

export const batteryRecordArbitrary: fc.Arbitrary<BatteryRecord> = fc.oneof(
  fc.constant(createAbsentBattery()),
  fc.record({
    capacityPercent: fc.integer({ min: 0, max: 100 }),
    status: fc.constantFrom('Charging', 'Discharging', 'Full', 'Not charging', 'Unknown', ''),
    voltage: fc.integer({ min: 0, max: 20000 }).map((milli) => milli / 1000),
    current: fc.integer({ min: -5000, max: 5000 }).map((milli) => milli / 1000),
    power: fc.integer({ min: 0, max: 100000 }).map((milli) => milli / 1000),
    health: fc.constantFrom('', 'Good', 'Overheat'),
    temperature: fc.integer({ min: 0, max: 600 }).map((tenths) => tenths / 10),
    energy: fc.integer({ min: 0, max: 99000 }).map((milli) => milli / 1000),
    capacityLevel: fc.constantFrom('', 'Full', 'Normal', 'Low', 'Critical'),
  }),
);

export const sensorGroupArbitrary: fc.Arbitrary<SensorGroup> = fc
  .record({
    name: fc.constantFrom('Custom', 'Fans', 'Disks', 'Network'),
    sensors: fc.array(
      fc.record({
        name: fc.string({ minLength: 1, maxLength: 12 }).filter((value) => !value.includes('\n')),
        value: fc.constantFrom('OK', '1200 RPM', '42%', 'n/a'),
        warning: fc.boolean(),
        critical: fc.boolean(),
      }),
      { maxLength: 4 },
    ),
  })
  .map(({ name, sensors }) => ({
    name,
    sensors: sensors.map((sensor) => fixedSensor(sensor.name, sensor.value, sensor.warning, sensor.critical)),
  }));

export const snapshotArbitrary: fc.Arbitrary<MonitorSnapshot> = fc.record({
  temperatures: fc.array(temperatureRecordArbitrary, { maxLength: 8 }),
  battery: batteryRecordArbitrary,
  extraGroups: fc.array(sensorGroupArbitrary, { maxLength: 4 }),
  lastRefresh: fc.constant(FIXED_TIME),
});

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 50,
};
