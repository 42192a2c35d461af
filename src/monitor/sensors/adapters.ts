/**
 * Sensor adapters over the built-in telemetry records.
 *
 * Records are replaced on every refresh, so adapters are built from the
 * current records whenever they are needed and never kept across refreshes.
 */

import {
  isBatteryPresent,
  type BatteryRecord,
  type TemperatureRecord,
} from '../types/telemetry.js';
import type { Sensor, SensorGroup } from './sensor.js';

export const BATTERY_WARNING_PERCENT = 20;
export const BATTERY_CRITICAL_PERCENT = 10;

export function formatCelsius(value: number): string {
  return `${value.toFixed(1)}°C`;
}

export class TemperatureSensorAdapter implements Sensor {
  constructor(private readonly record: TemperatureRecord) {}

  get name(): string {
    return this.record.name;
  }

  get value(): string {
    return formatCelsius(this.record.value);
  }

  get warning(): boolean {
    return this.record.value >= this.record.highThreshold;
  }

  get critical(): boolean {
    return this.record.value >= this.record.criticalThreshold;
  }

  // Temperatures are re-read in bulk by the refresh cycle
  refresh(): void {}
}

export class BatterySensorAdapter implements Sensor {
  readonly name = 'Battery';

  constructor(private readonly record: BatteryRecord) {}

  get value(): string {
    return `${this.record.capacityPercent}%`;
  }

  get warning(): boolean {
    return this.record.capacityPercent < BATTERY_WARNING_PERCENT;
  }

  get critical(): boolean {
    return this.record.capacityPercent < BATTERY_CRITICAL_PERCENT;
  }

  refresh(): void {}
}

/**
 * Groups the built-in telemetry as sensors. Empty sources produce no group.
 */
export function createSensorGroups(
  temperatures: readonly TemperatureRecord[],
  battery: BatteryRecord,
): SensorGroup[] {
  const groups: SensorGroup[] = [];

  if (temperatures.length > 0) {
    groups.push({
      name: 'Temperatures',
      sensors: temperatures.map((record) => new TemperatureSensorAdapter(record)),
    });
  }

  if (isBatteryPresent(battery)) {
    groups.push({ name: 'Battery', sensors: [new BatterySensorAdapter(battery)] });
  }

  return groups;
}
