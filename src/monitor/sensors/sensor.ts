/**
 * Sensor Abstraction
 *
 * A sensor is anything that can be shown as a named, colored value. Built-in
 * telemetry is adapted to this shape; extra groups hold generic sensors driven
 * by a caller-supplied refresh function.
 */

export interface Sensor {
  /** Human-readable identifier */
  readonly name: string;
  /** Current reading formatted for display */
  readonly value: string;
  readonly warning: boolean;
  readonly critical: boolean;
  /** Updates the reading; throws when the underlying read fails */
  refresh(): void;
}

export interface SensorGroup {
  name: string;
  sensors: Sensor[];
}

export interface SensorReading {
  value: string;
  warning: boolean;
  critical: boolean;
}

export type SensorRefreshFn = () => SensorReading;

export type Severity = 'normal' | 'warning' | 'critical';

export function sensorSeverity(sensor: Pick<Sensor, 'warning' | 'critical'>): Severity {
  if (sensor.critical) {
    return 'critical';
  }
  return sensor.warning ? 'warning' : 'normal';
}

export class GenericSensor implements Sensor {
  readonly name: string;
  private reading: SensorReading = { value: '', warning: false, critical: false };
  private readonly refreshFn?: SensorRefreshFn;

  constructor(name: string, refreshFn?: SensorRefreshFn) {
    this.name = name;
    this.refreshFn = refreshFn;
  }

  get value(): string {
    return this.reading.value;
  }

  get warning(): boolean {
    return this.reading.warning;
  }

  get critical(): boolean {
    return this.reading.critical;
  }

  /**
   * Replaces the cached reading with the callback's result. A throwing
   * callback leaves the previous reading in place.
   */
  refresh(): void {
    if (!this.refreshFn) {
      return;
    }
    const next = this.refreshFn();
    this.reading = { value: next.value, warning: next.warning, critical: next.critical };
  }
}

export function createSensorGroup(name: string, sensors: Sensor[] = []): SensorGroup {
  return { name, sensors };
}

export function countSensors(groups: readonly SensorGroup[]): number {
  return groups.reduce((total, group) => total + group.sensors.length, 0);
}
