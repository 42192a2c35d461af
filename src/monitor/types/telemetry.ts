/**
 * Telemetry Records
 *
 * Snapshot shapes produced by the temperature and battery data sources.
 * Both are replaced wholesale on every refresh.
 */

export interface TemperatureRecord {
  /** Zone type, hwmon label, or a name derived from the chip */
  name: string;
  /** Current reading in Celsius */
  value: number;
  /** Warning threshold in Celsius */
  highThreshold: number;
  /** Critical threshold in Celsius */
  criticalThreshold: number;
  /** sysfs path the reading came from */
  sourcePath: string;
}

export interface BatteryRecord {
  /** Charge percentage (0-100) */
  capacityPercent: number;
  /** Charging, Discharging, Full, Not charging, Unknown */
  status: string;
  /** Volts */
  voltage: number;
  /** Amperes; some drivers report negative values while discharging */
  current: number;
  /** Watts */
  power: number;
  health: string;
  /** Celsius */
  temperature: number;
  /** Watt-hours */
  energy: number;
  /** Full, High, Normal, Low, Critical */
  capacityLevel: string;
}

export const DEFAULT_HIGH_THRESHOLD = 80.0;
export const DEFAULT_CRITICAL_THRESHOLD = 100.0;

/**
 * The record a battery source returns when no battery is present.
 */
export function createAbsentBattery(): BatteryRecord {
  return {
    capacityPercent: 0,
    status: '',
    voltage: 0,
    current: 0,
    power: 0,
    health: '',
    temperature: 0,
    energy: 0,
    capacityLevel: '',
  };
}

export function isBatteryPresent(battery: BatteryRecord): boolean {
  return battery.capacityPercent !== 0 || battery.status !== '';
}

export type TemperatureSource = () => TemperatureRecord[];

export type BatterySource = () => BatteryRecord;
