import type { SensorGroup } from '../sensors/sensor.js';
import type { BatteryRecord, TemperatureRecord } from '../types/telemetry.js';
import type { Palette } from './palette.js';

/** Read-only view of the monitor state handed to the renderers */
export interface MonitorSnapshot {
  readonly temperatures: readonly TemperatureRecord[];
  readonly battery: BatteryRecord;
  readonly extraGroups: readonly SensorGroup[];
  readonly lastRefresh: Date;
}

export interface RenderOptions {
  palette: Palette;
  /** Narrowest viewport that may place Temperatures and Battery side by side */
  twoColumnMinWidth: number;
}
