/**
 * Compact View Renderer
 *
 * At most three lines: temperatures and battery, an extra-group summary, and
 * the update time. Lines with nothing to show are left out.
 */

import { countSensors, type SensorGroup, type Severity } from '../sensors/sensor.js';
import { formatCelsius } from '../sensors/adapters.js';
import { isBatteryPresent, type BatteryRecord, type TemperatureRecord } from '../types/telemetry.js';
import { batterySeverity, formatClock, temperatureSeverity, type Palette } from './palette.js';
import type { MonitorSnapshot, RenderOptions } from './snapshot.js';

export const MAX_COMPACT_LINES = 3;

export function renderCompactView(snapshot: MonitorSnapshot, options: Pick<RenderOptions, 'palette'>): string {
  const { palette } = options;
  const lines: string[] = [];

  const readings = readingsLine(snapshot.temperatures, snapshot.battery, palette);
  if (readings) {
    lines.push(readings);
  }

  if (snapshot.extraGroups.length > 0) {
    lines.push(extraGroupsLine(snapshot.extraGroups, palette));
  }

  lines.push(palette.faint(`Updated: ${formatClock(snapshot.lastRefresh)}`));

  return lines.slice(0, MAX_COMPACT_LINES).join('\n');
}

/**
 * Every temperature colored by its own thresholds, then the battery, joined by " | ".
 * Undefined when neither is available.
 */
export function readingsLine(
  temperatures: readonly TemperatureRecord[],
  battery: BatteryRecord,
  palette: Palette,
): string | undefined {
  const parts: string[] = [];

  if (temperatures.length > 0) {
    const values = temperatures.map((record) =>
      palette.severity(temperatureSeverity(record), formatCelsius(record.value)),
    );
    parts.push(`🌡 ${values.join(' ')}`);
  }

  if (isBatteryPresent(battery)) {
    const capacity = palette.severity(batterySeverity(battery.capacityPercent), `${battery.capacityPercent}%`);
    const fields = [`🔋 ${capacity}`];
    if (battery.status !== '') {
      fields.push(battery.status);
    }
    if (battery.voltage > 0) {
      fields.push(`${battery.voltage.toFixed(2)}V`);
    }
    parts.push(fields.join(' '));
  }

  return parts.length > 0 ? parts.join(' | ') : undefined;
}

export function extraGroupsLine(groups: readonly SensorGroup[], palette: Palette): string {
  let warnings = 0;
  let criticals = 0;
  for (const group of groups) {
    for (const sensor of group.sensors) {
      if (sensor.critical) {
        criticals++;
      } else if (sensor.warning) {
        warnings++;
      }
    }
  }

  let summary = `Extra: ${groups.length} groups, ${countSensors(groups)} sensors`;
  const counts: string[] = [];
  if (warnings > 0) {
    counts.push(`${warnings} warning`);
  }
  if (criticals > 0) {
    counts.push(`${criticals} critical`);
  }
  if (counts.length > 0) {
    summary += ` (${counts.join(', ')})`;
  }

  let severity: Severity = 'normal';
  if (criticals > 0) {
    severity = 'critical';
  } else if (warnings > 0) {
    severity = 'warning';
  }
  return palette.severity(severity, summary);
}
