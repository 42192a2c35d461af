/**
 * Full View Renderer
 *
 * Multi-section layout for viewports tall enough to show every reading:
 * title, temperatures, battery, one section per extra group, and a footer.
 * Temperatures and Battery sit side by side when both columns fit.
 */

import { stripVTControlCharacters } from 'node:util';
import { sensorSeverity, type SensorGroup } from '../sensors/sensor.js';
import { isBatteryPresent, type BatteryRecord, type TemperatureRecord } from '../types/telemetry.js';
import { batterySeverity, formatClock, temperatureSeverity, type Palette } from './palette.js';
import type { MonitorSnapshot, RenderOptions } from './snapshot.js';

export const FULL_VIEW_TITLE = 'System Status Monitor';
export const COLUMN_GAP = 4;
const SENSOR_NAME_WIDTH = 20;

export function renderFullView(snapshot: MonitorSnapshot, width: number, options: RenderOptions): string {
  const { palette } = options;
  const lines: string[] = [palette.title(FULL_VIEW_TITLE), ''];

  lines.push(
    ...layoutColumns(
      temperatureSection(snapshot.temperatures, palette),
      batterySection(snapshot.battery, palette),
      width,
      options.twoColumnMinWidth,
    ),
  );

  for (const group of snapshot.extraGroups) {
    lines.push('', ...groupSection(group, palette));
  }

  lines.push('', palette.faint(`Last updated: ${formatClock(snapshot.lastRefresh)} | Press 'q' to quit`));
  return lines.join('\n');
}

export function temperatureSection(records: readonly TemperatureRecord[], palette: Palette): string[] {
  const lines = [palette.heading('Temperatures')];
  if (records.length === 0) {
    lines.push('  No temperature sensors found');
    return lines;
  }
  for (const record of records) {
    const reading = `${record.value.toFixed(1).padStart(6)}°C`;
    lines.push(`  ${palette.severity(temperatureSeverity(record), reading)}  ${record.sourcePath}`);
  }
  return lines;
}

export function batterySection(battery: BatteryRecord, palette: Palette): string[] {
  const lines = [palette.heading('Battery')];
  if (!isBatteryPresent(battery)) {
    lines.push('  No battery information');
    return lines;
  }

  const capacity = palette.severity(batterySeverity(battery.capacityPercent), `${battery.capacityPercent}%`);
  lines.push(`  Capacity: ${capacity}`, `  Status: ${battery.status}`);

  if (battery.voltage > 0) {
    lines.push(`  Voltage: ${battery.voltage.toFixed(2)}V`);
  }
  if (battery.current !== 0) {
    lines.push(`  Current: ${battery.current.toFixed(2)}A`);
  }
  if (battery.power > 0) {
    lines.push(`  Power: ${battery.power.toFixed(2)}W`);
  }
  if (battery.health !== '') {
    lines.push(`  Health: ${battery.health}`);
  }
  if (battery.temperature > 0) {
    lines.push(`  Temperature: ${battery.temperature.toFixed(1)}°C`);
  }
  if (battery.energy > 0) {
    lines.push(`  Energy: ${battery.energy.toFixed(2)} Wh`);
  }
  if (battery.capacityLevel !== '') {
    lines.push(`  Capacity Level: ${battery.capacityLevel}`);
  }
  return lines;
}

export function groupSection(group: SensorGroup, palette: Palette): string[] {
  const lines = [palette.heading(group.name)];
  if (group.sensors.length === 0) {
    lines.push('  No sensors');
    return lines;
  }
  for (const sensor of group.sensors) {
    const value = palette.severity(sensorSeverity(sensor), sensor.value);
    lines.push(`  ${sensor.name.padEnd(SENSOR_NAME_WIDTH)}: ${value}`);
  }
  return lines;
}

export function visibleWidth(text: string): number {
  return stripVTControlCharacters(text).length;
}

/**
 * Places `left` and `right` side by side, or stacks them with a blank line
 * between when the viewport is narrower than `minWidth` or the columns do not fit.
 */
export function layoutColumns(left: string[], right: string[], width: number, minWidth: number): string[] {
  const leftWidth = Math.max(0, ...left.map(visibleWidth));
  const rightWidth = Math.max(0, ...right.map(visibleWidth));

  if (width < minWidth || leftWidth + COLUMN_GAP + rightWidth > width) {
    return [...left, '', ...right];
  }

  const rows: string[] = [];
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const leftCell = i < left.length ? left[i] : '';
    if (i >= right.length) {
      rows.push(leftCell);
      continue;
    }
    const padding = ' '.repeat(leftWidth - visibleWidth(leftCell) + COLUMN_GAP);
    rows.push(`${leftCell}${padding}${right[i]}`);
  }
  return rows;
}
