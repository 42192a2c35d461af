/**
 * Terminal styles and color-threshold rules shared by both views.
 */

import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import { sensorSeverity, type Severity } from '../sensors/sensor.js';
import { TemperatureSensorAdapter } from '../sensors/adapters.js';
import type { TemperatureRecord } from '../types/telemetry.js';

// xterm-256 color indexes
const SEVERITY_COLORS: Record<Severity, number> = {
  normal: 42,
  warning: 214,
  critical: 9,
};
const TITLE_COLOR = 63;

export const BATTERY_NORMAL_PERCENT = 50;
export const BATTERY_LOW_PERCENT = 20;

export interface Palette {
  severity(severity: Severity, text: string): string;
  title(text: string): string;
  heading(text: string): string;
  faint(text: string): string;
}

/**
 * Builds the palette. Without a level, chalk's detected terminal support is used.
 */
export function createPalette(level?: ColorSupportLevel): Palette {
  const ink: ChalkInstance = level === undefined ? chalk : new Chalk({ level });
  return {
    severity: (severity, text) => ink.ansi256(SEVERITY_COLORS[severity])(text),
    title: (text) => ink.bold.ansi256(TITLE_COLOR)(text),
    heading: (text) => ink.bold(text),
    faint: (text) => ink.dim(text),
  };
}

export function temperatureSeverity(record: TemperatureRecord): Severity {
  return sensorSeverity(new TemperatureSensorAdapter(record));
}

/**
 * Display color band for battery charge. Stricter than the battery sensor's
 * warning/critical flags, which start at 20% and 10%.
 */
export function batterySeverity(capacityPercent: number): Severity {
  if (capacityPercent < BATTERY_LOW_PERCENT) {
    return 'critical';
  }
  return capacityPercent < BATTERY_NORMAL_PERCENT ? 'warning' : 'normal';
}

export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}
