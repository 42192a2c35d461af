/**
 * Plain-text report of everything the data sources can currently read.
 */

import { batterySection } from '../render/full-view.js';
import { createPalette } from '../render/palette.js';
import type { SysfsPaths } from '../types/monitor-config.js';
import { hasBattery, readBatteryStatus } from './battery.js';
import { nodeSysfsReader, type SysfsReader } from './sysfs-reader.js';
import { readTemperatures } from './temperature.js';

export function describeSysfs(paths: SysfsPaths, reader: SysfsReader = nodeSysfsReader): string[] {
  const lines = ['Testing sysfs monitoring...'];

  const temperatures = readTemperatures({
    reader,
    thermalBasePath: paths.thermal,
    hwmonBasePath: paths.hwmon,
  });
  lines.push(`Found ${temperatures.length} temperature sensors:`);
  for (const record of temperatures) {
    const value = record.value.toFixed(1);
    const high = record.highThreshold.toFixed(1);
    const critical = record.criticalThreshold.toFixed(1);
    lines.push(`  ${record.name}: ${value}°C (high ${high}, critical ${critical})`);
  }

  lines.push('', 'Battery status:');
  const batteryOptions = { reader, powerSupplyBasePath: paths.powerSupply };
  if (!hasBattery(batteryOptions)) {
    lines.push(`  No battery found under ${paths.powerSupply}`);
    return lines;
  }

  // Skip the section heading; the report has its own
  const [, ...batteryLines] = batterySection(readBatteryStatus(batteryOptions), createPalette(0));
  lines.push(...batteryLines);
  return lines;
}
