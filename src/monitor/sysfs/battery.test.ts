/**
 * Battery data source tests
 */

import { describe, it, expect } from 'vitest';
import { findBatteryPath, hasBattery, readBatteryStatus } from './battery.js';
import { createAbsentBattery } from '../types/telemetry.js';
import { createMemorySysfs } from '../test-setup.js';

const SUPPLY = '/sys/class/power_supply';

describe('findBatteryPath', () => {
  it('should pick the first supply whose type is Battery', () => {
    const reader = createMemorySysfs({
      [`${SUPPLY}/AC/type`]: 'Mains\n',
      [`${SUPPLY}/BAT1/type`]: 'Battery\n',
      [`${SUPPLY}/BAT0/type`]: 'Battery\n',
      [`${SUPPLY}/ucsi-source-psy-USBC000:001/type`]: 'USB\n',
    });

    expect(findBatteryPath({ reader })).toBe(`${SUPPLY}/BAT0`);
    expect(hasBattery({ reader })).toBe(true);
  });

  it('should find nothing when only mains supplies exist', () => {
    const reader = createMemorySysfs({ [`${SUPPLY}/AC/type`]: 'Mains\n' });

    expect(findBatteryPath({ reader })).toBeUndefined();
    expect(hasBattery({ reader })).toBe(false);
  });
});

describe('readBatteryStatus', () => {
  it('should return the absent-battery record when there is no battery', () => {
    expect(readBatteryStatus({ reader: createMemorySysfs({}) })).toEqual(createAbsentBattery());
  });

  it('should read and scale every attribute', () => {
    const reader = createMemorySysfs({
      [`${SUPPLY}/BAT0/type`]: 'Battery\n',
      [`${SUPPLY}/BAT0/capacity`]: '87\n',
      [`${SUPPLY}/BAT0/status`]: 'Charging\n',
      [`${SUPPLY}/BAT0/voltage_now`]: '12450000\n',
      [`${SUPPLY}/BAT0/current_now`]: '1500000\n',
      [`${SUPPLY}/BAT0/power_now`]: '18000000\n',
      [`${SUPPLY}/BAT0/health`]: 'Good\n',
      [`${SUPPLY}/BAT0/temp`]: '312\n',
      [`${SUPPLY}/BAT0/energy_now`]: '45210000\n',
      [`${SUPPLY}/BAT0/capacity_level`]: 'Normal\n',
    });

    expect(readBatteryStatus({ reader })).toEqual({
      capacityPercent: 87,
      status: 'Charging',
      voltage: 12.45,
      current: 1.5,
      power: 18,
      health: 'Good',
      temperature: 31.2,
      energy: 45.21,
      capacityLevel: 'Normal',
    });
  });

  it('should derive power from voltage and current when power_now is missing', () => {
    const reader = createMemorySysfs({
      [`${SUPPLY}/BAT0/type`]: 'Battery\n',
      [`${SUPPLY}/BAT0/capacity`]: '55\n',
      [`${SUPPLY}/BAT0/status`]: 'Discharging\n',
      [`${SUPPLY}/BAT0/voltage_now`]: '12000000\n',
      [`${SUPPLY}/BAT0/current_now`]: '2000000\n',
    });

    const status = readBatteryStatus({ reader });

    expect(status.voltage).toBe(12);
    expect(status.current).toBe(2);
    expect(status.power).toBe(24);
  });

  it('should not derive power without a current reading', () => {
    const reader = createMemorySysfs({
      [`${SUPPLY}/BAT0/type`]: 'Battery\n',
      [`${SUPPLY}/BAT0/capacity`]: '55\n',
      [`${SUPPLY}/BAT0/voltage_now`]: '12000000\n',
    });

    expect(readBatteryStatus({ reader }).power).toBe(0);
  });

  it('should leave malformed fields at their zero value', () => {
    const reader = createMemorySysfs({
      [`${SUPPLY}/BAT0/type`]: 'Battery\n',
      [`${SUPPLY}/BAT0/capacity`]: 'full\n',
      [`${SUPPLY}/BAT0/status`]: 'Full\n',
      [`${SUPPLY}/BAT0/voltage_now`]: '12.6V\n',
      [`${SUPPLY}/BAT0/temp`]: 'n/a\n',
    });

    const status = readBatteryStatus({ reader });

    expect(status.capacityPercent).toBe(0);
    expect(status.status).toBe('Full');
    expect(status.voltage).toBe(0);
    expect(status.temperature).toBe(0);
  });

  it('should read from a custom power supply path', () => {
    const reader = createMemorySysfs({
      '/tmp/fake-supply/battery/type': 'Battery\n',
      '/tmp/fake-supply/battery/capacity': '12\n',
    });

    expect(readBatteryStatus({ reader, powerSupplyBasePath: '/tmp/fake-supply' }).capacityPercent).toBe(12);
  });
});
