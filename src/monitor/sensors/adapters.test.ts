/**
 * Telemetry adapter tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  BatterySensorAdapter,
  TemperatureSensorAdapter,
  createSensorGroups,
  formatCelsius,
} from './adapters.js';
import { battery, propertyTestConfig, temperature, temperatureRecordArbitrary } from '../test-setup.js';

describe('TemperatureSensorAdapter', () => {
  it('should expose the record name and a one-decimal value', () => {
    const adapter = new TemperatureSensorAdapter(temperature({ name: 'acpitz', value: 47.25 }));

    expect(adapter.name).toBe('acpitz');
    expect(adapter.value).toBe('47.3°C');
  });

  it('should classify a value equal to the high threshold as warning only', () => {
    const adapter = new TemperatureSensorAdapter(temperature({ value: 80, highThreshold: 80, criticalThreshold: 100 }));

    expect(adapter.warning).toBe(true);
    expect(adapter.critical).toBe(false);
  });

  it('should classify a value equal to the critical threshold as critical', () => {
    const adapter = new TemperatureSensorAdapter(temperature({ value: 100, highThreshold: 80, criticalThreshold: 100 }));

    expect(adapter.warning).toBe(true);
    expect(adapter.critical).toBe(true);
  });

  it('should classify a value just below the high threshold as normal', () => {
    const adapter = new TemperatureSensorAdapter(temperature({ value: 79.9, highThreshold: 80 }));

    expect(adapter.warning).toBe(false);
    expect(adapter.critical).toBe(false);
  });

  it('should see changes to the wrapped record', () => {
    const record = temperature({ value: 50 });
    const adapter = new TemperatureSensorAdapter(record);

    record.value = 95;

    expect(adapter.value).toBe('95.0°C');
    expect(adapter.warning).toBe(true);
  });

  it('should agree with inclusive threshold comparisons for any record', () => {
    fc.assert(
      fc.property(temperatureRecordArbitrary, (record) => {
        const adapter = new TemperatureSensorAdapter(record);
        expect(adapter.warning).toBe(record.value >= record.highThreshold);
        expect(adapter.critical).toBe(record.value >= record.criticalThreshold);
        expect(() => adapter.refresh()).not.toThrow();
      }),
      propertyTestConfig,
    );
  });
});

describe('BatterySensorAdapter', () => {
  it('should report capacity as a percentage', () => {
    const adapter = new BatterySensorAdapter(battery({ capacityPercent: 64, status: 'Charging' }));

    expect(adapter.name).toBe('Battery');
    expect(adapter.value).toBe('64%');
    expect(adapter.warning).toBe(false);
    expect(adapter.critical).toBe(false);
  });

  it('should warn below 20% and go critical below 10%', () => {
    expect(new BatterySensorAdapter(battery({ capacityPercent: 20, status: 'Discharging' })).warning).toBe(false);
    expect(new BatterySensorAdapter(battery({ capacityPercent: 19, status: 'Discharging' })).warning).toBe(true);
    expect(new BatterySensorAdapter(battery({ capacityPercent: 10, status: 'Discharging' })).critical).toBe(false);
    expect(new BatterySensorAdapter(battery({ capacityPercent: 9, status: 'Discharging' })).critical).toBe(true);
  });
});

describe('createSensorGroups', () => {
  it('should build Temperatures and Battery groups from present telemetry', () => {
    const groups = createSensorGroups(
      [temperature({ name: 'cpu' }), temperature({ name: 'gpu' })],
      battery({ capacityPercent: 30, status: 'Discharging' }),
    );

    expect(groups.map((group) => group.name)).toEqual(['Temperatures', 'Battery']);
    expect(groups[0].sensors.map((sensor) => sensor.name)).toEqual(['cpu', 'gpu']);
    expect(groups[1].sensors[0].value).toBe('30%');
  });

  it('should leave out absent sources', () => {
    expect(createSensorGroups([], battery())).toEqual([]);
  });

  it('should treat a battery with only a status as present', () => {
    const groups = createSensorGroups([], battery({ status: 'Unknown' }));

    expect(groups.map((group) => group.name)).toEqual(['Battery']);
  });
});

describe('formatCelsius', () => {
  it('should format with one decimal', () => {
    expect(formatCelsius(65)).toBe('65.0°C');
    expect(formatCelsius(72.5)).toBe('72.5°C');
    expect(formatCelsius(-4.25)).toBe('-4.3°C');
  });
});
