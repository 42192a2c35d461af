/**
 * Temperature data source tests
 */

import { describe, it, expect } from 'vitest';
import { readHwmonChip, readTemperatures, readThermalZone } from './temperature.js';
import { createMemorySysfs } from '../test-setup.js';

const THERMAL = '/sys/class/thermal';
const HWMON = '/sys/class/hwmon';

describe('readThermalZone', () => {
  it('should read value, name and trip points', () => {
    const reader = createMemorySysfs({
      [`${THERMAL}/thermal_zone0/temp`]: '45500\n',
      [`${THERMAL}/thermal_zone0/type`]: 'x86_pkg_temp\n',
      [`${THERMAL}/thermal_zone0/trip_point_0_temp`]: '85000\n',
      [`${THERMAL}/thermal_zone0/trip_point_1_temp`]: '105000\n',
    });

    expect(readThermalZone(reader, `${THERMAL}/thermal_zone0`)).toEqual({
      name: 'x86_pkg_temp',
      value: 45.5,
      highThreshold: 85,
      criticalThreshold: 105,
      sourcePath: `${THERMAL}/thermal_zone0`,
    });
  });

  it('should fall back to the directory name and default thresholds', () => {
    const reader = createMemorySysfs({
      [`${THERMAL}/thermal_zone3/temp`]: '38000\n',
    });

    expect(readThermalZone(reader, `${THERMAL}/thermal_zone3`)).toEqual({
      name: 'thermal_zone3',
      value: 38,
      highThreshold: 80,
      criticalThreshold: 100,
      sourcePath: `${THERMAL}/thermal_zone3`,
    });
  });

  it('should ignore negative, zero and malformed trip points', () => {
    const reader = createMemorySysfs({
      [`${THERMAL}/thermal_zone1/temp`]: '50000\n',
      [`${THERMAL}/thermal_zone1/trip_point_0_temp`]: '-273200\n',
      [`${THERMAL}/thermal_zone1/trip_point_1_temp`]: '0\n',
    });
    const zone = readThermalZone(reader, `${THERMAL}/thermal_zone1`);
    expect(zone?.highThreshold).toBe(80);
    expect(zone?.criticalThreshold).toBe(100);

    const malformed = createMemorySysfs({
      [`${THERMAL}/thermal_zone2/temp`]: '50000\n',
      [`${THERMAL}/thermal_zone2/trip_point_0_temp`]: 'n/a\n',
    });
    expect(readThermalZone(malformed, `${THERMAL}/thermal_zone2`)?.highThreshold).toBe(80);
  });

  it('should skip zones without a readable temperature', () => {
    const reader = createMemorySysfs({
      [`${THERMAL}/thermal_zone4/type`]: 'iwlwifi_1\n',
      [`${THERMAL}/thermal_zone5/temp`]: 'invalid\n',
    });

    expect(readThermalZone(reader, `${THERMAL}/thermal_zone4`)).toBeUndefined();
    expect(readThermalZone(reader, `${THERMAL}/thermal_zone5`)).toBeUndefined();
  });
});

describe('readHwmonChip', () => {
  it('should read every temperature input with label and limits', () => {
    const reader = createMemorySysfs({
      [`${HWMON}/hwmon2/name`]: 'coretemp\n',
      [`${HWMON}/hwmon2/temp1_input`]: '52000\n',
      [`${HWMON}/hwmon2/temp1_label`]: 'Package id 0\n',
      [`${HWMON}/hwmon2/temp1_max`]: '84000\n',
      [`${HWMON}/hwmon2/temp1_crit`]: '100000\n',
      [`${HWMON}/hwmon2/temp2_input`]: '49000\n',
      [`${HWMON}/hwmon2/fan1_input`]: '2100\n',
    });

    expect(readHwmonChip(reader, `${HWMON}/hwmon2`)).toEqual([
      {
        name: 'Package id 0',
        value: 52,
        highThreshold: 84,
        criticalThreshold: 100,
        sourcePath: `${HWMON}/hwmon2/temp1_input`,
      },
      {
        name: 'coretemp_temp2',
        value: 49,
        highThreshold: 80,
        criticalThreshold: 100,
        sourcePath: `${HWMON}/hwmon2/temp2_input`,
      },
    ]);
  });

  it('should use the default limits when a chip reports zero', () => {
    const reader = createMemorySysfs({
      [`${HWMON}/hwmon3/name`]: 'acpitz\n',
      [`${HWMON}/hwmon3/temp1_input`]: '61000\n',
      [`${HWMON}/hwmon3/temp1_max`]: '0\n',
      [`${HWMON}/hwmon3/temp1_crit`]: '0\n',
    });

    const [record] = readHwmonChip(reader, `${HWMON}/hwmon3`);

    expect(record.highThreshold).toBe(80);
    expect(record.criticalThreshold).toBe(100);
  });

  it('should skip chips without a name file', () => {
    const reader = createMemorySysfs({
      [`${HWMON}/hwmon0/temp1_input`]: '40000\n',
    });

    expect(readHwmonChip(reader, `${HWMON}/hwmon0`)).toEqual([]);
  });

  it('should skip inputs that cannot be parsed', () => {
    const reader = createMemorySysfs({
      [`${HWMON}/hwmon1/name`]: 'nvme\n',
      [`${HWMON}/hwmon1/temp1_input`]: '\n',
      [`${HWMON}/hwmon1/temp2_input`]: '36850\n',
    });

    expect(readHwmonChip(reader, `${HWMON}/hwmon1`).map((record) => record.name)).toEqual(['nvme_temp2']);
  });
});

describe('readTemperatures', () => {
  it('should return thermal zones first, then hwmon readings, in natural order', () => {
    const reader = createMemorySysfs({
      [`${THERMAL}/thermal_zone10/temp`]: '30000\n',
      [`${THERMAL}/thermal_zone2/temp`]: '20000\n',
      [`${THERMAL}/cooling_device0/cur_state`]: '0\n',
      [`${HWMON}/hwmon0/name`]: 'acpitz\n',
      [`${HWMON}/hwmon0/temp1_input`]: '27800\n',
    });

    const records = readTemperatures({ reader });

    expect(records.map((record) => record.sourcePath)).toEqual([
      `${THERMAL}/thermal_zone2`,
      `${THERMAL}/thermal_zone10`,
      `${HWMON}/hwmon0/temp1_input`,
    ]);
    expect(records.map((record) => record.value)).toEqual([20, 30, 27.8]);
  });

  it('should return an empty list when no thermal or hwmon paths exist', () => {
    expect(readTemperatures({ reader: createMemorySysfs({}) })).toEqual([]);
  });

  it('should honour custom base paths', () => {
    const reader = createMemorySysfs({
      '/mnt/sys/thermal/thermal_zone0/temp': '61000\n',
    });

    const records = readTemperatures({
      reader,
      thermalBasePath: '/mnt/sys/thermal',
      hwmonBasePath: '/mnt/sys/hwmon',
    });

    expect(records).toHaveLength(1);
    expect(records[0].sourcePath).toBe('/mnt/sys/thermal/thermal_zone0');
  });
});
