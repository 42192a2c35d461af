/**
 * System Monitor
 *
 * Holds the latest temperature and battery snapshots, the extra sensor groups
 * and the viewport size. The host runtime delivers events one at a time to
 * `update`; `render` reads the current state and never changes it.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { createDefaultMonitorConfig } from '../config/configuration.js';
import { createSensorGroups } from '../sensors/adapters.js';
import type { Sensor, SensorGroup } from '../sensors/sensor.js';
import { readBatteryStatus } from '../sysfs/battery.js';
import { readTemperatures } from '../sysfs/temperature.js';
import { createPalette, type Palette } from '../render/palette.js';
import type { MonitorSnapshot } from '../render/snapshot.js';
import { render } from '../render/view.js';
import type { MonitorEvent, TickCommand } from '../types/events.js';
import type { MonitorConfig } from '../types/monitor-config.js';
import {
  createAbsentBattery,
  isBatteryPresent,
  type BatteryRecord,
  type BatterySource,
  type TemperatureRecord,
  type TemperatureSource,
} from '../types/telemetry.js';

export interface SystemMonitorOptions {
  config?: Partial<MonitorConfig>;
  temperatureSource?: TemperatureSource;
  batterySource?: BatterySource;
  palette?: Palette;
  /** Timestamp used before the first refresh */
  now?: () => Date;
}

export interface SensorRefreshFailure {
  group: string;
  sensor: string;
  error: unknown;
}

export interface RefreshSummary {
  timestamp: Date;
  temperatureCount: number;
  batteryPresent: boolean;
  sensorsRefreshed: number;
  failures: SensorRefreshFailure[];
  warningCount: number;
  criticalCount: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export class SystemMonitor extends EventEmitter {
  private readonly config: MonitorConfig;
  private readonly temperatureSource: TemperatureSource;
  private readonly batterySource: BatterySource;
  private readonly palette: Palette;
  private readonly logger = createSubsystemLogger('monitor');
  private readonly refreshLogger = this.logger.child('refresh');

  private temperatures: TemperatureRecord[] = [];
  private battery: BatteryRecord = createAbsentBattery();
  private readonly extraGroups: SensorGroup[] = [];
  private lastRefresh: Date;
  private viewport: Viewport = { width: 0, height: 0 };

  constructor(options: SystemMonitorOptions = {}) {
    super();
    const defaults = createDefaultMonitorConfig();
    this.config = {
      ...defaults,
      ...options.config,
      paths: { ...defaults.paths, ...options.config?.paths },
    };

    const paths = this.config.paths;
    this.temperatureSource =
      options.temperatureSource ??
      (() => readTemperatures({ thermalBasePath: paths.thermal, hwmonBasePath: paths.hwmon }));
    this.batterySource =
      options.batterySource ?? (() => readBatteryStatus({ powerSupplyBasePath: paths.powerSupply }));
    this.palette = options.palette ?? createPalette();
    this.lastRefresh = (options.now ?? (() => new Date()))();

    this.logger.info('System monitor initialized', {
      refreshIntervalMs: this.config.refreshIntervalMs,
      twoColumnMinWidth: this.config.twoColumnMinWidth,
      paths,
    });
  }

  /**
   * Adds a group of sensors shown after the built-in sections.
   */
  registerSensorGroup(group: SensorGroup): void {
    this.extraGroups.push(group);
    this.logger.info('Sensor group registered', {
      group: group.name,
      sensors: group.sensors.length,
    });
    this.emit('groupRegistered', group);
  }

  /**
   * Called once by the host at startup. The first refresh runs right away.
   */
  initialize(): TickCommand {
    return { type: 'tick', delayMs: 0 };
  }

  /**
   * Applies one host event. Returns the next tick to schedule after a tick
   * event, otherwise nothing.
   */
  update(event: MonitorEvent): TickCommand | undefined {
    switch (event.type) {
      case 'resize':
        this.viewport = { width: event.width, height: event.height };
        this.emit('resized', { ...this.viewport });
        return undefined;
      case 'tick':
        this.refresh(event.timestamp);
        return { type: 'tick', delayMs: this.config.refreshIntervalMs };
      default:
        return undefined;
    }
  }

  /**
   * Runs one refresh cycle: re-reads the built-in sources, refreshes every
   * sensor in every extra group and stamps the refresh time. A failing sensor
   * or source never stops the rest of the cycle.
   */
  refresh(timestamp: Date = new Date()): RefreshSummary {
    this.temperatures = this.readSource('temperature', this.temperatureSource, () => []);
    this.battery = this.readSource('battery', this.batterySource, createAbsentBattery);

    const failures: SensorRefreshFailure[] = [];
    let sensorsRefreshed = 0;
    for (const group of this.extraGroups) {
      for (const sensor of group.sensors) {
        const failure = this.refreshSensor(group, sensor);
        if (failure) {
          failures.push(failure);
        } else {
          sensorsRefreshed++;
        }
      }
    }

    this.lastRefresh = timestamp;

    const sensors = this.getSensorGroups().flatMap((group) => group.sensors);
    const summary: RefreshSummary = {
      timestamp,
      temperatureCount: this.temperatures.length,
      batteryPresent: isBatteryPresent(this.battery),
      sensorsRefreshed,
      failures,
      warningCount: sensors.filter((sensor) => sensor.warning && !sensor.critical).length,
      criticalCount: sensors.filter((sensor) => sensor.critical).length,
    };

    this.refreshLogger.debug('Refresh complete', {
      timestamp: timestamp.toISOString(),
      temperatures: summary.temperatureCount,
      batteryPresent: summary.batteryPresent,
      sensorsRefreshed,
      failures: failures.length,
      warnings: summary.warningCount,
      criticals: summary.criticalCount,
    });
    this.emit('refreshed', summary);

    return summary;
  }

  render(): string {
    return render(this.getSnapshot(), this.viewport.width, this.viewport.height, {
      palette: this.palette,
      twoColumnMinWidth: this.config.twoColumnMinWidth,
    });
  }

  /**
   * Copy of the current state; changing it never reaches the monitor.
   */
  getSnapshot(): MonitorSnapshot {
    return {
      temperatures: this.temperatures.map((record) => ({ ...record })),
      battery: { ...this.battery },
      extraGroups: [...this.extraGroups],
      lastRefresh: new Date(this.lastRefresh.getTime()),
    };
  }

  /**
   * Built-in telemetry adapted as sensor groups, followed by the extra groups.
   */
  getSensorGroups(): SensorGroup[] {
    return [...createSensorGroups(this.temperatures, this.battery), ...this.extraGroups];
  }

  getViewport(): Viewport {
    return { ...this.viewport };
  }

  getConfig(): MonitorConfig {
    return { ...this.config, paths: { ...this.config.paths } };
  }

  private readSource<T>(name: string, source: () => T, fallback: () => T): T {
    try {
      return source();
    } catch (error) {
      this.refreshLogger.error('Data source failed, using empty reading', {
        source: name,
        error: String(error),
      });
      this.emit('sourceFailed', { source: name, error });
      return fallback();
    }
  }

  private refreshSensor(group: SensorGroup, sensor: Sensor): SensorRefreshFailure | undefined {
    try {
      sensor.refresh();
      return undefined;
    } catch (error) {
      const failure: SensorRefreshFailure = { group: group.name, sensor: sensor.name, error };
      this.refreshLogger.warn('Sensor refresh failed', {
        group: group.name,
        sensor: sensor.name,
        error: String(error),
      });
      this.emit('sensorRefreshFailed', failure);
      return failure;
    }
  }
}
