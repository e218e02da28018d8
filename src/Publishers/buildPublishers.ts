import { Publisher } from '@mqtt/Publisher';
import { STATUS_ONLINE, type Topics } from '@mqtt/topics';
import type { RuntimeConfig } from '@utils/options.schema';
import { getUnixEpoch } from '@utils/getUnixEpoch';
import type { HealthSample, SensorReading, TelemetrySample } from 'Sensors/samples';
import { type Connectivity, type IPeriodicTask, PeriodicPublisher, type SampleSource } from './PeriodicPublisher';

const twoDecimals = (value: number) => Number(value.toFixed(2));

export const formatTelemetry = (sample: TelemetrySample) =>
  JSON.stringify({
    temperature: twoDecimals(sample.temperature),
    humidity: twoDecimals(sample.humidity),
    counter: sample.counter,
    ts: getUnixEpoch(sample.timestamp),
  });

export const formatHealth = (sample: HealthSample) =>
  JSON.stringify({
    free_heap: sample.freeHeap,
    min_free_heap: sample.minFreeHeap,
    rssi: sample.signalStrength,
    uptime_sec: sample.uptimeSec,
    mqtt_connected: sample.connected,
    ts: getUnixEpoch(sample.timestamp),
  });

export const formatReading = (reading: SensorReading) => String(reading.value);

export const formatCustom = (publishCount: number) =>
  JSON.stringify({ publish_count: publishCount, status: 'operational' });

export type PublisherSources = {
  telemetry: SampleSource<TelemetrySample>;
  health: SampleSource<HealthSample>;
  sensors: Record<string, SampleSource<SensorReading>>;
};

export type PublisherSchedule = {
  telemetryIntervalMs: number;
  healthIntervalMs: number;
  statusIntervalMs: number;
  sensorIntervalMs: number;
  customIntervalMs: number;
  startupDelayMs: number;
};

export type PublisherSet = {
  telemetry: PeriodicPublisher<TelemetrySample>;
  health: PeriodicPublisher<HealthSample>;
  status: PeriodicPublisher<string>;
  /** Application heartbeat carrying how many cycles it has sampled while connected. */
  custom: PeriodicPublisher<number>;
  sensors: PeriodicPublisher<SensorReading>[];
};

export function buildPublishers(
  topics: Topics,
  sources: PublisherSources,
  schedule: PublisherSchedule,
  connection: Connectivity,
  publisher: Pick<Publisher, 'publish'>
): PublisherSet {
  const { startupDelayMs } = schedule;
  let customCount = 0;

  return {
    telemetry: new PeriodicPublisher(
      {
        name: 'Telemetry',
        topic: topics.telemetry,
        intervalMs: schedule.telemetryIntervalMs,
        startupDelayMs,
        qos: 1,
        sample: sources.telemetry,
        format: formatTelemetry,
      },
      connection,
      publisher
    ),
    health: new PeriodicPublisher(
      {
        name: 'Health',
        topic: topics.health,
        intervalMs: schedule.healthIntervalMs,
        startupDelayMs,
        qos: 0,
        sample: sources.health,
        format: formatHealth,
      },
      connection,
      publisher
    ),
    // Re-asserts the retained status so a broker that lost its retained store recovers.
    status: new PeriodicPublisher(
      {
        name: 'Status',
        topic: topics.status,
        intervalMs: schedule.statusIntervalMs,
        startupDelayMs,
        qos: 1,
        retain: true,
        sample: () => STATUS_ONLINE,
        format: (status) => status,
      },
      connection,
      publisher
    ),
    custom: new PeriodicPublisher(
      {
        name: 'Custom',
        topic: topics.custom,
        intervalMs: schedule.customIntervalMs,
        startupDelayMs,
        qos: 0,
        sample: () => ++customCount,
        format: formatCustom,
      },
      connection,
      publisher
    ),
    sensors: Object.entries(sources.sensors).map(
      ([name, sample]) =>
        new PeriodicPublisher(
          {
            name: `Sensor:${name}`,
            topic: topics.sensor(name),
            intervalMs: schedule.sensorIntervalMs,
            startupDelayMs,
            qos: 1,
            sample,
            format: formatReading,
          },
          connection,
          publisher
        )
    ),
  };
}

export const allPublishers = (set: PublisherSet): IPeriodicTask[] => [
  set.telemetry,
  set.health,
  set.status,
  set.custom,
  ...set.sensors,
];

/** Apply a runtime config message to the running publishers. */
export function applyRuntimeConfig(set: PublisherSet, config: RuntimeConfig) {
  if (config.telemetry_interval_ms !== undefined) set.telemetry.setIntervalMs(config.telemetry_interval_ms);
  if (config.health_interval_ms !== undefined) set.health.setIntervalMs(config.health_interval_ms);
  if (config.status_interval_ms !== undefined) set.status.setIntervalMs(config.status_interval_ms);
  if (config.custom_interval_ms !== undefined) set.custom.setIntervalMs(config.custom_interval_ms);
  if (config.sensor_interval_ms !== undefined) {
    for (const sensor of set.sensors) sensor.setIntervalMs(config.sensor_interval_ms);
  }
}
