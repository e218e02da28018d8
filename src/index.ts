import { ActuatorBank } from 'Commands/ActuatorBank';
import { registerInboundHandlers } from 'Commands/registerInboundHandlers';
import { describeError } from 'Common/errors';
import { startStatisticsMonitor } from 'Diagnostics/StatisticsMonitor';
import { DeviceSession, sessionConfigFromOptions } from '@mqtt/DeviceSession';
import { createMqttTransport } from '@mqtt/MQTTConnection';
import { buildTopics } from '@mqtt/topics';
import { allPublishers, applyRuntimeConfig, buildPublishers } from 'Publishers/buildPublishers';
import { createProcessHealthSource } from 'Sensors/processHealth';
import {
  createSimulatedLuminosity,
  createSimulatedOutdoorTemperature,
  createSimulatedTelemetry,
} from 'Sensors/simulatedSensors';
import { getBuildInfo } from '@utils/buildInfo';
import { errorMessage, logError, logInfo, logWarn } from '@utils/logger';
import { loadOptions } from '@utils/options';
import { retryWithBackoff } from '@utils/retryWithBackoff';

let exiting = false;
const processExit = (exitCode?: number) => {
  if (exiting) return;
  exiting = true;
  if (exitCode !== undefined && exitCode > 0) logError(`Exit code: ${exitCode}`);
  process.exit(exitCode ?? 0);
};

process.on('exit', (code) => logWarn(`Shutting down device session... (code=${code})`));
process.on('uncaughtException', (error) => {
  logError('[Main] Uncaught exception:', error);
  processExit(2);
});
process.on('unhandledRejection', (reason: unknown) => {
  // Log but don't exit: the session keeps reconnecting on its own.
  logError(`[Main] Unhandled promise rejection: ${errorMessage(reason)}`);
});

const start = async () => {
  const options = loadOptions();
  const build = getBuildInfo();
  logInfo(`[Build] version=${build.version ?? 'unknown'} git=${build.gitSha} built=${build.buildTime}`);

  const topics = buildTopics(options.topic_base);
  const session = new DeviceSession(createMqttTransport, {
    config: sessionConfigFromOptions(options, topics),
    topics,
    buildInfo: build,
  });

  const publishers = buildPublishers(
    topics,
    {
      telemetry: createSimulatedTelemetry(),
      health: createProcessHealthSource({ isConnected: () => session.isConnected() }),
      sensors: {
        luminosity: createSimulatedLuminosity(),
        temperature: createSimulatedOutdoorTemperature(),
      },
    },
    {
      telemetryIntervalMs: options.telemetry_interval_ms,
      healthIntervalMs: options.health_interval_ms,
      statusIntervalMs: options.status_interval_ms,
      sensorIntervalMs: options.sensor_interval_ms,
      customIntervalMs: options.custom_interval_ms,
      startupDelayMs: options.startup_delay_ms,
    },
    session.connection,
    session.publisher
  );

  // Handlers go in before the first connect so the initial subscription replay includes them.
  const registered = registerInboundHandlers({
    router: session.router,
    topics,
    actuators: new ActuatorBank(),
    publisher: session.publisher,
    temperatureWatch: {
      pattern: options.temperature_watch_pattern,
      threshold: options.temperature_alert_threshold,
    },
    onRuntimeConfig: (config) => applyRuntimeConfig(publishers, config),
  });
  if (!registered.ok) throw new Error(describeError(registered.error));

  const connected = await retryWithBackoff(() => session.start(), {
    maxRetries: options.connect_retries,
    // Starting twice is a programming error, not a connectivity problem.
    isRetryable: (error) => error.kind !== 'already-started',
    describe: describeError,
  });
  if (!connected.ok) throw new Error(`Could not connect: ${describeError(connected.error)}`);

  const tasks = allPublishers(publishers);
  for (const task of tasks) task.start();

  const stopMonitor = startStatisticsMonitor(
    () => ({ state: session.connection.state(), stats: session.getStatistics() }),
    options.stats_log_interval_ms
  );

  const shutdown = async () => {
    for (const task of tasks) task.stop();
    stopMonitor();
    const closed = await session.shutdown();
    if (!closed.ok) logWarn(`[Main] ${describeError(closed.error)}`);
    processExit(0);
  };
  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());

  logInfo(`[Main] Running ${tasks.length} publishers under ${options.topic_base}`);
};

start().catch((error: unknown) => {
  logError(`[Main] Startup failed: ${errorMessage(error)}`);
  processExit(1);
});
