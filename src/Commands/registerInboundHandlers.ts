import { type InvalidPatternError, describeError } from 'Common/errors';
import type { QoS } from '@mqtt/ITransportClient';
import { Publisher } from '@mqtt/Publisher';
import type { Topics } from '@mqtt/topics';
import { type InboundMessage, type MessageHandler, TopicRouter } from 'Routing/TopicRouter';
import { getUnixEpoch } from '@utils/getUnixEpoch';
import { logInfo, logWarn } from '@utils/logger';
import { type RuntimeConfig, runtimeConfigSchema } from '@utils/options.schema';
import { type Result, ok } from '@utils/result';
import { ActuatorBank } from './ActuatorBank';
import { parseActuatorCommand } from './ActuatorCommand';

export type InboundHandlerDeps = {
  router: TopicRouter;
  topics: Topics;
  actuators: ActuatorBank;
  publisher: Pick<Publisher, 'publishJson'>;
  temperatureWatch: { pattern: string; threshold: number };
  onRuntimeConfig: (config: RuntimeConfig) => void;
  now?: () => number;
};

const lastLevel = (topic: string) => topic.slice(topic.lastIndexOf('/') + 1);

export const createCommandHandler =
  (actuators: ActuatorBank, deviceOf: (topic: string) => string | undefined = lastLevel): MessageHandler =>
  ({ topic, payload }: InboundMessage) => {
    const device = deviceOf(topic);
    if (!device) {
      logWarn(`[Commands] Could not read a device from ${topic}`);
      return;
    }

    const command = parseActuatorCommand(payload);
    if (!command) {
      logWarn(`[Commands] Unknown command for ${device}: ${payload}`);
      return;
    }
    actuators.apply(device, command);
  };

/** `<commands>/valve/<n>` → `valve-<n>`; n must be a non-negative integer. */
export const valveDevice = (topic: string): string | undefined => {
  const number = lastLevel(topic);
  return /^\d+$/.test(number) ? `valve-${Number(number)}` : undefined;
};

export const createTemperatureWatcher =
  (
    publisher: Pick<Publisher, 'publishJson'>,
    alertsTopic: string,
    threshold: number,
    now: () => number = Date.now
  ): MessageHandler =>
  async ({ topic, payload }: InboundMessage) => {
    const temperature = Number.parseFloat(payload);
    if (Number.isNaN(temperature)) {
      logWarn(`[Temperature] Unreadable reading on ${topic}: ${payload}`);
      return;
    }

    logInfo(`[Temperature] ${topic}: ${temperature.toFixed(2)} °C`);
    if (temperature <= threshold) return;

    logWarn(`[Temperature] ${temperature.toFixed(2)} °C on ${topic} is above ${threshold} °C`);
    const result = await publisher.publishJson(
      alertsTopic,
      { type: 'high_temperature', topic, value: temperature, threshold, ts: getUnixEpoch(now()) },
      { qos: 1 }
    );
    if (!result.ok) logWarn(`[Temperature] Could not raise alert: ${describeError(result.error)}`);
  };

export const createConfigHandler =
  (onRuntimeConfig: (config: RuntimeConfig) => void): MessageHandler =>
  ({ payload, payloadTruncated }: InboundMessage) => {
    if (payloadTruncated) {
      logWarn('[Config] Ignoring truncated config message');
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch {
      logWarn(`[Config] Config message is not JSON: ${payload}`);
      return;
    }

    const parsed = runtimeConfigSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        logWarn(`[Config] Rejected config: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      }
      return;
    }
    logInfo(`[Config] Applying ${JSON.stringify(parsed.data)}`);
    onRuntimeConfig(parsed.data);
  };

/**
 * Register the device's inbound handlers on the router. Valve commands are registered before the
 * generic per-device command pattern; config and the temperature watcher follow.
 */
export function registerInboundHandlers({
  router,
  topics,
  actuators,
  publisher,
  temperatureWatch,
  onRuntimeConfig,
  now = Date.now,
}: InboundHandlerDeps): Result<void, InvalidPatternError> {
  const registrations: [pattern: string, qos: QoS, handler: MessageHandler][] = [
    [`${topics.commands}/valve/+`, 1, createCommandHandler(actuators, valveDevice)],
    [`${topics.commands}/+`, 1, createCommandHandler(actuators)],
    [topics.config, 1, createConfigHandler(onRuntimeConfig)],
    [temperatureWatch.pattern, 0, createTemperatureWatcher(publisher, topics.alerts, temperatureWatch.threshold, now)],
  ];

  for (const [pattern, qos, handler] of registrations) {
    const registered = router.subscribe(pattern, qos, handler);
    if (!registered.ok) return registered;
  }
  return ok(undefined);
}
