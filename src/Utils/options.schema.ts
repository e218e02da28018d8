import { z } from 'zod';

const qosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const lastWillSchema = z.object({
  /** Defaults to the session status topic. */
  topic: z.string().min(1).optional(),
  payload: z.string().default('OFFLINE'),
  qos: qosSchema.default(1),
  retain: z.boolean().default(true),
});

export const optionsSchema = z.object({
  mqtt_url: z.string().min(1),
  /**
   * Must be unique on the broker: a second connection with the same id makes the broker
   * drop the earlier one.
   */
  client_id: z.string().min(1),
  mqtt_user: z.string().optional(),
  mqtt_password: z.string().optional(),
  keepalive_sec: z.number().int().min(0).default(60),
  auto_reconnect: z.boolean().default(true),
  reconnect_period_ms: z.number().int().min(0).default(5000),
  connect_timeout_ms: z.number().int().min(1).default(10000),
  connect_retries: z.number().int().min(1).optional(),
  last_will: lastWillSchema.default({}),
  topic_base: z.string().min(1).default('demo/central'),
  telemetry_interval_ms: z.number().int().min(1).default(10000),
  health_interval_ms: z.number().int().min(1).default(60000),
  status_interval_ms: z.number().int().min(1).default(10000),
  sensor_interval_ms: z.number().int().min(1).default(1000),
  custom_interval_ms: z.number().int().min(1).default(5000),
  startup_delay_ms: z.number().int().min(0).default(5000),
  stats_log_interval_ms: z.number().int().min(0).default(30000),
  temperature_watch_pattern: z.string().min(1).default('garden/+/temperature'),
  temperature_alert_threshold: z.number().default(35),
});

export type Options = z.infer<typeof optionsSchema>;

/**
 * Payload accepted on the `<base>/config` topic. Every field is optional; unknown keys are
 * rejected so typos do not silently do nothing.
 */
export const runtimeConfigSchema = z
  .object({
    telemetry_interval_ms: z.number().int().min(100),
    health_interval_ms: z.number().int().min(100),
    status_interval_ms: z.number().int().min(100),
    sensor_interval_ms: z.number().int().min(100),
    custom_interval_ms: z.number().int().min(100),
  })
  .partial()
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
