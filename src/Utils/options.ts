import { readFileSync } from 'fs';
import { logError } from './logger';
import { type Options, optionsSchema } from './options.schema';

export const DEFAULT_OPTIONS_PATH = './data/options.json';

export class OptionsError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'OptionsError';
  }
}

const ENV_OVERRIDES = {
  MQTT_URL: 'mqtt_url',
  MQTT_CLIENT_ID: 'client_id',
  MQTT_USERNAME: 'mqtt_user',
  MQTT_PASSWORD: 'mqtt_password',
} as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Validate raw options, with environment variables taking precedence over the file contents.
 */
export const parseOptions = (raw: unknown, env: NodeJS.ProcessEnv = {}): Options => {
  if (!isRecord(raw)) throw new OptionsError('Options must be a JSON object');

  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value) merged[key] = value;
  }

  const parsed = optionsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new OptionsError('Invalid options', issues);
  }
  return parsed.data;
};

export const loadOptions = (path: string = process.env.OPTIONS_PATH || DEFAULT_OPTIONS_PATH): Options => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path).toString());
  } catch (error) {
    logError(`Error reading or parsing ${path}:`, error);
    throw new OptionsError(`Could not read ${path}`);
  }

  try {
    return parseOptions(raw, process.env);
  } catch (error) {
    if (error instanceof OptionsError) {
      logError(`Error validating ${path}:`);
      for (const issue of error.issues) logError(`  - ${issue}`);
    }
    throw error;
  }
};

export type { Options };
