import { z } from 'zod';
import { logger as defaultLogger, Logger } from './logger';

export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 120;

export interface Settings {
  readonly apiKey?: string;
  readonly apiUrl?: string;
  readonly metrics?: boolean;
  readonly debug?: boolean;
  readonly heartbeatInterval?: number;
}

const EMPTY_SETTINGS: Settings = Object.freeze({});

const optionsBundleSchema = z.record(z.unknown());

/**
 * Reads the `initializationOptions` bundle sent by the editor. Known keys are
 * `api-url`, `api-key`, `metrics`, `debug` and `heartbeat-interval`; anything
 * else is ignored. A value of the wrong type leaves that setting unset.
 */
export function parseInitializationOptions(raw: unknown, logger: Logger = defaultLogger): Settings {
  if (raw === undefined || raw === null) return EMPTY_SETTINGS;

  const bundle = optionsBundleSchema.safeParse(raw);
  if (!bundle.success) {
    logger.warn('Initialization options are not an object, using defaults');
    return EMPTY_SETTINGS;
  }

  const read = <T>(key: string, schema: z.ZodType<T>): T | undefined => {
    const value = bundle.data[key];
    if (value === undefined || value === null) return undefined;

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      logger.warn(`Ignoring initialization option "${key}"`, { issue: parsed.error.issues[0]?.message });
      return undefined;
    }
    return parsed.data;
  };

  return Object.freeze({
    apiUrl: read('api-url', z.string()),
    apiKey: read('api-key', z.string()),
    metrics: read('metrics', z.boolean()),
    debug: read('debug', z.boolean()),
    heartbeatInterval: read('heartbeat-interval', z.number().int().nonnegative()),
  });
}

/**
 * Holds the current settings snapshot. Readers get a frozen object and keep it
 * for the duration of one operation; `replace` swaps the whole value.
 */
export class SettingsStore {
  private current: Settings;

  constructor(initial: Settings = EMPTY_SETTINGS) {
    this.current = Object.freeze({ ...initial });
  }

  load(): Settings {
    return this.current;
  }

  replace(next: Settings): void {
    this.current = Object.freeze({ ...next });
  }
}
