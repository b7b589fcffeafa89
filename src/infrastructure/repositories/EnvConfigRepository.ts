/**
 * Environment-based configuration repository.
 *
 * Implements IConfigRepository over a key/value environment (normally
 * `process.env`, after dotenv has loaded `.env`).
 *
 * Recognized variables:
 * - DELEGATES_LOG_LEVEL: minimum log level
 * - DELEGATES_DEMOS: comma-separated list of demos to run
 */

import { injectable, inject } from 'tsyringe';
import type { ILogger } from '../interfaces/ILogger';
import type { IConfigRepository, IRawAppConfig } from '../interfaces/IConfigRepository';

// === Type Definitions ===

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

// === Constants ===

export const ENV_KEYS = {
  LOG_LEVEL: 'DELEGATES_LOG_LEVEL',
  DEMOS: 'DELEGATES_DEMOS',
} as const;

// === Implementation ===

@injectable()
export class EnvConfigRepository implements IConfigRepository {
  constructor(
    @inject('ILogger') private readonly logger: ILogger,
    @inject('Environment') private readonly env: EnvironmentSource
  ) {}

  async getAppConfig(): Promise<IRawAppConfig> {
    const logLevel = this.read(ENV_KEYS.LOG_LEVEL);
    const demos = this.read(ENV_KEYS.DEMOS);

    this.logger.debug('Read app config from environment', {
      logLevel: logLevel ?? null,
      demos: demos ?? null,
    });

    return {
      logLevel: logLevel?.toLowerCase(),
      demos: demos === undefined ? undefined : splitList(demos),
    };
  }

  /** Trimmed value, or undefined when unset or blank. */
  private read(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
