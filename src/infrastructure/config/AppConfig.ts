import { singleton, inject } from 'tsyringe';
import {
  DEMO_NAMES,
  LOG_LEVELS,
  isDemoName,
  isLogLevel,
  type AppConfig,
  type DemoName,
  type LogLevel,
} from '@/shared/types/ConfigTypes';
import type { ILogger } from '@/infrastructure/interfaces/ILogger';
import type { IConfigRepository, IRawAppConfig } from '@/infrastructure/interfaces/IConfigRepository';

// ============================================================================
// AppConfigService Implementation
// ============================================================================

/**
 * Configuration service with caching.
 *
 * Provides validated application configuration. Invalid values are
 * replaced by their defaults with a warning, and a repository failure
 * falls back to the defaults entirely.
 */
@singleton()
export class AppConfigService {
  // ==========================================================================
  // Private Fields
  // ==========================================================================

  private readonly configRepository: IConfigRepository;
  private readonly logger: ILogger;

  /** Validated configuration, loaded once */
  private cached: AppConfig | null = null;

  private readonly defaults: Readonly<AppConfig> = {
    logLevel: 'warn',
    demos: [...DEMO_NAMES],
  };

  // ==========================================================================
  // Constructor
  // ==========================================================================

  constructor(
    @inject('ILogger') logger: ILogger,
    @inject('IConfigRepository') configRepository: IConfigRepository
  ) {
    this.logger = logger;
    this.configRepository = configRepository;
    this.logger.debug('AppConfigService initialized with ConfigRepository');
  }

  // ==========================================================================
  // Public Methods - ConfigRepository Integration
  // ==========================================================================

  /**
   * Gets application configuration from ConfigRepository with caching.
   *
   * @returns Promise resolving to validated application config
   */
  async getAppConfig(): Promise<AppConfig> {
    if (this.cached) {
      this.logger.debug('AppConfig cache hit');
      return this.cached;
    }

    let raw: IRawAppConfig;
    try {
      raw = await this.configRepository.getAppConfig();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to load app config from repository, using fallback', {
        error: errorMessage,
      });
      return this.getDefaults();
    }

    const errors = this.validateAppConfig(raw);
    for (const message of errors) {
      this.logger.warn('Invalid configuration value, using default', { error: message });
    }

    const config: AppConfig = {
      logLevel:
        raw.logLevel !== undefined && this.isValidLogLevel(raw.logLevel)
          ? raw.logLevel
          : this.defaults.logLevel,
      demos: this.resolveDemos(raw.demos),
    };

    this.cached = config;
    return config;
  }

  /**
   * Clears the cached configuration.
   */
  clearCache(): void {
    this.cached = null;
    this.logger.debug('AppConfigService cache cleared');
  }

  // ==========================================================================
  // Public Methods - Defaults and Helpers
  // ==========================================================================

  getDefaults(): AppConfig {
    return { logLevel: this.defaults.logLevel, demos: [...this.defaults.demos] };
  }

  isValidLogLevel(level: string): level is LogLevel {
    return isLogLevel(level);
  }

  isValidDemo(name: string): name is DemoName {
    return isDemoName(name);
  }

  validateAppConfig(config: IRawAppConfig): string[] {
    const errors: string[] = [];

    if (config.logLevel !== undefined && !this.isValidLogLevel(config.logLevel)) {
      errors.push(`Invalid log level: ${config.logLevel}. Expected one of ${LOG_LEVELS.join(', ')}.`);
    }

    if (config.demos !== undefined) {
      if (config.demos.length === 0) {
        errors.push('Demo list is empty');
      }
      for (const name of config.demos) {
        if (!this.isValidDemo(name)) {
          errors.push(`Invalid demo: ${name}. Expected one of ${DEMO_NAMES.join(', ')}.`);
        }
      }
    }

    return errors;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Keeps the valid names in their given order; the default list replaces
   * a missing or entirely invalid one.
   */
  private resolveDemos(demos: string[] | undefined): DemoName[] {
    if (demos === undefined) {
      return [...this.defaults.demos];
    }
    const valid = demos.filter((name): name is DemoName => this.isValidDemo(name));
    return valid.length > 0 ? valid : [...this.defaults.demos];
  }
}
