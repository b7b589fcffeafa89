/**
 * Repository interface for reading application configuration.
 *
 * Values are returned raw; validation and defaults live in
 * {@link AppConfigService}.
 */

/**
 * Application configuration as stored, before validation.
 */
export interface IRawAppConfig {
  /** Requested log level (e.g. 'info') */
  logLevel?: string;
  /** Requested demos, in order */
  demos?: string[];
}

/**
 * Repository interface for configuration lookup.
 */
export interface IConfigRepository {
  /**
   * Get application-level configuration.
   *
   * @returns Raw configuration; missing keys are left undefined
   * @throws Error if the configuration source cannot be read
   */
  getAppConfig(): Promise<IRawAppConfig>;
}
