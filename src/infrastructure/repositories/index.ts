/**
 * Repository exports.
 *
 * Exports configuration repository interfaces and implementations.
 */

export type { IConfigRepository, IRawAppConfig } from '../interfaces/IConfigRepository';
export { EnvConfigRepository, ENV_KEYS } from './EnvConfigRepository';
export type { EnvironmentSource } from './EnvConfigRepository';
