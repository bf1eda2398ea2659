/**
 * @scimkit/lib-core
 *
 * Shared utilities for the scimkit packages.
 */

export {
  createLogger,
  setLoggerConfig,
  getLoggerConfig,
  initLoggerFromEnv,
  DEFAULT_LOGGER_CONFIG,
} from './utils/logger';
export type { Logger, LogContext, LogLevel, LogFormat, LoggerConfig } from './utils/logger';

export { parseBooleanFlag, parseListFlag } from './utils/env-flags';
export type { EnvRecord } from './utils/env-flags';
