export {
  logLevelSchema,
  logFormatSchema,
  logServerConfigSchema,
  loggingConfigSchema,
  stateConfigSchema,
  auditorConfigSchema,
  DEFAULT_LOG_BASE_URL,
} from './schema.js';

export type {
  LogLevel,
  LogFormat,
  LogServerConfig,
  LoggingConfig,
  StateConfig,
  AuditorConfig,
} from './schema.js';

export { loadConfig } from './load.js';
