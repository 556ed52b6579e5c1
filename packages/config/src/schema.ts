import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/** Public Rekor instance */
export const DEFAULT_LOG_BASE_URL = 'https://rekor.sigstore.dev/api/v1';

/**
 * Transparency log server configuration
 *
 * Handed to the log client at construction; nothing reads it globally.
 */
export const logServerConfigSchema = z.object({
  /** REST API base URL, without trailing slash */
  baseUrl: z
    .string()
    .url('LOG_BASE_URL must be a valid URL')
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_LOG_BASE_URL),

  /** Per-request timeout in milliseconds */
  timeoutMs: z.coerce.number().int().min(100).max(120000).default(10000),

  /** User-Agent header sent with every request */
  userAgent: z.string().min(1).default('tlog-auditor/0.1.0'),
});
export type LogServerConfig = z.infer<typeof logServerConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Local state (saved checkpoints)
 */
export const stateConfigSchema = z.object({
  /** File holding the last verified checkpoint */
  checkpointFile: z.string().min(1).default('.state/checkpoint.json'),
});
export type StateConfig = z.infer<typeof stateConfigSchema>;

/**
 * Complete auditor configuration
 */
export const auditorConfigSchema = z.object({
  log: logServerConfigSchema,
  logging: loggingConfigSchema,
  state: stateConfigSchema,
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});
export type AuditorConfig = z.infer<typeof auditorConfigSchema>;
