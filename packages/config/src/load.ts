import { type AuditorConfig, auditorConfigSchema } from './schema.js';

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Validated auditor configuration
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AuditorConfig {
  const rawConfig = {
    log: {
      baseUrl: env.LOG_BASE_URL,
      timeoutMs: env.LOG_TIMEOUT_MS,
      userAgent: env.LOG_USER_AGENT,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    state: {
      checkpointFile: env.CHECKPOINT_FILE,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = auditorConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
