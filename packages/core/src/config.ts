/**
 * Engine configuration read from the environment
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

// winston npm levels
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EngineConfigSchema = z.object({
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(LOG_LEVELS).default('info')
  ),
  LOG_FORMAT: z.enum(['json', 'simple']).optional(),
  NODE_ENV: z.string().optional(),
});

export interface EngineConfig {
  logLevel: LogLevel;
  logFormat: 'json' | 'simple';
}

/**
 * Load engine configuration
 * - LOG_LEVEL defaults to info, case-insensitive
 * - LOG_FORMAT defaults to json in production, simple elsewhere
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid engine configuration: ${issues.join('; ')}`,
      parsed.error.issues
    );
  }

  const { LOG_LEVEL, LOG_FORMAT, NODE_ENV } = parsed.data;

  return {
    logLevel: LOG_LEVEL,
    logFormat: LOG_FORMAT ?? (NODE_ENV === 'production' ? 'json' : 'simple'),
  };
}
