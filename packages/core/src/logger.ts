/**
 * Logging for the construction engine
 */

import winston from 'winston';
import { loadConfig, type EngineConfig, type LogLevel } from './config';
import { ConfigurationError } from './errors';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'simple';
  silent?: boolean;

  // Environment read for defaults; process.env when omitted
  env?: NodeJS.ProcessEnv;
}

const FALLBACK_CONFIG: EngineConfig = { logLevel: 'info', logFormat: 'simple' };

/**
 * Defaults from the environment. An invalid environment falls back to
 * info/simple and hands back the error so it can be logged.
 */
function environmentDefaults(env: NodeJS.ProcessEnv): {
  config: EngineConfig;
  problem?: ConfigurationError;
} {
  try {
    return { config: loadConfig(env) };
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    return { config: FALLBACK_CONFIG, problem: error };
  }
}

export function createLogger(config: LoggerConfig = {}): winston.Logger {
  const { config: defaults, problem } = environmentDefaults(config.env ?? process.env);
  const level = config.level ?? defaults.logLevel;
  const style = config.format ?? defaults.logFormat;

  const formats = [winston.format.timestamp(), winston.format.errors({ stack: true })];

  if (style === 'json') {
    formats.push(winston.format.json());
  } else {
    formats.push(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...rest }) => {
        const extra = Object.keys(rest).length > 0 ? JSON.stringify(rest) : '';
        return `${String(timestamp)} [${level}]: ${String(message)} ${extra}`;
      })
    );
  }

  const logger = winston.createLogger({
    level,
    format: winston.format.combine(...formats),
    transports: [new winston.transports.Console({ level })],
    silent: config.silent ?? false,
    exitOnError: false,
  });

  if (problem) {
    logger.warn(`${problem.message}; using level ${level}`);
  }

  return logger;
}

export const logger = createLogger();

/**
 * Child logger tagged with component metadata
 */
export function createChildLogger(meta: Record<string, unknown>): winston.Logger {
  return logger.child(meta);
}
