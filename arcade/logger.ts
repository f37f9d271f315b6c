import pino from 'pino';
import type { DestinationStream, LevelWithSilentOrString, Logger, LoggerOptions } from 'pino';
import type { Position, Size } from './types';

// ============================================
// Logger Configuration
// ============================================

export interface LoggerConfig {
  level: LevelWithSilentOrString;
  pretty: boolean;
}

/**
 * Read logger settings from the environment
 * LOG_LEVEL defaults to 'info'; NODE_ENV=development turns on pino-pretty
 */
export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: env.LOG_LEVEL || 'info',
    pretty: env.NODE_ENV === 'development',
  };
}

/**
 * Create a logger tagged with a component name
 * @param component - Component name for filtering (e.g., 'arcade', 'game')
 * @param destination - Explicit output stream; skips the pretty transport
 */
export function createLogger(
  component: string,
  config: LoggerConfig = resolveLoggerConfig(),
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: { component }, // Add component field to all log entries
  };

  if (destination) {
    return pino(options, destination);
  }

  if (config.pretty) {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      })
    );
  }

  return pino(options);
}

// ============================================
// Logger Instances
// ============================================

export const logger = createLogger('arcade');

// ============================================
// Convenience Methods for Element Events
// ============================================

/**
 * Log a newly constructed element
 * @param kind - Class name of the element (e.g., 'Paddle')
 */
export function logElementCreated(kind: string, rect: Position & Size, log: Logger = logger): void {
  const { x, y, width, height } = rect;
  log.debug(
    { kind, x, y, width, height, event: 'element_created' },
    `Created ${kind} at (${x}, ${y}) size ${width}x${height}`
  );
}
