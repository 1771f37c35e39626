/**
 * ELEVENLABS SDK - Logger
 *
 * Logger estruturado (pino), o mesmo usado pelo Fastify.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Cria o logger do cliente
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'elevenlabs-client', level });
}

export type { Logger };
