/**
 * ELEVENLABS SDK - Configuracao
 *
 * Tipos e loader de configuracao do cliente.
 * Ordem de resolucao: opcao explicita → variavel de ambiente → default.
 */

import { ArgumentError, MissingParameterError } from './errors';
import { isLogLevel, LogLevel } from './logger';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Configuracao resolvida (imutavel durante a vida do cliente)
 */
export interface ElevenLabsConfig {
  /** Chave enviada no header xi-api-key */
  apiKey: string;

  /** URL base da API, sem barra final */
  baseUrl: string;

  /** Timeout em ms; ausente = default do fetch */
  timeout?: number;

  /** Nivel de log (default: 'info') */
  logLevel: LogLevel;

  /** Headers adicionais em todas as requisicoes */
  customHeaders: Record<string, string>;
}

/**
 * Entradas aceitas pelo loader
 */
export interface ConfigInput {
  apiKey?: string;
  baseUrl?: string;
  /** Nome da variavel com a chave (default: ELEVENLABS_API_KEY) */
  apiKeyEnv?: string;
  /** Nome da variavel com a URL base (default: ELEVENLABS_BASE_URL) */
  baseUrlEnv?: string;
  timeout?: number;
  logLevel?: LogLevel;
  customHeaders?: Record<string, string>;
}

export type Environment = Record<string, string | undefined>;

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

export const DEFAULT_BASE_URL = 'https://api.elevenlabs.io';
export const DEFAULT_API_KEY_ENV = 'ELEVENLABS_API_KEY';
export const DEFAULT_BASE_URL_ENV = 'ELEVENLABS_BASE_URL';
export const LOG_LEVEL_ENV = 'ELEVENLABS_LOG_LEVEL';
export const TIMEOUT_ENV = 'ELEVENLABS_TIMEOUT_MS';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function resolveLogLevel(input: ConfigInput, env: Environment): LogLevel {
  if (input.logLevel) {
    return input.logLevel;
  }
  const fromEnv = nonBlank(env[LOG_LEVEL_ENV]);
  if (fromEnv === undefined) {
    return DEFAULT_LOG_LEVEL;
  }
  if (!isLogLevel(fromEnv)) {
    throw new ArgumentError(`Invalid log level: ${fromEnv}`);
  }
  return fromEnv;
}

function resolveTimeout(input: ConfigInput, env: Environment): number | undefined {
  if (input.timeout !== undefined) {
    return input.timeout;
  }
  const fromEnv = nonBlank(env[TIMEOUT_ENV]);
  return fromEnv === undefined ? undefined : Number(fromEnv);
}

/**
 * Carrega configuracao a partir das opcoes e do ambiente.
 * Variaveis de ambiente:
 * - ELEVENLABS_API_KEY (ou a indicada em apiKeyEnv)
 * - ELEVENLABS_BASE_URL (ou a indicada em baseUrlEnv)
 * - ELEVENLABS_LOG_LEVEL
 * - ELEVENLABS_TIMEOUT_MS
 *
 * @throws MissingParameterError se nenhuma chave estiver disponivel
 */
export function loadConfig(input: ConfigInput = {}, env: Environment = process.env): ElevenLabsConfig {
  const apiKeyEnv = input.apiKeyEnv ?? DEFAULT_API_KEY_ENV;
  const baseUrlEnv = input.baseUrlEnv ?? DEFAULT_BASE_URL_ENV;

  const apiKey = nonBlank(input.apiKey) ?? nonBlank(env[apiKeyEnv]);
  if (apiKey === undefined) {
    throw new MissingParameterError(
      'apiKey',
      `apiKey is required: pass it explicitly or set ${apiKeyEnv}`
    );
  }

  const baseUrl = nonBlank(input.baseUrl) ?? nonBlank(env[baseUrlEnv]) ?? DEFAULT_BASE_URL;

  const config: ElevenLabsConfig = {
    apiKey,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    timeout: resolveTimeout(input, env),
    logLevel: resolveLogLevel(input, env),
    customHeaders: { ...(input.customHeaders ?? {}) }
  };

  validateConfig(config);
  return Object.freeze(config);
}

/**
 * Valida a configuracao carregada.
 * @throws ArgumentError se a configuracao for invalida
 */
export function validateConfig(config: ElevenLabsConfig): void {
  if (!/^https?:\/\//.test(config.baseUrl)) {
    throw new ArgumentError(`Invalid base URL: ${config.baseUrl}`);
  }

  if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout <= 0)) {
    throw new ArgumentError('Timeout must be a positive number');
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ArgumentError(`Invalid log level: ${config.logLevel}`);
  }
}

/**
 * Representacao para log, com a chave mascarada
 */
export function describeConfig(config: ElevenLabsConfig): Record<string, unknown> {
  return {
    apiKey: '[REDACTED]',
    baseUrl: config.baseUrl,
    timeout: config.timeout,
    logLevel: config.logLevel,
    customHeaders: Object.keys(config.customHeaders)
  };
}
