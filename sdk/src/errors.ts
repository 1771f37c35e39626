/**
 * ELEVENLABS SDK - Erros
 *
 * Erros tipados para tratamento de falhas da API.
 *
 * Duas familias disjuntas:
 * - ElevenLabsError: falhas remotas (status nao-2xx) e de rede
 * - ArgumentError: validacao local, lancada antes de qualquer chamada HTTP
 */

import { ErrorResponseBody } from './types';

/**
 * Metadados da resposta HTTP
 */
export interface ResponseMetadata {
  /** Status HTTP */
  status: number;
  /** ID de rastreabilidade (x-request-id) */
  requestId?: string;
  /** Headers da resposta */
  headers: Record<string, string>;
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS REMOTOS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Raiz das falhas de comunicacao com a API
 */
export class ElevenLabsError extends Error {
  /** Status HTTP (0 quando nao houve resposta) */
  public readonly status: number;
  /** ID de rastreabilidade */
  public readonly requestId?: string;

  constructor(message: string, status: number, requestId?: string) {
    super(message);
    this.name = 'ElevenLabsError';
    this.status = status;
    this.requestId = requestId;

    // Mantém stack trace correto em V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formata erro para log
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      requestId: this.requestId
    };
  }
}

/**
 * Resposta nao-2xx sem classe mais especifica
 */
export class APIError extends ElevenLabsError {
  /** Corpo original da resposta (JSON decodificado ou texto) */
  public readonly body?: unknown;

  constructor(message: string, status: number, requestId?: string, body?: unknown) {
    super(message, status, requestId);
    this.name = 'APIError';
    this.body = body;
  }
}

/**
 * Requisicao invalida (400)
 */
export class BadRequestError extends APIError {
  constructor(message: string, requestId?: string, body?: unknown) {
    super(message, 400, requestId, body);
    this.name = 'BadRequestError';
  }
}

/**
 * Chave ausente ou invalida (401)
 */
export class AuthenticationError extends APIError {
  constructor(message: string, requestId?: string, body?: unknown) {
    super(message, 401, requestId, body);
    this.name = 'AuthenticationError';
  }
}

/**
 * Erro de permissão (403)
 */
export class ForbiddenError extends APIError {
  constructor(message: string, requestId?: string, body?: unknown) {
    super(message, 403, requestId, body);
    this.name = 'ForbiddenError';
  }
}

/**
 * Erro de recurso não encontrado (404)
 */
export class NotFoundError extends APIError {
  constructor(message: string, requestId?: string, body?: unknown) {
    super(message, 404, requestId, body);
    this.name = 'NotFoundError';
  }
}

/**
 * Payload rejeitado pela validacao remota (422)
 */
export class UnprocessableEntityError extends APIError {
  constructor(message: string, requestId?: string, body?: unknown) {
    super(message, 422, requestId, body);
    this.name = 'UnprocessableEntityError';
  }
}

/**
 * Limite de requisicoes excedido (429)
 */
export class RateLimitError extends APIError {
  /** Valor de Retry-After em ms, quando informado */
  public readonly retryAfterMs?: number;

  constructor(message: string, requestId?: string, body?: unknown, retryAfterMs?: number) {
    super(message, 429, requestId, body);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
  }
}

/**
 * Erro de rede/conexão
 */
export class NetworkError extends ElevenLabsError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 0);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS LOCAIS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Argumento invalido detectado antes do envio
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Parametro obrigatorio nulo, vazio ou em branco
 */
export class MissingParameterError extends ArgumentError {
  public readonly parameter: string;

  constructor(parameter: string, message = `${parameter} is required`) {
    super(message);
    this.name = 'MissingParameterError';
    this.parameter = parameter;
  }
}

// ════════════════════════════════════════════════════════════════════════════
// MAPEAMENTO STATUS → ERRO
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_MESSAGES: Record<number, string> = {
  400: 'Bad request - invalid parameters',
  401: 'Invalid API key or authentication failed',
  403: 'Access forbidden',
  404: 'Resource not found',
  422: 'Unprocessable entity - invalid data',
  429: 'Rate limit exceeded'
};

const MAX_RAW_MESSAGE_LENGTH = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return describeValue(value[0]);
  }
  if (isRecord(value)) {
    const nested = value.msg ?? value.message;
    if (typeof nested === 'string') {
      return nested;
    }
  }
  return JSON.stringify(value);
}

/**
 * Extrai mensagem legivel do corpo de erro.
 * Procura detail, message, error e errors, nesta ordem.
 */
export function extractErrorMessage(body: unknown): string {
  if (body === undefined || body === null || body === '') {
    return '';
  }

  if (typeof body === 'string') {
    return body.length > MAX_RAW_MESSAGE_LENGTH
      ? `${body.slice(0, MAX_RAW_MESSAGE_LENGTH)}...`
      : body;
  }

  if (!isRecord(body)) {
    return '';
  }

  const fields: ErrorResponseBody = body;
  const candidate = fields.detail ?? fields.message ?? fields.error ?? fields.errors;
  return describeValue(candidate);
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/**
 * Cria erro apropriado baseado no status HTTP
 */
export function createErrorFromResponse(
  status: number,
  body: unknown,
  requestId?: string,
  headers: Record<string, string> = {}
): APIError {
  const message =
    extractErrorMessage(body) ||
    DEFAULT_MESSAGES[status] ||
    `API request failed with status ${status}`;

  switch (status) {
    case 400:
      return new BadRequestError(message, requestId, body);
    case 401:
      return new AuthenticationError(message, requestId, body);
    case 403:
      return new ForbiddenError(message, requestId, body);
    case 404:
      return new NotFoundError(message, requestId, body);
    case 422:
      return new UnprocessableEntityError(message, requestId, body);
    case 429:
      return new RateLimitError(message, requestId, body, parseRetryAfter(headers['retry-after']));
    default:
      return new APIError(message, status, requestId, body);
  }
}
