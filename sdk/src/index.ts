/**
 * ELEVENLABS SDK
 *
 * Cliente TypeScript para a API REST da ElevenLabs.
 *
 * @example
 * ```typescript
 * import { createElevenLabsClient } from 'elevenlabs-client';
 *
 * const client = createElevenLabsClient({ apiKey: process.env.ELEVENLABS_API_KEY });
 *
 * // Agentes
 * const agents = await client.agents.list({ page_size: 10 });
 *
 * // Sintese
 * const audio = await client.textToSpeech.convert('voice-id', 'Hello world');
 * ```
 *
 * @packageDocumentation
 */

// Client
export {
  ElevenLabsClient,
  ElevenLabsClientOptions,
  SDK_VERSION,
  createElevenLabsClient
} from './client';

export {
  ApiTransport,
  HttpMethod,
  RequestOptions,
  RequestResult,
  StreamOptions
} from './transport';

// Config
export {
  ElevenLabsConfig,
  ConfigInput,
  Environment,
  DEFAULT_BASE_URL,
  DEFAULT_API_KEY_ENV,
  DEFAULT_BASE_URL_ENV,
  loadConfig,
  validateConfig,
  describeConfig
} from './config';

export { LogLevel, Logger, createLogger } from './logger';

// Types
export * from './types';

// Errors
export {
  ElevenLabsError,
  APIError,
  BadRequestError,
  AuthenticationError,
  ForbiddenError,
  NotFoundError,
  UnprocessableEntityError,
  RateLimitError,
  NetworkError,
  ArgumentError,
  MissingParameterError,
  ResponseMetadata,
  createErrorFromResponse,
  extractErrorMessage
} from './errors';

// Helpers
export { filePart, mimeFor } from './http/multipart';
export { buildQueryString } from './http/url';

// Endpoints
export * from './apis/agents-platform';
export * from './apis/admin';
export * from './apis/audio';
