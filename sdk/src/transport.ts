/**
 * ELEVENLABS SDK - Contrato de transporte
 *
 * Interface usada pelas sub-APIs. O ElevenLabsClient e a implementacao;
 * as sub-APIs dependem apenas deste contrato.
 */

import { ResponseMetadata } from './errors';
import { MultipartPayload, QueryInput } from './types';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * Opcoes de uma requisicao individual
 */
export interface RequestOptions {
  /** Parametros de query (null/undefined omitidos) */
  query?: QueryInput;
  /** Corpo JSON */
  body?: unknown;
  /** Corpo multipart (exclusivo com body) */
  form?: MultipartPayload;
  /** Headers adicionais */
  headers?: Record<string, string>;
}

export interface StreamOptions {
  query?: QueryInput;
  /** Header Accept (default: audio/mpeg) */
  accept?: string;
}

/**
 * Resultado de uma requisição com metadados
 */
export interface RequestResult<T> {
  /** Dados da resposta */
  data: T;
  /** Metadados da requisição */
  metadata: ResponseMetadata;
}

export interface ApiTransport {
  request<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<RequestResult<T>>;
  requestData<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<T>;

  get<T>(path: string, query?: QueryInput): Promise<T>;
  post<T>(path: string, body?: unknown, query?: QueryInput): Promise<T>;
  patch<T>(path: string, body?: unknown): Promise<T>;
  put<T>(path: string, body?: unknown): Promise<T>;
  delete<T>(path: string, options?: { query?: QueryInput; body?: unknown }): Promise<T>;
  postMultipart<T>(path: string, form: MultipartPayload, query?: QueryInput): Promise<T>;

  getBinary(path: string, query?: QueryInput): Promise<Buffer>;
  postBinary(path: string, body?: unknown, query?: QueryInput, accept?: string): Promise<Buffer>;
  postMultipartBinary(path: string, form: MultipartPayload, query?: QueryInput): Promise<Buffer>;

  postStream(path: string, body?: unknown, options?: StreamOptions): AsyncGenerator<Uint8Array, void, unknown>;
  postMultipartStream(path: string, form: MultipartPayload, options?: StreamOptions): AsyncGenerator<Uint8Array, void, unknown>;
  getStream(path: string, options?: StreamOptions): AsyncGenerator<Uint8Array, void, unknown>;
  postJsonLines<T>(path: string, body?: unknown, options?: { query?: QueryInput }): AsyncGenerator<T, void, unknown>;
}
