/**
 * Helper: API ElevenLabs simulada em memoria (Fastify).
 *
 * Nenhum socket e aberto: o fetch do cliente e substituido por um
 * adaptador que entrega cada requisicao via app.inject().
 */

import Fastify, { FastifyInstance } from 'fastify';
import { IncomingHttpHeaders } from 'http';

import { createElevenLabsClient, ElevenLabsClient, ElevenLabsClientOptions } from '../../sdk/src';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface StubResponse {
  status?: number;
  /** Objetos sao serializados como JSON; Buffer/string vao como estao */
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  /** Path + query string, como chegou */
  url: string;
  path: string;
  headers: IncomingHttpHeaders;
  body: unknown;
}

export interface MockApi {
  app: FastifyInstance;
  fetch: typeof fetch;
  requests: RecordedRequest[];
  stub(method: string, path: string, response: StubResponse): void;
  close(): Promise<void>;
}

const INJECT_METHODS = ['GET', 'POST', 'PATCH', 'PUT', 'DELETE'] as const;

export const TEST_API_KEY = 'test-secret';
export const TEST_BASE_URL = 'https://api.test.local';

// ════════════════════════════════════════════════════════════════════════════
// IMPLEMENTACAO
// ════════════════════════════════════════════════════════════════════════════

export function createMockApi(): MockApi {
  const app = Fastify({ logger: false });
  const stubs = new Map<string, StubResponse>();
  const requests: RecordedRequest[] = [];

  app.addContentTypeParser('multipart/form-data', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.all('*', async (request, reply) => {
    const path = request.url.split('?')[0];
    requests.push({
      method: request.method,
      url: request.url,
      path,
      headers: request.headers,
      body: request.body
    });

    const stub = stubs.get(`${request.method} ${path}`);
    if (!stub) {
      return reply.code(404).send({ detail: `No stub for ${request.method} ${path}` });
    }

    reply.code(stub.status ?? 200);
    if (stub.headers) {
      reply.headers(stub.headers);
    }
    if (stub.body === undefined) {
      return reply.send();
    }
    return reply.send(stub.body);
  });

  const mockFetch: typeof fetch = async (input, init) => {
    const request = new Request(input, init);
    const url = new URL(request.url);
    const method = INJECT_METHODS.find(candidate => candidate === request.method);
    if (!method) {
      throw new Error(`Unsupported method: ${request.method}`);
    }

    const payload = Buffer.from(await request.arrayBuffer());
    const response = await app.inject({
      method,
      url: url.pathname + url.search,
      headers: Object.fromEntries(request.headers.entries()),
      payload: payload.length > 0 ? payload : undefined
    });

    const headers = new Headers();
    for (const [name, value] of Object.entries(response.headers)) {
      if (value === undefined) {
        continue;
      }
      if (Array.isArray(value)) {
        value.forEach(item => headers.append(name, item));
      } else {
        headers.set(name, String(value));
      }
    }

    const noBody = response.statusCode === 204 || response.statusCode === 304;
    return new Response(noBody ? null : response.rawPayload, {
      status: response.statusCode,
      headers
    });
  };

  return {
    app,
    fetch: mockFetch,
    requests,
    stub(method, path, response) {
      stubs.set(`${method.toUpperCase()} ${path}`, response);
    },
    async close() {
      await app.close();
    }
  };
}

/**
 * Cliente apontando para a API simulada, com log silencioso
 */
export function createTestClient(mock: MockApi, options: ElevenLabsClientOptions = {}): ElevenLabsClient {
  return createElevenLabsClient({
    apiKey: TEST_API_KEY,
    baseUrl: TEST_BASE_URL,
    logLevel: 'silent',
    fetch: mock.fetch,
    env: {},
    ...options
  });
}

/**
 * Reconstroi o FormData de uma requisicao multipart gravada
 */
export async function readForm(request: RecordedRequest): Promise<FormData> {
  const contentType = request.headers['content-type'];
  if (!Buffer.isBuffer(request.body) || typeof contentType !== 'string') {
    throw new Error(`Expected multipart body for ${request.method} ${request.path}`);
  }
  return new Response(request.body, { headers: { 'content-type': contentType } }).formData();
}
