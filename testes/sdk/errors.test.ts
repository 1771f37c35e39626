/**
 * TESTES - Mapeamento de erros
 */

import {
  APIError,
  ArgumentError,
  AuthenticationError,
  BadRequestError,
  ElevenLabsError,
  ForbiddenError,
  MissingParameterError,
  NotFoundError,
  RateLimitError,
  UnprocessableEntityError,
  createErrorFromResponse,
  extractErrorMessage
} from '../../sdk/src';

describe('createErrorFromResponse', () => {
  test.each([
    [400, BadRequestError],
    [401, AuthenticationError],
    [403, ForbiddenError],
    [404, NotFoundError],
    [422, UnprocessableEntityError],
    [429, RateLimitError]
  ])('status %i → classe específica', (status, ErrorClass) => {
    const error = createErrorFromResponse(status, { detail: 'boom' });

    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.status).toBe(status);
    expect(error.message).toBe('boom');
  });

  test('status sem classe própria → APIError', () => {
    const error = createErrorFromResponse(502, undefined);

    expect(error.constructor).toBe(APIError);
    expect(error.message).toBe('API request failed with status 502');
  });

  test.each([
    [400, 'Bad request - invalid parameters'],
    [401, 'Invalid API key or authentication failed'],
    [403, 'Access forbidden'],
    [404, 'Resource not found'],
    [422, 'Unprocessable entity - invalid data'],
    [429, 'Rate limit exceeded']
  ])('status %i sem corpo usa mensagem padrão', (status, message) => {
    expect(createErrorFromResponse(status, undefined).message).toBe(message);
  });

  test('Retry-After ausente ou inválido → retryAfterMs indefinido', () => {
    const missing = createErrorFromResponse(429, undefined);
    const invalid = createErrorFromResponse(429, undefined, undefined, { 'retry-after': 'soon' });

    expect(missing instanceof RateLimitError && missing.retryAfterMs).toBeUndefined();
    expect(invalid instanceof RateLimitError && invalid.retryAfterMs).toBeUndefined();
  });

  test('toJSON inclui nome, status e requestId', () => {
    const error = createErrorFromResponse(404, { detail: 'missing' }, 'req-9');

    expect(error.toJSON()).toEqual({
      name: 'NotFoundError',
      message: 'missing',
      status: 404,
      requestId: 'req-9'
    });
  });
});

describe('extractErrorMessage', () => {
  test('prioridade: detail, message, error, errors', () => {
    expect(extractErrorMessage({ message: 'm', detail: 'd' })).toBe('d');
    expect(extractErrorMessage({ error: 'e', message: 'm' })).toBe('m');
    expect(extractErrorMessage({ errors: ['first', 'second'], error: 'e' })).toBe('e');
    expect(extractErrorMessage({ errors: ['first', 'second'] })).toBe('first');
  });

  test('detail aninhado usa message', () => {
    expect(extractErrorMessage({ detail: { status: 'invalid_uid', message: 'Voice does not exist' } }))
      .toBe('Voice does not exist');
  });

  test('objeto sem mensagem é serializado', () => {
    expect(extractErrorMessage({ detail: { status: 'quota_exceeded' } })).toBe('{"status":"quota_exceeded"}');
  });

  test('texto longo é truncado em 200 caracteres', () => {
    const message = extractErrorMessage('x'.repeat(250));

    expect(message).toBe(`${'x'.repeat(200)}...`);
  });

  test('corpo vazio → string vazia', () => {
    expect(extractErrorMessage(undefined)).toBe('');
    expect(extractErrorMessage('')).toBe('');
    expect(extractErrorMessage({})).toBe('');
  });
});

describe('Erros locais', () => {
  test('MissingParameterError é ArgumentError e não ElevenLabsError', () => {
    const error = new MissingParameterError('agentId');

    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).not.toBeInstanceOf(ElevenLabsError);
    expect(error.message).toBe('agentId is required');
    expect(error.parameter).toBe('agentId');
    expect(error.name).toBe('MissingParameterError');
  });
});
