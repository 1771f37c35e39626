/**
 * TESTES - Montagem de URL, corpo e validação local
 */

import { compact } from '../../sdk/src/http/body';
import { apiPath, buildQueryString, withQuery } from '../../sdk/src/http/url';
import {
  requireNonEmptyArray,
  requireNonEmptyObject,
  requireOneOf,
  requireParam,
  requireParams
} from '../../sdk/src/http/validation';
import { ArgumentError, KnowledgeBaseListQuery, MissingParameterError } from '../../sdk/src';

describe('buildQueryString', () => {
  test('omite null/undefined e preserva ordem', () => {
    expect(buildQueryString({ page_size: 10, search: 'test', sort_by: null, cursor: undefined }))
      .toBe('page_size=10&search=test');
  });

  test('arrays viram chaves repetidas', () => {
    expect(buildQueryString({ types: ['url', 'file'], show_only_owned_documents: true }))
      .toBe('types=url&types=file&show_only_owned_documents=true');
  });

  test('false e 0 são valores presentes', () => {
    expect(buildQueryString({ force: false, page: 0 })).toBe('force=false&page=0');
  });

  test('valores são escapados', () => {
    expect(buildQueryString({ search: 'a&b c' })).toBe('search=a%26b+c');
  });

  test('aceita os tipos de query declarados', () => {
    const query: KnowledgeBaseListQuery = { page_size: 2, types: ['text'], search: undefined };

    expect(buildQueryString(query)).toBe('page_size=2&types=text');
  });
});

describe('withQuery / apiPath', () => {
  test('sem parâmetros o path fica intacto', () => {
    expect(withQuery('/v1/voices')).toBe('/v1/voices');
    expect(withQuery('/v1/voices', { search: undefined })).toBe('/v1/voices');
  });

  test('anexa com & quando o path já tem query', () => {
    expect(withQuery('/v1/x?a=1', { b: 2 })).toBe('/v1/x?a=1&b=2');
  });

  test('apiPath escapa cada segmento', () => {
    const documentId = 'doc/1';
    const chunkId = 'chunk 2';

    expect(apiPath`/v1/convai/knowledge-base/${documentId}/chunk/${chunkId}`)
      .toBe('/v1/convai/knowledge-base/doc%2F1/chunk/chunk%202');
  });
});

describe('compact', () => {
  test('remove apenas null e undefined do primeiro nível', () => {
    expect(compact({ a: 1, b: null, c: undefined, d: false, e: '', f: { g: null } }))
      .toEqual({ a: 1, d: false, e: '', f: { g: null } });
  });
});

describe('validação', () => {
  test('requireParam rejeita nulo, vazio e em branco', () => {
    expect(() => requireParam('agentId', undefined)).toThrow(MissingParameterError);
    expect(() => requireParam('agentId', null)).toThrow('agentId is required');
    expect(() => requireParam('agentId', '')).toThrow('agentId is required');
    expect(() => requireParam('agentId', ' \t')).toThrow('agentId is required');
  });

  test('requireParam aceita false e 0', () => {
    expect(() => requireParam('rag_enabled', false)).not.toThrow();
    expect(() => requireParam('number_of_pages', 0)).not.toThrow();
  });

  test('requireParams reporta o primeiro ausente', () => {
    expect(() => requireParams({ name: 'ok', value: '', type: undefined })).toThrow('value is required');
  });

  test('requireNonEmptyArray / requireNonEmptyObject', () => {
    expect(() => requireNonEmptyArray('recipients', [])).toThrow('recipients must be a non-empty array');
    expect(() => requireNonEmptyArray('recipients', 'x')).toThrow('recipients must be a non-empty array');
    expect(() => requireNonEmptyObject('config', {})).toThrow('config cannot be empty');
    expect(() => requireNonEmptyObject('config', undefined)).toThrow('config is required');
  });

  test('requireOneOf lista as opções válidas', () => {
    expect(() => requireOneOf('feedback', 'meh', ['like', 'dislike']))
      .toThrow(new ArgumentError('feedback must be one of: like, dislike'));
    expect(() => requireOneOf('feedback', 'like', ['like', 'dislike'])).not.toThrow();
  });
});
