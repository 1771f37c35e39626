/**
 * ELEVENLABS SDK - Montagem de URL
 *
 * Paths com identificadores escapados e query strings sem valores nulos.
 */

import { QueryInput } from '../types';

/**
 * Template tag para paths da API.
 * Cada valor interpolado vira um segmento percent-encoded.
 *
 * @example
 * apiPath`/v1/convai/knowledge-base/${documentId}/rag-index/${ragIndexId}`
 */
export function apiPath(strings: TemplateStringsArray, ...segments: Array<string | number>): string {
  let path = strings[0];
  segments.forEach((segment, index) => {
    path += encodeURIComponent(String(segment)) + strings[index + 1];
  });
  return path;
}

/**
 * Serializa parametros de query.
 * - null/undefined sao omitidos
 * - arrays viram chaves repetidas (types=url&types=file)
 * - ordem de insercao preservada
 */
export function buildQueryString(query: QueryInput = {}): string {
  const params = new URLSearchParams();

  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      params.append(key, String(item));
    }
  }

  return params.toString();
}

/**
 * Anexa query string ao path (sem `?` quando nao ha parametros)
 */
export function withQuery(path: string, query?: QueryInput): string {
  const queryString = buildQueryString(query);
  if (!queryString) {
    return path;
  }
  return path.includes('?') ? `${path}&${queryString}` : `${path}?${queryString}`;
}
