/**
 * Composição musical (/v1/music)
 *
 * A partir de um prompt ou de um plano de composição.
 */

import { ArgumentError } from '../../errors';
import { compact } from '../../http/body';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, MusicOptions, MusicPlanInput, RequestBody } from '../../types';

export const DEFAULT_MUSIC_MODEL = 'music_v1';

function musicRequest(options: MusicOptions): { body: RequestBody; query: { output_format?: string } } {
  const { output_format, model_id, ...bodyOptions } = options;
  if (!bodyOptions.prompt && !bodyOptions.composition_plan) {
    throw new ArgumentError('Either prompt or composition_plan must be provided');
  }
  return {
    body: compact({ ...bodyOptions, model_id: model_id ?? DEFAULT_MUSIC_MODEL }),
    query: { output_format }
  };
}

export class MusicAPI {
  constructor(private readonly client: ApiTransport) {}

  async compose(options: MusicOptions): Promise<Buffer> {
    const { body, query } = musicRequest(options);
    return this.client.postBinary('/v1/music', body, query);
  }

  stream(options: MusicOptions): AsyncGenerator<Uint8Array, void, unknown> {
    const { body, query } = musicRequest(options);
    return this.client.postStream('/v1/music/stream', body, { query });
  }

  /**
   * Áudio e metadados da composição em uma resposta multipart/mixed,
   * devolvida sem decodificar
   */
  async composeDetailed(options: MusicOptions): Promise<Buffer> {
    const { body, query } = musicRequest(options);
    return this.client.postBinary('/v1/music/detailed', body, query, 'multipart/mixed');
  }

  /** Gera plano de composição editável (sem áudio) */
  async createPlan(input: MusicPlanInput): Promise<JsonObject> {
    requireParam('prompt', input.prompt);
    return this.client.post('/v1/music/plan', compact({
      ...input,
      model_id: input.model_id ?? DEFAULT_MUSIC_MODEL
    }));
  }
}
