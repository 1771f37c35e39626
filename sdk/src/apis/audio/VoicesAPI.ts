/**
 * Vozes da conta (/v1/voices)
 */

import { apiPath } from '../../http/url';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, MultipartPayload, VoiceCreateInput, VoiceEditInput } from '../../types';

/**
 * Monta o formulário de criação/edição.
 * Labels viram campos `labels[chave]`; cada amostra repete o campo `files`.
 */
function voiceForm(params: VoiceEditInput): MultipartPayload {
  const form: MultipartPayload = {
    name: params.name,
    description: params.description,
    remove_background_noise: params.remove_background_noise
  };

  for (const [key, value] of Object.entries(params.labels ?? {})) {
    form[`labels[${key}]`] = String(value);
  }

  if (params.files && params.files.length > 0) {
    form.files = params.files;
  }

  return form;
}

export class VoicesAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/voices');
  }

  async get(voiceId: string): Promise<JsonObject> {
    requireParam('voiceId', voiceId);
    return this.client.get(apiPath`/v1/voices/${voiceId}`);
  }

  /** Clona voz a partir de amostras de áudio */
  async create(params: VoiceCreateInput): Promise<{ voice_id: string }> {
    requireParam('name', params.name);
    return this.client.postMultipart('/v1/voices/add', voiceForm({
      ...params,
      description: params.description ?? ''
    }));
  }

  /** Edita nome, descrição, labels ou adiciona amostras */
  async edit(voiceId: string, params: VoiceEditInput): Promise<JsonObject> {
    requireParam('voiceId', voiceId);
    return this.client.postMultipart(apiPath`/v1/voices/${voiceId}/edit`, voiceForm(params));
  }

  async delete(voiceId: string): Promise<JsonObject> {
    requireParam('voiceId', voiceId);
    return this.client.delete(apiPath`/v1/voices/${voiceId}`);
  }
}
