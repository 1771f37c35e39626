import { apiPath } from '../../http/url';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { AddSharedVoiceInput, JsonObject, SharedVoicesQuery } from '../../types';

/**
 * Biblioteca de vozes compartilhadas
 */
export class VoiceLibraryAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Busca vozes públicas; arrays (use_cases, descriptives) viram chaves repetidas */
  async getSharedVoices(query: SharedVoicesQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/shared-voices', query);
  }

  /** Copia voz compartilhada para a conta */
  async addSharedVoice(params: AddSharedVoiceInput): Promise<JsonObject> {
    requireParams({
      public_user_id: params.public_user_id,
      voice_id: params.voice_id,
      new_name: params.new_name
    });
    return this.client.post(apiPath`/v1/voices/add/${params.public_user_id}/${params.voice_id}`, {
      new_name: params.new_name
    });
  }
}
