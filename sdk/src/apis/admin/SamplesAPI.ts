import { apiPath } from '../../http/url';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject } from '../../types';

/**
 * Amostras de áudio de vozes clonadas
 */
export class SamplesAPI {
  constructor(private readonly client: ApiTransport) {}

  async delete(voiceId: string, sampleId: string): Promise<JsonObject> {
    requireParams({ voiceId, sampleId });
    return this.client.delete(apiPath`/v1/voices/${voiceId}/samples/${sampleId}`);
  }
}
