import { ApiTransport } from '../../transport';
import { JsonValue } from '../../types';

export class ModelsAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Modelos disponíveis (array) */
  async list(): Promise<JsonValue[]> {
    return this.client.get('/v1/models');
  }
}
