import { ApiTransport } from '../../transport';
import { JsonObject } from '../../types';

export class ServiceAccountsAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/service-accounts');
  }
}
