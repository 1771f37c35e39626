import { ApiTransport } from '../../transport';
import { JsonObject } from '../../types';

/**
 * Webhooks do workspace
 */
export class WebhooksAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(query: { include_usages?: boolean } = {}): Promise<JsonObject> {
    return this.client.get('/v1/workspace/webhooks', query);
  }
}
