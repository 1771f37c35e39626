import { apiPath } from '../../http/url';
import { requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, SecretCreatedResponse, SecretInput } from '../../types';

/**
 * Segredos do workspace usados por ferramentas e webhooks
 */
export class SecretsAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/convai/secrets');
  }

  /** Cria segredo (type default: 'new') */
  async create(params: SecretInput): Promise<SecretCreatedResponse> {
    requireParams({ name: params.name, value: params.value });
    return this.client.post('/v1/convai/secrets', {
      type: params.type ?? 'new',
      name: params.name,
      value: params.value
    });
  }

  /** Substitui nome e valor (type default: 'update') */
  async update(secretId: string, params: SecretInput): Promise<JsonObject> {
    requireParams({ secretId, name: params.name, value: params.value });
    return this.client.patch(apiPath`/v1/convai/secrets/${secretId}`, {
      type: params.type ?? 'update',
      name: params.name,
      value: params.value
    });
  }

  async delete(secretId: string): Promise<JsonObject> {
    requireParam('secretId', secretId);
    return this.client.delete(apiPath`/v1/convai/secrets/${secretId}`);
  }
}
