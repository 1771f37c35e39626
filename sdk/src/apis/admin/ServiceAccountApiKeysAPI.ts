/**
 * Chaves de API de contas de serviço
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, ServiceAccountApiKeyInput, ServiceAccountApiKeyUpdateInput } from '../../types';

export class ServiceAccountApiKeysAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(serviceAccountUserId: string): Promise<JsonObject> {
    requireParam('serviceAccountUserId', serviceAccountUserId);
    return this.client.get(apiPath`/v1/service-accounts/${serviceAccountUserId}/api-keys`);
  }

  /** Cria chave; `permissions` aceita lista ou 'all' */
  async create(serviceAccountUserId: string, params: ServiceAccountApiKeyInput): Promise<JsonObject> {
    requireParams({ serviceAccountUserId, name: params.name, permissions: params.permissions });
    return this.client.post(
      apiPath`/v1/service-accounts/${serviceAccountUserId}/api-keys`,
      compact(params)
    );
  }

  async update(
    serviceAccountUserId: string,
    apiKeyId: string,
    params: ServiceAccountApiKeyUpdateInput
  ): Promise<JsonObject> {
    requireParams({
      serviceAccountUserId,
      apiKeyId,
      is_enabled: params.is_enabled,
      name: params.name,
      permissions: params.permissions
    });
    return this.client.patch(
      apiPath`/v1/service-accounts/${serviceAccountUserId}/api-keys/${apiKeyId}`,
      compact(params)
    );
  }

  async delete(serviceAccountUserId: string, apiKeyId: string): Promise<JsonObject> {
    requireParams({ serviceAccountUserId, apiKeyId });
    return this.client.delete(apiPath`/v1/service-accounts/${serviceAccountUserId}/api-keys/${apiKeyId}`);
  }
}
