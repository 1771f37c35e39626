/**
 * Compartilhamento de recursos do workspace (vozes, dicionários, agentes...)
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, ShareResourceInput, UnshareResourceInput } from '../../types';

export class WorkspaceResourcesAPI {
  constructor(private readonly client: ApiTransport) {}

  async get(resourceId: string, query: { resource_type: string }): Promise<JsonObject> {
    requireParams({ resourceId, resource_type: query.resource_type });
    return this.client.get(apiPath`/v1/workspace/resources/${resourceId}`, {
      resource_type: query.resource_type
    });
  }

  /** Concede papel sobre o recurso a usuário, grupo ou chave de API */
  async share(resourceId: string, params: ShareResourceInput): Promise<JsonObject> {
    requireParams({ resourceId, resource_type: params.resource_type, role: params.role });
    return this.client.post(apiPath`/v1/workspace/resources/${resourceId}/share`, compact(params));
  }

  async unshare(resourceId: string, params: UnshareResourceInput): Promise<JsonObject> {
    requireParams({ resourceId, resource_type: params.resource_type });
    return this.client.post(apiPath`/v1/workspace/resources/${resourceId}/unshare`, compact(params));
  }
}
