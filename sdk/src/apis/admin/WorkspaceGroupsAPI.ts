import { apiPath } from '../../http/url';
import { requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonValue } from '../../types';

/**
 * Grupos de usuários do workspace
 */
export class WorkspaceGroupsAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Busca grupos pelo nome */
  async search(name: string): Promise<JsonValue> {
    requireParam('name', name);
    return this.client.get('/v1/workspace/groups/search', { name });
  }

  async addMember(groupId: string, email: string): Promise<JsonValue> {
    requireParams({ groupId, email });
    return this.client.post(apiPath`/v1/workspace/groups/${groupId}/members`, { email });
  }

  async removeMember(groupId: string, email: string): Promise<JsonValue> {
    requireParams({ groupId, email });
    return this.client.post(apiPath`/v1/workspace/groups/${groupId}/members/remove`, { email });
  }
}
