import { compact } from '../../http/body';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, WorkspaceMemberUpdateInput } from '../../types';

export class WorkspaceMembersAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Bloqueia/desbloqueia membro ou muda seu papel */
  async update(params: WorkspaceMemberUpdateInput): Promise<JsonObject> {
    requireParam('email', params.email);
    return this.client.post('/v1/workspace/members', compact(params));
  }
}
