import { compact } from '../../http/body';
import { requireNonEmptyArray, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, WorkspaceBulkInviteInput, WorkspaceInviteInput } from '../../types';

/**
 * Convites para o workspace
 */
export class WorkspaceInvitesAPI {
  constructor(private readonly client: ApiTransport) {}

  async invite(params: WorkspaceInviteInput): Promise<JsonObject> {
    requireParam('email', params.email);
    return this.client.post('/v1/workspace/invites/add', compact(params));
  }

  async inviteBulk(params: WorkspaceBulkInviteInput): Promise<JsonObject> {
    requireNonEmptyArray('emails', params.emails);
    return this.client.post('/v1/workspace/invites/add-bulk', compact(params));
  }

  /** Cancela convite pendente (DELETE com corpo JSON) */
  async deleteInvite(email: string): Promise<JsonObject> {
    requireParam('email', email);
    return this.client.delete('/v1/workspace/invites', { body: { email } });
  }
}
