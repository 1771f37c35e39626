import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { AvatarInput, JsonObject, WidgetQuery } from '../../types';

/**
 * Widget embutível de um agente
 */
export class WidgetsAPI {
  constructor(private readonly client: ApiTransport) {}

  async get(agentId: string, query: WidgetQuery = {}): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.get(apiPath`/v1/convai/agents/${agentId}/widget`, query);
  }

  /** Envia imagem de avatar (campo multipart `avatar_file`) */
  async createAvatar(agentId: string, input: AvatarInput): Promise<JsonObject> {
    requireParam('agentId', agentId);
    requireParam('file', input.file);
    requireParam('filename', input.filename);
    return this.client.postMultipart(apiPath`/v1/convai/agents/${agentId}/avatar`, {
      avatar_file: filePart(input.file, input.filename)
    });
  }
}
