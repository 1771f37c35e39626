import { apiPath } from '../../http/url';
import { requireNonEmptyObject, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { CursorQuery, JsonObject, ToolConfigInput } from '../../types';

/**
 * Ferramentas compartilhadas entre agentes (/v1/convai/tools)
 */
export class ToolsAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/convai/tools');
  }

  async get(toolId: string): Promise<JsonObject> {
    requireParam('toolId', toolId);
    return this.client.get(apiPath`/v1/convai/tools/${toolId}`);
  }

  async create(params: ToolConfigInput): Promise<JsonObject> {
    requireNonEmptyObject('tool_config', params.tool_config);
    return this.client.post('/v1/convai/tools', { tool_config: params.tool_config });
  }

  async update(toolId: string, params: ToolConfigInput): Promise<JsonObject> {
    requireParam('toolId', toolId);
    requireNonEmptyObject('tool_config', params.tool_config);
    return this.client.patch(apiPath`/v1/convai/tools/${toolId}`, { tool_config: params.tool_config });
  }

  async delete(toolId: string): Promise<JsonObject> {
    requireParam('toolId', toolId);
    return this.client.delete(apiPath`/v1/convai/tools/${toolId}`);
  }

  /** Agentes que usam a ferramenta */
  async getDependentAgents(toolId: string, query: CursorQuery = {}): Promise<JsonObject> {
    requireParam('toolId', toolId);
    return this.client.get(apiPath`/v1/convai/tools/${toolId}/dependent-agents`, query);
  }
}
