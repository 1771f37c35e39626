/**
 * Servidores MCP e aprovação de ferramentas (/v1/convai/mcp-servers)
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireNonEmptyObject, requireOneOf, requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, McpApprovalPolicy, McpServerCreateInput, McpToolApprovalInput } from '../../types';

export const MCP_APPROVAL_POLICIES: readonly McpApprovalPolicy[] = [
  'auto_approve_all',
  'require_approval_all',
  'require_approval_per_tool'
];

export class McpServersAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Registra servidor MCP; `config` não pode ser vazio */
  async create(params: McpServerCreateInput): Promise<JsonObject> {
    requireNonEmptyObject('config', params.config);
    return this.client.post('/v1/convai/mcp-servers', { config: params.config });
  }

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/convai/mcp-servers');
  }

  async get(mcpServerId: string): Promise<JsonObject> {
    requireParam('mcpServerId', mcpServerId);
    return this.client.get(apiPath`/v1/convai/mcp-servers/${mcpServerId}`);
  }

  async updateApprovalPolicy(mcpServerId: string, approvalPolicy: McpApprovalPolicy): Promise<JsonObject> {
    requireParam('mcpServerId', mcpServerId);
    requireOneOf('approval_policy', approvalPolicy, MCP_APPROVAL_POLICIES);
    return this.client.patch(apiPath`/v1/convai/mcp-servers/${mcpServerId}/approval-policy`, {
      approval_policy: approvalPolicy
    });
  }

  /** Aprova uma ferramenta específica do servidor */
  async createToolApproval(mcpServerId: string, params: McpToolApprovalInput): Promise<JsonObject> {
    requireParams({
      mcpServerId,
      tool_name: params.tool_name,
      tool_description: params.tool_description
    });
    return this.client.post(apiPath`/v1/convai/mcp-servers/${mcpServerId}/tool-approvals`, compact(params));
  }

  async deleteToolApproval(mcpServerId: string, toolName: string): Promise<JsonObject> {
    requireParams({ mcpServerId, toolName });
    return this.client.delete(apiPath`/v1/convai/mcp-servers/${mcpServerId}/tool-approvals/${toolName}`);
  }
}
