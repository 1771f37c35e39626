/**
 * Agentes conversacionais (/v1/convai/agents)
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import {
  AgentCreateInput,
  AgentCreatedResponse,
  AgentListQuery,
  AgentLlmUsageInput,
  AgentUpdateInput,
  JsonObject,
  SimulateConversationInput
} from '../../types';

export class AgentsAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Cria agente */
  async create(params: AgentCreateInput): Promise<AgentCreatedResponse> {
    requireParam('conversation_config', params.conversation_config);
    return this.client.post('/v1/convai/agents/create', compact(params));
  }

  /** Obtém configuração completa de um agente */
  async get(agentId: string): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.get(apiPath`/v1/convai/agents/${agentId}`);
  }

  /** Lista agentes (paginação por cursor) */
  async list(query: AgentListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/convai/agents', query);
  }

  /** Atualiza agente */
  async update(agentId: string, params: AgentUpdateInput): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.patch(apiPath`/v1/convai/agents/${agentId}`, compact(params));
  }

  /** Remove agente */
  async delete(agentId: string): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.delete(apiPath`/v1/convai/agents/${agentId}`);
  }

  /** Duplica agente, opcionalmente com novo nome */
  async duplicate(agentId: string, params: { name?: string | null } = {}): Promise<AgentCreatedResponse> {
    requireParam('agentId', agentId);
    return this.client.post(apiPath`/v1/convai/agents/${agentId}/duplicate`, compact(params));
  }

  /** Link de compartilhamento */
  async link(agentId: string): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.get(apiPath`/v1/convai/agents/${agentId}/link`);
  }

  /** Simula conversa entre o agente e um usuário simulado */
  async simulateConversation(agentId: string, params: SimulateConversationInput): Promise<JsonObject> {
    requireParam('agentId', agentId);
    requireParam('simulation_specification', params.simulation_specification);
    return this.client.post(
      apiPath`/v1/convai/agents/${agentId}/simulate-conversation`,
      compact(params)
    );
  }

  /**
   * Simulação em streaming. Cada chunk é repassado como chegou;
   * o formato é definido pelo servidor.
   */
  simulateConversationStream(agentId: string, params: SimulateConversationInput): AsyncGenerator<Uint8Array, void, unknown> {
    requireParam('agentId', agentId);
    requireParam('simulation_specification', params.simulation_specification);
    return this.client.postStream(
      apiPath`/v1/convai/agents/${agentId}/simulate-conversation/stream`,
      compact(params),
      { accept: 'application/json' }
    );
  }

  /** Estima uso de LLM para o agente */
  async calculateLlmUsage(agentId: string, params: AgentLlmUsageInput = {}): Promise<JsonObject> {
    requireParam('agentId', agentId);
    return this.client.post(apiPath`/v1/convai/agent/${agentId}/llm-usage/calculate`, compact(params));
  }
}
