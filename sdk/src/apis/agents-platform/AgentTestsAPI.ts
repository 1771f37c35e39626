/**
 * Testes de agente (/v1/convai/agent-testing)
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { AgentTestInput, AgentTestListQuery, JsonObject, RunTestsInput } from '../../types';

function requireTestFields(params: AgentTestInput): void {
  requireParams({
    name: params.name,
    chat_history: params.chat_history,
    success_condition: params.success_condition,
    success_examples: params.success_examples,
    failure_examples: params.failure_examples
  });
}

export class AgentTestsAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(query: AgentTestListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/convai/agent-testing', query);
  }

  async get(testId: string): Promise<JsonObject> {
    requireParam('testId', testId);
    return this.client.get(apiPath`/v1/convai/agent-testing/${testId}`);
  }

  /** Cria teste com histórico de chat e critérios de sucesso */
  async create(params: AgentTestInput): Promise<JsonObject> {
    requireTestFields(params);
    return this.client.post('/v1/convai/agent-testing/create', compact(params));
  }

  async update(testId: string, params: AgentTestInput): Promise<JsonObject> {
    requireParam('testId', testId);
    requireTestFields(params);
    return this.client.patch(apiPath`/v1/convai/agent-testing/${testId}`, compact(params));
  }

  async delete(testId: string): Promise<JsonObject> {
    requireParam('testId', testId);
    return this.client.delete(apiPath`/v1/convai/agent-testing/${testId}`);
  }

  /** Resumos de vários testes por id */
  async getSummaries(testIds: string[]): Promise<JsonObject> {
    requireNonEmptyArray('test_ids', testIds);
    return this.client.post('/v1/convai/agent-testing/summaries', { test_ids: testIds });
  }

  /** Executa testes contra um agente */
  async runOnAgent(agentId: string, params: RunTestsInput): Promise<JsonObject> {
    requireParam('agentId', agentId);
    requireNonEmptyArray('tests', params.tests);
    return this.client.post(apiPath`/v1/convai/agents/${agentId}/run-tests`, compact(params));
  }
}
