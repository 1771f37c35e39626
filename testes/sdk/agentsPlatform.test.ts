/**
 * TESTES - Endpoints da plataforma de agentes
 *
 * Cada chamada e verificada pelo que chega na API simulada:
 * metodo, path + query e corpo.
 */

import { MissingParameterError, NotFoundError } from '../../sdk/src';
import { createMockApi, createTestClient, MockApi } from '../helpers/mockApiServer';

let mock: MockApi;

beforeEach(() => {
  mock = createMockApi();
});

afterEach(async () => {
  await mock.close();
});

function lastRequest() {
  return mock.requests[mock.requests.length - 1];
}

// ════════════════════════════════════════════════════════════════════════════
// AGENTS
// ════════════════════════════════════════════════════════════════════════════

describe('agents', () => {
  test('create() envia POST /v1/convai/agents/create e devolve o id', async () => {
    mock.stub('POST', '/v1/convai/agents/create', { body: { agent_id: 'agent_123' } });
    const client = createTestClient(mock);

    const result = await client.agents.create({
      name: 'Support Agent',
      conversation_config: { agent: { first_message: 'Hi!' } }
    });

    expect(result).toEqual({ agent_id: 'agent_123' });
    expect(lastRequest().method).toBe('POST');
    expect(lastRequest().url).toBe('/v1/convai/agents/create');
    expect(lastRequest().body).toEqual({
      name: 'Support Agent',
      conversation_config: { agent: { first_message: 'Hi!' } }
    });
  });

  test('list() omite parâmetros nulos', async () => {
    mock.stub('GET', '/v1/convai/agents', { body: { agents: [], has_more: false } });
    const client = createTestClient(mock);

    await client.agents.list({ page_size: 10, search: 'test', sort_by: null });

    expect(lastRequest().url).toBe('/v1/convai/agents?page_size=10&search=test');
  });

  test('get() de agente inexistente → NotFoundError', async () => {
    mock.stub('GET', '/v1/convai/agents/doc123', { status: 404, body: { detail: 'Agent not found' } });
    const client = createTestClient(mock);

    await expect(client.agents.get('doc123')).rejects.toThrow(NotFoundError);
    await expect(client.agents.get('doc123')).rejects.toThrow('Agent not found');
  });

  test('update() usa PATCH sem campos nulos', async () => {
    mock.stub('PATCH', '/v1/convai/agents/agent_1', { body: { agent_id: 'agent_1' } });
    const client = createTestClient(mock);

    await client.agents.update('agent_1', { name: 'Renamed', tags: undefined });

    expect(lastRequest().body).toEqual({ name: 'Renamed' });
  });

  test('duplicate(), link() e calculateLlmUsage()', async () => {
    mock.stub('POST', '/v1/convai/agents/agent_1/duplicate', { body: { agent_id: 'agent_2' } });
    mock.stub('GET', '/v1/convai/agents/agent_1/link', { body: { agent_id: 'agent_1', token: null } });
    mock.stub('POST', '/v1/convai/agent/agent_1/llm-usage/calculate', { body: { llm_prices: [] } });
    const client = createTestClient(mock);

    expect(await client.agents.duplicate('agent_1', { name: 'Copy' })).toEqual({ agent_id: 'agent_2' });
    await client.agents.link('agent_1');
    await client.agents.calculateLlmUsage('agent_1', { prompt_length: 800, rag_enabled: false });

    expect(mock.requests.map(r => `${r.method} ${r.url}`)).toEqual([
      'POST /v1/convai/agents/agent_1/duplicate',
      'GET /v1/convai/agents/agent_1/link',
      'POST /v1/convai/agent/agent_1/llm-usage/calculate'
    ]);
    expect(mock.requests[2].body).toEqual({ prompt_length: 800, rag_enabled: false });
  });

  test('simulateConversation() envia a especificação', async () => {
    const client = createTestClient(mock);
    mock.stub('POST', '/v1/convai/agents/agent_1/simulate-conversation', {
      body: { simulated_conversation: [], analysis: {} }
    });
    const result = await client.agents.simulateConversation('agent_1', {
      simulation_specification: { simulated_user_config: { first_message: 'Hello' } },
      new_turns_limit: 4
    });

    expect(result).toEqual({ simulated_conversation: [], analysis: {} });
    expect(lastRequest().body).toEqual({
      simulation_specification: { simulated_user_config: { first_message: 'Hello' } },
      new_turns_limit: 4
    });
  });

  test('simulateConversationStream() repassa os chunks', async () => {
    mock.stub('POST', '/v1/convai/agents/agent_1/simulate-conversation/stream', {
      body: '{"role":"user"}\n{"role":"agent"}\n'
    });
    const client = createTestClient(mock);

    const chunks: Uint8Array[] = [];
    for await (const chunk of client.agents.simulateConversationStream('agent_1', {
      simulation_specification: { simulated_user_config: {} }
    })) {
      chunks.push(chunk);
    }

    expect(Buffer.concat(chunks).toString()).toBe('{"role":"user"}\n{"role":"agent"}\n');
    expect(lastRequest().headers['accept']).toBe('application/json');
  });
});

// ════════════════════════════════════════════════════════════════════════════
// CONVERSATIONS
// ════════════════════════════════════════════════════════════════════════════

describe('conversations', () => {
  test('getSignedUrl() e getToken() enviam agent_id na query', async () => {
    mock.stub('GET', '/v1/convai/conversation/get-signed-url', { body: { signed_url: 'wss://signed' } });
    mock.stub('GET', '/v1/convai/conversation/token', { body: { token: 'rtc-token' } });
    const client = createTestClient(mock);

    const signed = await client.conversations.getSignedUrl('agent_1', { include_conversation_id: true });
    const token = await client.conversations.getToken('agent_1');

    expect(signed.signed_url).toBe('wss://signed');
    expect(token.token).toBe('rtc-token');
    expect(mock.requests[0].url)
      .toBe('/v1/convai/conversation/get-signed-url?agent_id=agent_1&include_conversation_id=true');
    expect(mock.requests[1].url).toBe('/v1/convai/conversation/token?agent_id=agent_1');
  });

  test('getAudio() devolve bytes', async () => {
    mock.stub('GET', '/v1/convai/conversations/conv_1/audio', {
      body: Buffer.from([0x49, 0x44, 0x33]),
      headers: { 'content-type': 'audio/mpeg' }
    });
    const client = createTestClient(mock);

    const audio = await client.conversations.getAudio('conv_1');

    expect(Buffer.isBuffer(audio)).toBe(true);
    expect([...audio]).toEqual([0x49, 0x44, 0x33]);
    expect(lastRequest().headers['accept']).toBe('*/*');
  });

  test('list() e sendFeedback()', async () => {
    mock.stub('GET', '/v1/convai/conversations', { body: { conversations: [] } });
    mock.stub('POST', '/v1/convai/conversations/conv_1/feedback', { body: {} });
    const client = createTestClient(mock);

    await client.conversations.list({ agent_id: 'agent_1', call_successful: 'success', page_size: 20 });
    await client.conversations.sendFeedback('conv_1', 'like');

    expect(mock.requests[0].url).toBe('/v1/convai/conversations?agent_id=agent_1&call_successful=success&page_size=20');
    expect(mock.requests[1].body).toEqual({ feedback: 'like' });
  });
});

// ════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE BASE
// ════════════════════════════════════════════════════════════════════════════

describe('knowledgeBase', () => {
  test('delete() com force envia force=true', async () => {
    mock.stub('DELETE', '/v1/convai/knowledge-base/doc123', { body: {} });
    const client = createTestClient(mock);

    await client.knowledgeBase.delete('doc123', { force: true });
    await client.knowledgeBase.delete('doc123');

    expect(mock.requests[0].method).toBe('DELETE');
    expect(mock.requests[0].url).toBe('/v1/convai/knowledge-base/doc123?force=true');
    expect(mock.requests[1].url).toBe('/v1/convai/knowledge-base/doc123');
  });

  test('GET e DELETE repetidos com os mesmos argumentos geram requisições idênticas', async () => {
    mock.stub('GET', '/v1/convai/knowledge-base/doc123', { body: { id: 'doc123' } });
    mock.stub('DELETE', '/v1/convai/knowledge-base/doc123', { body: {} });
    const client = createTestClient(mock);

    await client.knowledgeBase.get('doc123', { agent_id: 'agent_1' });
    await client.knowledgeBase.get('doc123', { agent_id: 'agent_1' });
    await client.knowledgeBase.delete('doc123', { force: false });
    await client.knowledgeBase.delete('doc123', { force: false });

    const [firstGet, secondGet, firstDelete, secondDelete] = mock.requests;
    expect(mock.requests).toHaveLength(4);
    expect(secondGet).toEqual(firstGet);
    expect(secondDelete).toEqual(firstDelete);
    expect(firstGet.url).toBe('/v1/convai/knowledge-base/doc123?agent_id=agent_1');
    expect(firstDelete.url).toBe('/v1/convai/knowledge-base/doc123?force=false');
  });

  test('list() repete a chave types', async () => {
    mock.stub('GET', '/v1/convai/knowledge-base', { body: { documents: [] } });
    const client = createTestClient(mock);

    await client.knowledgeBase.list({
      page_size: 10,
      search: 'api',
      types: ['url', 'file'],
      show_only_owned_documents: true
    });

    expect(lastRequest().url)
      .toBe('/v1/convai/knowledge-base?page_size=10&search=api&types=url&types=file&show_only_owned_documents=true');
  });

  test('createFromUrl() e createFromText() omitem nome ausente', async () => {
    mock.stub('POST', '/v1/convai/knowledge-base/url', { body: { id: 'doc_1', name: 'Docs' } });
    mock.stub('POST', '/v1/convai/knowledge-base/text', { body: { id: 'doc_2', name: 'FAQ' } });
    const client = createTestClient(mock);

    await client.knowledgeBase.createFromUrl('https://docs.example.test');
    await client.knowledgeBase.createFromText('Refunds take 5 days.', { name: 'FAQ' });

    expect(mock.requests[0].body).toEqual({ url: 'https://docs.example.test' });
    expect(mock.requests[1].body).toEqual({ text: 'Refunds take 5 days.', name: 'FAQ' });
  });

  test('índices RAG', async () => {
    mock.stub('POST', '/v1/convai/knowledge-base/doc_1/rag-index', { body: { status: 'created' } });
    mock.stub('GET', '/v1/convai/knowledge-base/doc_1/rag-index', { body: { indexes: [] } });
    mock.stub('DELETE', '/v1/convai/knowledge-base/doc_1/rag-index/idx_1', { body: {} });
    mock.stub('GET', '/v1/convai/knowledge-base/rag-index', { body: { total_used_bytes: 0 } });
    const client = createTestClient(mock);

    await client.knowledgeBase.computeRagIndex('doc_1', { model: 'e5_mistral_7b_instruct' });
    await client.knowledgeBase.getRagIndex('doc_1');
    await client.knowledgeBase.deleteRagIndex('doc_1', 'idx_1');
    await client.knowledgeBase.getRagIndexOverview();

    expect(mock.requests.map(r => `${r.method} ${r.url}`)).toEqual([
      'POST /v1/convai/knowledge-base/doc_1/rag-index',
      'GET /v1/convai/knowledge-base/doc_1/rag-index',
      'DELETE /v1/convai/knowledge-base/doc_1/rag-index/idx_1',
      'GET /v1/convai/knowledge-base/rag-index'
    ]);
    expect(mock.requests[0].body).toEqual({ model: 'e5_mistral_7b_instruct' });
  });

  test('conteúdo, chunks, dependentes e tamanho por agente', async () => {
    mock.stub('GET', '/v1/convai/knowledge-base/doc_1/content', { body: 'raw text' });
    mock.stub('GET', '/v1/convai/knowledge-base/doc_1/chunk/c_9', { body: { content: 'chunk' } });
    mock.stub('GET', '/v1/convai/knowledge-base/doc_1/dependent-agents', { body: { agents: [] } });
    mock.stub('GET', '/v1/convai/agent/agent_1/knowledge-base/size', { body: { number_of_pages: 3 } });
    const client = createTestClient(mock);

    await client.knowledgeBase.getContent('doc_1');
    await client.knowledgeBase.getChunk('doc_1', 'c_9');
    await client.knowledgeBase.getDependentAgents('doc_1', { page_size: 10, cursor: 'cursor123' });
    const size = await client.knowledgeBase.getAgentKnowledgeBaseSize('agent_1');

    expect(size).toEqual({ number_of_pages: 3 });
    expect(mock.requests[2].url)
      .toBe('/v1/convai/knowledge-base/doc_1/dependent-agents?page_size=10&cursor=cursor123');
  });

  test('update() exige nome', async () => {
    const client = createTestClient(mock);

    await expect(client.knowledgeBase.update('doc_1', { name: '' })).rejects.toThrow(MissingParameterError);
    expect(mock.requests).toHaveLength(0);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// TOOLS / WORKSPACE / SECRETS
// ════════════════════════════════════════════════════════════════════════════

describe('tools, workspace e secrets', () => {
  test('tools: update() usa PATCH e getDependentAgents() aceita cursor', async () => {
    mock.stub('PATCH', '/v1/convai/tools/tool_1', { body: { id: 'tool_1' } });
    mock.stub('GET', '/v1/convai/tools/tool_1/dependent-agents', { body: { agents: [] } });
    const client = createTestClient(mock);

    await client.tools.update('tool_1', { tool_config: { name: 'weather' } });
    await client.tools.getDependentAgents('tool_1', { cursor: 'next' });

    expect(mock.requests[0].body).toEqual({ tool_config: { name: 'weather' } });
    expect(mock.requests[1].url).toBe('/v1/convai/tools/tool_1/dependent-agents?cursor=next');
  });

  test('workspace: configurações gerais e de dashboard', async () => {
    mock.stub('PATCH', '/v1/convai/settings', { body: {} });
    mock.stub('PATCH', '/v1/convai/settings/dashboard', { body: {} });
    const client = createTestClient(mock);

    await client.workspace.updateSettings({ can_use_mcp_servers: true });
    await client.workspace.updateDashboardSettings({ charts: [{ name: 'Calls', type: 'call_success' }] });

    expect(mock.requests[0].body).toEqual({ can_use_mcp_servers: true });
    expect(mock.requests[1].body).toEqual({ charts: [{ name: 'Calls', type: 'call_success' }] });
  });

  test('secrets: type default new/update', async () => {
    mock.stub('POST', '/v1/convai/secrets', { body: { secret_id: 's1', name: 'db', type: 'stored' } });
    mock.stub('PATCH', '/v1/convai/secrets/s1', { body: {} });
    const client = createTestClient(mock);

    await client.secrets.create({ name: 'db', value: 'test-secret' });
    await client.secrets.update('s1', { name: 'db', value: 'test-secret-2' });

    expect(mock.requests[0].body).toEqual({ type: 'new', name: 'db', value: 'test-secret' });
    expect(mock.requests[1].body).toEqual({ type: 'update', name: 'db', value: 'test-secret-2' });
  });

  test('secrets: valor em branco é rejeitado localmente', async () => {
    const client = createTestClient(mock);

    await expect(client.secrets.create({ name: 'db', value: ' ' })).rejects.toThrow('value is required');
    expect(mock.requests).toHaveLength(0);
  });
});

// ════════════════════════════════════════════════════════════════════════════
// TELEFONIA
// ════════════════════════════════════════════════════════════════════════════

describe('batchCalling, phoneNumbers e outboundCalling', () => {
  test('batchCalling.submit() envia destinatários', async () => {
    mock.stub('POST', '/v1/convai/batch-calling/submit', { body: { id: 'batch_1' } });
    const client = createTestClient(mock);

    await client.batchCalling.submit({
      call_name: 'Renewals',
      agent_id: 'agent_1',
      agent_phone_number_id: 'phone_1',
      scheduled_time_unix: 1700000000,
      recipients: [{ phone_number: '+15550001111' }]
    });

    expect(lastRequest().body).toEqual({
      call_name: 'Renewals',
      agent_id: 'agent_1',
      agent_phone_number_id: 'phone_1',
      scheduled_time_unix: 1700000000,
      recipients: [{ phone_number: '+15550001111' }]
    });
  });

  test('batchCalling.submit() sem destinatários → erro local', async () => {
    const client = createTestClient(mock);

    await expect(client.batchCalling.submit({
      call_name: 'Empty',
      agent_id: 'agent_1',
      agent_phone_number_id: 'phone_1',
      scheduled_time_unix: 1700000000,
      recipients: []
    })).rejects.toThrow('recipients must be a non-empty array');
  });

  test('batchCalling: list(), cancel() e retry()', async () => {
    mock.stub('GET', '/v1/convai/batch-calling/workspace', { body: { batch_calls: [] } });
    mock.stub('POST', '/v1/convai/batch-calling/batch_1/cancel', { body: {} });
    mock.stub('POST', '/v1/convai/batch-calling/batch_1/retry', { body: {} });
    const client = createTestClient(mock);

    await client.batchCalling.list({ limit: 5 });
    await client.batchCalling.cancel('batch_1');
    await client.batchCalling.retry('batch_1');

    expect(mock.requests.map(r => r.url)).toEqual([
      '/v1/convai/batch-calling/workspace?limit=5',
      '/v1/convai/batch-calling/batch_1/cancel',
      '/v1/convai/batch-calling/batch_1/retry'
    ]);
  });

  test('phoneNumbers: update() pode desassociar agente com null', async () => {
    mock.stub('PATCH', '/v1/convai/phone-numbers/phone_1', { body: {} });
    const client = createTestClient(mock);

    await client.phoneNumbers.update('phone_1', { agent_id: null });

    expect(lastRequest().body).toEqual({ agent_id: null });
  });

  test('outboundCalling: twilio e SIP trunk', async () => {
    mock.stub('POST', '/v1/convai/twilio/outbound-call', { body: { success: true } });
    mock.stub('POST', '/v1/convai/sip-trunk/outbound-call', { body: { success: true } });
    const client = createTestClient(mock);
    const call = { agent_id: 'agent_1', agent_phone_number_id: 'phone_1', to_number: '+15550002222' };

    await client.outboundCalling.twilioCall(call);
    await client.outboundCalling.sipTrunkCall(call);

    expect(mock.requests.map(r => r.url)).toEqual([
      '/v1/convai/twilio/outbound-call',
      '/v1/convai/sip-trunk/outbound-call'
    ]);
    expect(mock.requests[1].body).toEqual(call);
  });

  test('outboundCalling: to_number obrigatório', async () => {
    const client = createTestClient(mock);

    await expect(client.outboundCalling.twilioCall({
      agent_id: 'agent_1',
      agent_phone_number_id: 'phone_1',
      to_number: ''
    })).rejects.toThrow('to_number is required');
  });
});

// ════════════════════════════════════════════════════════════════════════════
// LLM / MCP
// ════════════════════════════════════════════════════════════════════════════

describe('llmUsage e mcpServers', () => {
  test('llmUsage.calculate() envia false e 0 como valores', async () => {
    mock.stub('POST', '/v1/convai/llm-usage/calculate', { body: { llm_prices: [] } });
    const client = createTestClient(mock);

    await client.llmUsage.calculate({ prompt_length: 500, number_of_pages: 0, rag_enabled: false });

    expect(lastRequest().body).toEqual({ prompt_length: 500, number_of_pages: 0, rag_enabled: false });
  });

  test('mcpServers: config vazio é rejeitado', async () => {
    const client = createTestClient(mock);

    await expect(client.mcpServers.create({ config: {} })).rejects.toThrow('config cannot be empty');
  });

  test('mcpServers: política e aprovação de ferramentas', async () => {
    mock.stub('PATCH', '/v1/convai/mcp-servers/mcp_1/approval-policy', { body: {} });
    mock.stub('POST', '/v1/convai/mcp-servers/mcp_1/tool-approvals', { body: {} });
    mock.stub('DELETE', '/v1/convai/mcp-servers/mcp_1/tool-approvals/search%20docs', { body: {} });
    const client = createTestClient(mock);

    await client.mcpServers.updateApprovalPolicy('mcp_1', 'require_approval_per_tool');
    await client.mcpServers.createToolApproval('mcp_1', {
      tool_name: 'search docs',
      tool_description: 'Full-text search'
    });
    await client.mcpServers.deleteToolApproval('mcp_1', 'search docs');

    expect(mock.requests[0].body).toEqual({ approval_policy: 'require_approval_per_tool' });
    expect(mock.requests[1].body).toEqual({ tool_name: 'search docs', tool_description: 'Full-text search' });
    expect(mock.requests[2].url).toBe('/v1/convai/mcp-servers/mcp_1/tool-approvals/search%20docs');
  });
});

// ════════════════════════════════════════════════════════════════════════════
// TESTES DE AGENTE / WIDGETS
// ════════════════════════════════════════════════════════════════════════════

describe('tests, testInvocations e widgets', () => {
  const testDefinition = {
    name: 'Greets politely',
    chat_history: [{ role: 'user', message: 'Hi' }],
    success_condition: 'Agent greets back',
    success_examples: [{ response: 'Hello!', type: 'success' }],
    failure_examples: [{ response: 'What?', type: 'failure' }]
  };

  test('tests: create(), getSummaries() e runOnAgent()', async () => {
    mock.stub('POST', '/v1/convai/agent-testing/create', { body: { id: 'test_1' } });
    mock.stub('POST', '/v1/convai/agent-testing/summaries', { body: { tests: {} } });
    mock.stub('POST', '/v1/convai/agents/agent_1/run-tests', { body: { id: 'inv_1' } });
    const client = createTestClient(mock);

    await client.tests.create(testDefinition);
    await client.tests.getSummaries(['test_1', 'test_2']);
    await client.tests.runOnAgent('agent_1', { tests: [{ test_id: 'test_1' }] });

    expect(mock.requests[0].body).toEqual(testDefinition);
    expect(mock.requests[1].body).toEqual({ test_ids: ['test_1', 'test_2'] });
    expect(mock.requests[2].body).toEqual({ tests: [{ test_id: 'test_1' }] });
  });

  test('tests: list() e update()', async () => {
    mock.stub('GET', '/v1/convai/agent-testing', { body: { tests: [] } });
    mock.stub('PATCH', '/v1/convai/agent-testing/test_1', { body: {} });
    const client = createTestClient(mock);

    await client.tests.list({ search: 'greet', page_size: 5 });
    await client.tests.update('test_1', testDefinition);

    expect(mock.requests[0].url).toBe('/v1/convai/agent-testing?search=greet&page_size=5');
    expect(mock.requests[1].method).toBe('PATCH');
  });

  test('testInvocations.resubmit()', async () => {
    mock.stub('POST', '/v1/convai/test-invocations/inv_1/resubmit', { body: {} });
    const client = createTestClient(mock);

    await client.testInvocations.resubmit('inv_1', { test_run_ids: ['run_1'], agent_id: 'agent_1' });

    expect(lastRequest().body).toEqual({ test_run_ids: ['run_1'], agent_id: 'agent_1' });
  });

  test('widgets.get() com assinatura', async () => {
    mock.stub('GET', '/v1/convai/agents/agent_1/widget', { body: { widget_config: {} } });
    const client = createTestClient(mock);

    await client.widgets.get('agent_1', { conversation_signature: 'sig_1' });

    expect(lastRequest().url).toBe('/v1/convai/agents/agent_1/widget?conversation_signature=sig_1');
  });
});
