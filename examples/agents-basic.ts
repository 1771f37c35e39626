/**
 * EXEMPLO: Uso básico do cliente ElevenLabs
 *
 * Lista agentes, consulta conversas recentes e mostra o requestId.
 *
 * Uso:
 *   ELEVENLABS_API_KEY=xxx node dist/examples/agents-basic.js
 */

import { createElevenLabsClient, ElevenLabsError } from '../sdk/src';

interface AgentSummary {
  agent_id: string;
  name: string;
}

async function main() {
  // Chave e URL vêm de ELEVENLABS_API_KEY / ELEVENLABS_BASE_URL
  const client = createElevenLabsClient();

  console.log('═══════════════════════════════════════════════════════════');
  console.log('  ELEVENLABS CLIENT - Agentes');
  console.log('═══════════════════════════════════════════════════════════');
  console.log(`Base URL: ${client.baseUrl}`);
  console.log('');

  try {
    // 1. Listar agentes (request() para obter metadata)
    console.log('🤖 Listando agentes...');
    const result = await client.request<{ agents: AgentSummary[]; has_more: boolean }>(
      'GET',
      '/v1/convai/agents',
      { query: { page_size: 5 } }
    );
    for (const agent of result.data.agents) {
      console.log(`   - ${agent.agent_id}: ${agent.name}`);
    }
    console.log(`   🔍 Request ID: ${result.metadata.requestId ?? '-'}`);
    console.log('');

    // 2. Conversas do primeiro agente
    const first = result.data.agents[0];
    if (first) {
      console.log(`💬 Conversas de ${first.name}...`);
      const conversations = await client.conversations.list({ agent_id: first.agent_id, page_size: 5 });
      console.log(`   ${JSON.stringify(conversations)}`);
      console.log('');
    }

    console.log('✅ Exemplo concluído com sucesso!');
  } catch (error) {
    if (error instanceof ElevenLabsError) {
      console.error(`❌ Erro ${error.status}: ${error.message}`);
      console.error(`   Request ID: ${error.requestId}`);
    } else {
      console.error('❌ Erro inesperado:', error);
    }
    process.exit(1);
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
