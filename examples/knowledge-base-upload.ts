/**
 * EXEMPLO: Envio de documento para a base de conhecimento
 *
 * Uso:
 *   ELEVENLABS_API_KEY=xxx KB_FILE=./manual.pdf node dist/examples/knowledge-base-upload.js
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';

import { createElevenLabsClient, ElevenLabsError } from '../sdk/src';

async function main() {
  const filePath = process.env.KB_FILE;
  if (!filePath) {
    console.error('KB_FILE não definido');
    process.exit(1);
  }

  const client = createElevenLabsClient({ logLevel: 'info' });

  console.log('═══════════════════════════════════════════════════════════');
  console.log('  ELEVENLABS CLIENT - Base de Conhecimento');
  console.log('═══════════════════════════════════════════════════════════');

  try {
    console.log(`📤 Enviando ${basename(filePath)}...`);
    const document = await client.knowledgeBase.createFromFile({
      file: await readFile(filePath),
      filename: basename(filePath)
    });
    console.log(`   ID: ${document.id}`);
    console.log(`   Nome: ${document.name}`);
    console.log('');

    console.log('🧮 Solicitando índice RAG...');
    const index = await client.knowledgeBase.computeRagIndex(document.id, { model: 'e5_mistral_7b_instruct' });
    console.log(`   ${JSON.stringify(index)}`);
    console.log('');

    console.log('✅ Documento enviado!');
  } catch (error) {
    if (error instanceof ElevenLabsError) {
      console.error(`❌ Erro ${error.status}: ${error.message}`);
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
