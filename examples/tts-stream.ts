/**
 * EXEMPLO: Streaming de fala para arquivo
 *
 * Uso:
 *   ELEVENLABS_API_KEY=xxx VOICE_ID=xxx TTS_TEXT="Olá mundo" OUTPUT_PATH=saida.mp3 \
 *     node dist/examples/tts-stream.js
 */

import { createWriteStream } from 'fs';
import { once } from 'events';

import { createElevenLabsClient, ElevenLabsError } from '../sdk/src';

async function main() {
  const voiceId = process.env.VOICE_ID;
  const text = process.env.TTS_TEXT ?? 'Hello from the streaming example.';
  const output = process.env.OUTPUT_PATH ?? 'output.mp3';

  if (!voiceId) {
    console.error('VOICE_ID não definido');
    process.exit(1);
  }

  const client = createElevenLabsClient();

  console.log('═══════════════════════════════════════════════════════════');
  console.log('  ELEVENLABS CLIENT - Text to Speech (stream)');
  console.log('═══════════════════════════════════════════════════════════');

  const file = createWriteStream(output);
  let bytes = 0;

  try {
    for await (const chunk of client.textToSpeech.stream(voiceId, text)) {
      bytes += chunk.length;
      if (!file.write(chunk)) {
        await once(file, 'drain');
      }
    }
    file.end();
    await once(file, 'finish');

    console.log(`✅ ${bytes} bytes gravados em ${output}`);
  } catch (error) {
    file.destroy();
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
