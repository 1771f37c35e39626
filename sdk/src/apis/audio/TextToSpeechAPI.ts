/**
 * Síntese de voz (/v1/text-to-speech)
 *
 * Quatro variantes: áudio completo, áudio com alinhamento por caractere,
 * stream de áudio e stream de chunks JSON com alinhamento.
 */

import { apiPath } from '../../http/url';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { SpeechWithTimestampsChunk, TextToSpeechOptions } from '../../types';
import { splitSpeechOptions } from './speechOptions';

export const DEFAULT_OUTPUT_FORMAT = 'mp3_44100_128';
export const DEFAULT_STREAM_MODEL = 'eleven_multilingual_v2';

export class TextToSpeechAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Converte texto em áudio (bytes no formato pedido) */
  async convert(voiceId: string, text: string, options: TextToSpeechOptions = {}): Promise<Buffer> {
    requireParams({ voiceId, text });
    const { query, body } = splitSpeechOptions(text, options);
    return this.client.postBinary(apiPath`/v1/text-to-speech/${voiceId}`, body, query);
  }

  /** Áudio em base64 com tempos de início/fim de cada caractere */
  async convertWithTimestamps(
    voiceId: string,
    text: string,
    options: TextToSpeechOptions = {}
  ): Promise<SpeechWithTimestampsChunk> {
    requireParams({ voiceId, text });
    const { query, body } = splitSpeechOptions(text, options);
    return this.client.post(apiPath`/v1/text-to-speech/${voiceId}/with-timestamps`, body, query);
  }

  /**
   * Stream de áudio. Sem opções explícitas usa mp3_44100_128 e
   * eleven_multilingual_v2.
   */
  stream(voiceId: string, text: string, options: TextToSpeechOptions = {}): AsyncGenerator<Uint8Array, void, unknown> {
    requireParams({ voiceId, text });
    const { query, body } = splitSpeechOptions(text, {
      ...options,
      output_format: options.output_format ?? DEFAULT_OUTPUT_FORMAT,
      model_id: options.model_id ?? DEFAULT_STREAM_MODEL
    });
    return this.client.postStream(apiPath`/v1/text-to-speech/${voiceId}/stream`, body, { query });
  }

  /** Stream de objetos JSON (um por linha) com áudio e alinhamento */
  streamWithTimestamps(
    voiceId: string,
    text: string,
    options: TextToSpeechOptions = {}
  ): AsyncGenerator<SpeechWithTimestampsChunk, void, unknown> {
    requireParams({ voiceId, text });
    const { query, body } = splitSpeechOptions(text, options);
    return this.client.postJsonLines<SpeechWithTimestampsChunk>(
      apiPath`/v1/text-to-speech/${voiceId}/stream/with-timestamps`,
      body,
      { query }
    );
  }
}
