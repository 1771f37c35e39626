/**
 * Conversão de voz (/v1/speech-to-speech)
 *
 * Reaplica a fala de um áudio de origem com outra voz.
 */

import { apiPath } from '../../http/url';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { SpeechToSpeechInput } from '../../types';
import { splitSpeechUpload } from './audioUpload';

export class SpeechToSpeechAPI {
  constructor(private readonly client: ApiTransport) {}

  async convert(voiceId: string, input: SpeechToSpeechInput): Promise<Buffer> {
    requireParams({ voiceId, file: input.file, filename: input.filename });
    const { query, form } = splitSpeechUpload(input);
    return this.client.postMultipartBinary(apiPath`/v1/speech-to-speech/${voiceId}`, form, query);
  }

  stream(voiceId: string, input: SpeechToSpeechInput): AsyncGenerator<Uint8Array, void, unknown> {
    requireParams({ voiceId, file: input.file, filename: input.filename });
    const { query, form } = splitSpeechUpload(input);
    return this.client.postMultipartStream(apiPath`/v1/speech-to-speech/${voiceId}/stream`, form, { query });
  }
}
