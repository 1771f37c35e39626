/**
 * Design de voz a partir de descrição (/v1/text-to-voice)
 *
 * `design` devolve prévias com generated_voice_id; `create` salva uma
 * delas como voz da conta.
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, VoiceDesignOptions, VoiceFromDesignInput } from '../../types';

export class TextToVoiceAPI {
  constructor(private readonly client: ApiTransport) {}

  async design(voiceDescription: string, options: VoiceDesignOptions = {}): Promise<JsonObject> {
    requireParam('voiceDescription', voiceDescription);
    const { output_format, ...bodyOptions } = options;
    return this.client.post(
      '/v1/text-to-voice/design',
      compact({ voice_description: voiceDescription, ...bodyOptions }),
      { output_format }
    );
  }

  async create(input: VoiceFromDesignInput): Promise<JsonObject> {
    requireParams({
      voice_name: input.voice_name,
      voice_description: input.voice_description,
      generated_voice_id: input.generated_voice_id
    });
    return this.client.post('/v1/text-to-voice', compact(input));
  }

  /** Áudio da prévia gerada com `stream_previews: true` */
  streamPreview(generatedVoiceId: string): AsyncGenerator<Uint8Array, void, unknown> {
    requireParam('generatedVoiceId', generatedVoiceId);
    return this.client.getStream(apiPath`/v1/text-to-voice/${generatedVoiceId}/stream`);
  }
}
