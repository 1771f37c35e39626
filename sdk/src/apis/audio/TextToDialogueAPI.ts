import { compact } from '../../http/body';
import { requireNonEmptyArray } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { DialogueInput, TextToDialogueOptions } from '../../types';
import { DEFAULT_OUTPUT_FORMAT } from './TextToSpeechAPI';

/**
 * Diálogo com várias vozes (/v1/text-to-dialogue)
 */
export class TextToDialogueAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Gera o diálogo completo como áudio */
  async convert(inputs: DialogueInput[], options: TextToDialogueOptions = {}): Promise<Buffer> {
    requireNonEmptyArray('inputs', inputs);
    const { output_format, ...bodyOptions } = options;
    return this.client.postBinary(
      '/v1/text-to-dialogue',
      compact({ inputs, ...bodyOptions }),
      { output_format }
    );
  }

  /** Stream de áudio do diálogo (output_format default: mp3_44100_128) */
  stream(inputs: DialogueInput[], options: TextToDialogueOptions = {}): AsyncGenerator<Uint8Array, void, unknown> {
    requireNonEmptyArray('inputs', inputs);
    const { output_format, ...bodyOptions } = options;
    return this.client.postStream('/v1/text-to-dialogue/stream', compact({ inputs, ...bodyOptions }), {
      query: { output_format: output_format ?? DEFAULT_OUTPUT_FORMAT }
    });
  }
}
