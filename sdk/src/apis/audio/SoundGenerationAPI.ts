import { compact } from '../../http/body';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { SoundGenerationOptions } from '../../types';

/**
 * Efeitos sonoros a partir de descrição textual
 */
export class SoundGenerationAPI {
  constructor(private readonly client: ApiTransport) {}

  async generate(text: string, options: SoundGenerationOptions = {}): Promise<Buffer> {
    requireParam('text', text);
    const { output_format, ...bodyOptions } = options;
    return this.client.postBinary(
      '/v1/sound-generation',
      compact({ text, ...bodyOptions }),
      { output_format }
    );
  }
}
