import { filePart } from '../../http/multipart';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { ForcedAlignmentInput, JsonObject } from '../../types';

/**
 * Alinhamento forçado: tempos de cada palavra e caractere do texto no áudio
 */
export class ForcedAlignmentAPI {
  constructor(private readonly client: ApiTransport) {}

  async align(input: ForcedAlignmentInput): Promise<JsonObject> {
    requireParams({ file: input.file, filename: input.filename, text: input.text });
    return this.client.postMultipart('/v1/forced-alignment', {
      file: filePart(input.file, input.filename),
      text: input.text,
      enabled_spooled_file: input.enabled_spooled_file
    });
  }
}
