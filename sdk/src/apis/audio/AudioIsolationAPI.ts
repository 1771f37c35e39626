import { filePart } from '../../http/multipart';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { AudioIsolationInput, MultipartPayload } from '../../types';

function isolationForm(input: AudioIsolationInput): MultipartPayload {
  return {
    audio: filePart(input.file, input.filename),
    file_format: input.file_format
  };
}

/**
 * Remove ruído de fundo, mantendo apenas a voz
 */
export class AudioIsolationAPI {
  constructor(private readonly client: ApiTransport) {}

  async isolate(input: AudioIsolationInput): Promise<Buffer> {
    requireParams({ file: input.file, filename: input.filename });
    return this.client.postMultipartBinary('/v1/audio-isolation', isolationForm(input));
  }

  stream(input: AudioIsolationInput): AsyncGenerator<Uint8Array, void, unknown> {
    requireParams({ file: input.file, filename: input.filename });
    return this.client.postMultipartStream('/v1/audio-isolation/stream', isolationForm(input));
  }
}
