/**
 * Player Audio Native (/v1/audio-native)
 */

import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { AudioNativeContentInput, AudioNativeCreateInput, JsonObject, MultipartPayload } from '../../types';

export class AudioNativeAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Cria projeto com player embutível; o conteúdo inicial é opcional */
  async create(input: AudioNativeCreateInput): Promise<JsonObject> {
    requireParam('name', input.name);
    const { file, filename, ...fields } = input;
    const form: MultipartPayload = { ...fields };
    if (file !== undefined && filename) {
      form.file = filePart(file, filename);
    }
    return this.client.postMultipart('/v1/audio-native', form);
  }

  /** Substitui o conteúdo do projeto */
  async updateContent(projectId: string, input: AudioNativeContentInput = {}): Promise<JsonObject> {
    requireParam('projectId', projectId);
    const { file, filename, ...fields } = input;
    const form: MultipartPayload = { ...fields };
    if (file !== undefined && filename) {
      form.file = filePart(file, filename);
    }
    return this.client.postMultipart(apiPath`/v1/audio-native/${projectId}/content`, form);
  }

  async getSettings(projectId: string): Promise<JsonObject> {
    requireParam('projectId', projectId);
    return this.client.get(apiPath`/v1/audio-native/${projectId}/settings`);
  }
}
