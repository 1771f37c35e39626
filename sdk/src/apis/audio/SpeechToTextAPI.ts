/**
 * Transcrição (/v1/speech-to-text)
 */

import { ArgumentError } from '../../errors';
import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, MultipartPayload, SpeechToTextInput } from '../../types';

export class SpeechToTextAPI {
  constructor(private readonly client: ApiTransport) {}

  /**
   * Transcreve arquivo local ou URL de storage.
   * Com `webhook: true` a resposta traz apenas o id da transcrição.
   */
  async convert(input: SpeechToTextInput): Promise<JsonObject> {
    requireParam('model_id', input.model_id);
    const {
      file,
      filename,
      enable_logging,
      additional_formats,
      webhook_metadata,
      ...fields
    } = input;

    const form: MultipartPayload = { ...fields };
    if (file !== undefined && filename) {
      form.file = filePart(file, filename);
    } else if (!input.cloud_storage_url) {
      throw new ArgumentError('Either file with filename or cloud_storage_url must be provided');
    }
    if (additional_formats) {
      form.additional_formats = JSON.stringify(additional_formats);
    }
    if (webhook_metadata !== undefined) {
      form.webhook_metadata = typeof webhook_metadata === 'string'
        ? webhook_metadata
        : JSON.stringify(webhook_metadata);
    }

    return this.client.postMultipart('/v1/speech-to-text', form, { enable_logging });
  }

  async getTranscript(transcriptionId: string): Promise<JsonObject> {
    requireParam('transcriptionId', transcriptionId);
    return this.client.get(apiPath`/v1/speech-to-text/transcripts/${transcriptionId}`);
  }
}
