/**
 * Dublagem (/v1/dubbing)
 *
 * Projetos de dublagem automática e edição fina de recursos:
 * segmentos, falantes, transcrição, tradução e renderização.
 */

import { compact } from '../../http/body';
import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import {
  DubbingCreatedResponse,
  DubbingCreateInput,
  DubbingListQuery,
  DubbingRenderInput,
  DubbingSegmentCreateInput,
  DubbingSegmentUpdateInput,
  DubbingSpeakerUpdateInput,
  DubbingTranscriptQuery,
  JsonObject
} from '../../types';

export class DubbingAPI {
  constructor(private readonly client: ApiTransport) {}

  // ════════════════════════════════════════════════════════════════════════
  // PROJETOS
  // ════════════════════════════════════════════════════════════════════════

  /** Cria projeto a partir de arquivo de áudio ou vídeo */
  async create(input: DubbingCreateInput): Promise<DubbingCreatedResponse> {
    requireParams({ file: input.file, filename: input.filename, target_lang: input.target_lang });
    const { file, filename, mode, num_speakers, ...fields } = input;
    return this.client.postMultipart('/v1/dubbing', {
      ...fields,
      file: filePart(file, filename),
      mode: mode ?? 'automatic',
      num_speakers: num_speakers ?? 1
    });
  }

  async get(dubbingId: string): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    return this.client.get(apiPath`/v1/dubbing/${dubbingId}`);
  }

  async list(query: DubbingListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/dubbing', query);
  }

  async delete(dubbingId: string): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    return this.client.delete(apiPath`/v1/dubbing/${dubbingId}`);
  }

  /** Áudio dublado em um idioma */
  async getDubbedAudio(dubbingId: string, languageCode: string): Promise<Buffer> {
    requireParams({ dubbingId, languageCode });
    return this.client.getBinary(apiPath`/v1/dubbing/${dubbingId}/audio/${languageCode}`);
  }

  /** Legenda do idioma dublado (srt ou webvtt) */
  async getTranscript(dubbingId: string, languageCode: string, query: DubbingTranscriptQuery = {}): Promise<string> {
    requireParams({ dubbingId, languageCode });
    const transcript = await this.client.getBinary(
      apiPath`/v1/dubbing/${dubbingId}/transcript/${languageCode}`,
      query
    );
    return transcript.toString('utf8');
  }

  // ════════════════════════════════════════════════════════════════════════
  // RECURSOS
  // ════════════════════════════════════════════════════════════════════════

  /** Recurso editável do projeto (falantes, segmentos, renders) */
  async getResource(dubbingId: string): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    return this.client.get(apiPath`/v1/dubbing/resource/${dubbingId}`);
  }

  async createSegment(
    dubbingId: string,
    speakerId: string,
    input: DubbingSegmentCreateInput
  ): Promise<JsonObject> {
    requireParams({ dubbingId, speakerId, start_time: input.start_time, end_time: input.end_time });
    return this.client.post(
      apiPath`/v1/dubbing/resource/${dubbingId}/speaker/${speakerId}/segment`,
      compact(input)
    );
  }

  async updateSegment(
    dubbingId: string,
    segmentId: string,
    language: string,
    input: DubbingSegmentUpdateInput
  ): Promise<JsonObject> {
    requireParams({ dubbingId, segmentId, language });
    return this.client.patch(
      apiPath`/v1/dubbing/resource/${dubbingId}/segment/${segmentId}/${language}`,
      compact(input)
    );
  }

  async deleteSegment(dubbingId: string, segmentId: string): Promise<JsonObject> {
    requireParams({ dubbingId, segmentId });
    return this.client.delete(apiPath`/v1/dubbing/resource/${dubbingId}/segment/${segmentId}`);
  }

  /** Refaz a transcrição dos segmentos */
  async transcribeSegments(dubbingId: string, segments: string[]): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    requireNonEmptyArray('segments', segments);
    return this.client.post(apiPath`/v1/dubbing/resource/${dubbingId}/transcribe`, { segments });
  }

  /** Refaz a tradução; sem `languages`, todos os idiomas do projeto */
  async translateSegments(dubbingId: string, segments: string[], languages?: string[]): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    requireNonEmptyArray('segments', segments);
    return this.client.post(apiPath`/v1/dubbing/resource/${dubbingId}/translate`, compact({ segments, languages }));
  }

  /** Regenera o áudio dublado dos segmentos */
  async dubSegments(dubbingId: string, segments: string[], languages?: string[]): Promise<JsonObject> {
    requireParam('dubbingId', dubbingId);
    requireNonEmptyArray('segments', segments);
    return this.client.post(apiPath`/v1/dubbing/resource/${dubbingId}/dub`, compact({ segments, languages }));
  }

  async render(dubbingId: string, language: string, input: DubbingRenderInput): Promise<JsonObject> {
    requireParams({ dubbingId, language, render_type: input.render_type });
    return this.client.post(apiPath`/v1/dubbing/resource/${dubbingId}/render/${language}`, compact(input));
  }

  // ════════════════════════════════════════════════════════════════════════
  // FALANTES
  // ════════════════════════════════════════════════════════════════════════

  async updateSpeaker(dubbingId: string, speakerId: string, input: DubbingSpeakerUpdateInput): Promise<JsonObject> {
    requireParams({ dubbingId, speakerId });
    return this.client.patch(apiPath`/v1/dubbing/resource/${dubbingId}/speaker/${speakerId}`, compact(input));
  }

  async getSimilarVoices(dubbingId: string, speakerId: string): Promise<JsonObject> {
    requireParams({ dubbingId, speakerId });
    return this.client.get(apiPath`/v1/dubbing/resource/${dubbingId}/speaker/${speakerId}/similar-voices`);
  }
}
