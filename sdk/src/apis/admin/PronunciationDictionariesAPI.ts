/**
 * Dicionários de pronúncia (/v1/pronunciation-dictionaries)
 *
 * Criados a partir de arquivo PLS ou de uma lista de regras alias/phoneme.
 */

import { compact } from '../../http/body';
import { filePart } from '../../http/multipart';
import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import {
  JsonObject,
  MultipartPayload,
  PronunciationFileInput,
  PronunciationListQuery,
  PronunciationRulesInput
} from '../../types';

export class PronunciationDictionariesAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Cria dicionário a partir de arquivo .pls; sem arquivo cria vazio */
  async addFromFile(params: PronunciationFileInput): Promise<JsonObject> {
    requireParam('name', params.name);

    const form: MultipartPayload = {
      name: params.name,
      description: params.description,
      workspace_access: params.workspace_access
    };
    if (params.file !== undefined && params.filename) {
      form.file = filePart(params.file, params.filename);
    }

    return this.client.postMultipart('/v1/pronunciation-dictionaries/add-from-file', form);
  }

  async addFromRules(params: PronunciationRulesInput): Promise<JsonObject> {
    requireParam('name', params.name);
    requireNonEmptyArray('rules', params.rules);
    return this.client.post('/v1/pronunciation-dictionaries/add-from-rules', compact(params));
  }

  async get(dictionaryId: string): Promise<JsonObject> {
    requireParam('dictionaryId', dictionaryId);
    return this.client.get(apiPath`/v1/pronunciation-dictionaries/${dictionaryId}`);
  }

  /** Atualiza atributos (nome, descrição, arquivamento) */
  async update(dictionaryId: string, attributes: JsonObject): Promise<JsonObject> {
    requireParam('dictionaryId', dictionaryId);
    return this.client.patch(apiPath`/v1/pronunciation-dictionaries/${dictionaryId}`, attributes);
  }

  /** Arquivo PLS de uma versão */
  async downloadVersion(dictionaryId: string, versionId: string): Promise<Buffer> {
    requireParams({ dictionaryId, versionId });
    return this.client.getBinary(
      apiPath`/v1/pronunciation-dictionaries/${dictionaryId}/${versionId}/download`
    );
  }

  async list(query: PronunciationListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/pronunciation-dictionaries', query);
  }
}
