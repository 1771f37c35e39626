/**
 * Histórico de gerações (/v1/history)
 */

import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { HistoryListQuery, JsonObject } from '../../types';

export class HistoryAPI {
  constructor(private readonly client: ApiTransport) {}

  async list(query: HistoryListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/history', query);
  }

  async get(historyItemId: string): Promise<JsonObject> {
    requireParam('historyItemId', historyItemId);
    return this.client.get(apiPath`/v1/history/${historyItemId}`);
  }

  async delete(historyItemId: string): Promise<JsonObject> {
    requireParam('historyItemId', historyItemId);
    return this.client.delete(apiPath`/v1/history/${historyItemId}`);
  }

  /** Áudio de um item (bytes) */
  async getAudio(historyItemId: string): Promise<Buffer> {
    requireParam('historyItemId', historyItemId);
    return this.client.getBinary(apiPath`/v1/history/${historyItemId}/audio`);
  }

  /**
   * Baixa vários itens. Um item retorna o áudio; vários retornam um zip.
   */
  async download(historyItemIds: string[], options: { output_format?: string } = {}): Promise<Buffer> {
    requireNonEmptyArray('history_item_ids', historyItemIds);
    return this.client.postBinary('/v1/history/download', compact({
      history_item_ids: historyItemIds,
      output_format: options.output_format
    }));
  }
}
