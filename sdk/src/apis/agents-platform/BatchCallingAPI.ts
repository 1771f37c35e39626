/**
 * Chamadas em lote (/v1/convai/batch-calling)
 */

import { apiPath } from '../../http/url';
import { requireNonEmptyArray, requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { BatchCallListQuery, BatchCallSubmitInput, JsonObject } from '../../types';

export class BatchCallingAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Agenda um lote de chamadas para uma lista de destinatários */
  async submit(params: BatchCallSubmitInput): Promise<JsonObject> {
    requireParams({
      call_name: params.call_name,
      agent_id: params.agent_id,
      agent_phone_number_id: params.agent_phone_number_id,
      scheduled_time_unix: params.scheduled_time_unix
    });
    requireNonEmptyArray('recipients', params.recipients);
    return this.client.post('/v1/convai/batch-calling/submit', {
      call_name: params.call_name,
      agent_id: params.agent_id,
      agent_phone_number_id: params.agent_phone_number_id,
      scheduled_time_unix: params.scheduled_time_unix,
      recipients: params.recipients
    });
  }

  /** Lotes do workspace */
  async list(query: BatchCallListQuery = {}): Promise<JsonObject> {
    return this.client.get('/v1/convai/batch-calling/workspace', query);
  }

  async get(batchId: string): Promise<JsonObject> {
    requireParam('batchId', batchId);
    return this.client.get(apiPath`/v1/convai/batch-calling/${batchId}`);
  }

  async cancel(batchId: string): Promise<JsonObject> {
    requireParam('batchId', batchId);
    return this.client.post(apiPath`/v1/convai/batch-calling/${batchId}/cancel`, {});
  }

  /** Refaz as chamadas que falharam ou não foram atendidas */
  async retry(batchId: string): Promise<JsonObject> {
    requireParam('batchId', batchId);
    return this.client.post(apiPath`/v1/convai/batch-calling/${batchId}/retry`, {});
  }
}
