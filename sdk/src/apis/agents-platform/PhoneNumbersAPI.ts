import { compact } from '../../http/body';
import { apiPath } from '../../http/url';
import { requireParam, requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, PhoneNumberImportInput, PhoneNumberUpdateInput } from '../../types';

/**
 * Números de telefone (Twilio / SIP trunk) associados a agentes
 */
export class PhoneNumbersAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Importa número de um provedor */
  async import(params: PhoneNumberImportInput): Promise<JsonObject> {
    requireParams({ phone_number: params.phone_number, label: params.label });
    return this.client.post('/v1/convai/phone-numbers', compact(params));
  }

  async list(): Promise<JsonObject> {
    return this.client.get('/v1/convai/phone-numbers');
  }

  async get(phoneNumberId: string): Promise<JsonObject> {
    requireParam('phoneNumberId', phoneNumberId);
    return this.client.get(apiPath`/v1/convai/phone-numbers/${phoneNumberId}`);
  }

  /** Atualiza número; `agent_id: null` desassocia o agente */
  async update(phoneNumberId: string, params: PhoneNumberUpdateInput): Promise<JsonObject> {
    requireParam('phoneNumberId', phoneNumberId);
    return this.client.patch(apiPath`/v1/convai/phone-numbers/${phoneNumberId}`, params);
  }

  async delete(phoneNumberId: string): Promise<JsonObject> {
    requireParam('phoneNumberId', phoneNumberId);
    return this.client.delete(apiPath`/v1/convai/phone-numbers/${phoneNumberId}`);
  }
}
