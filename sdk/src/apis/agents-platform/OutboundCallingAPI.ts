import { compact } from '../../http/body';
import { requireParams } from '../../http/validation';
import { ApiTransport } from '../../transport';
import { JsonObject, OutboundCallInput } from '../../types';

/**
 * Chamadas de saída iniciadas por um agente
 */
export class OutboundCallingAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Chamada via SIP trunk */
  async sipTrunkCall(params: OutboundCallInput): Promise<JsonObject> {
    return this.call('/v1/convai/sip-trunk/outbound-call', params);
  }

  /** Chamada via Twilio */
  async twilioCall(params: OutboundCallInput): Promise<JsonObject> {
    return this.call('/v1/convai/twilio/outbound-call', params);
  }

  private async call(path: string, params: OutboundCallInput): Promise<JsonObject> {
    requireParams({
      agent_id: params.agent_id,
      agent_phone_number_id: params.agent_phone_number_id,
      to_number: params.to_number
    });
    return this.client.post(path, compact(params));
  }
}
