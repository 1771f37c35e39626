import { ApiTransport } from '../../transport';
import { JsonObject } from '../../types';

export class UserAPI {
  constructor(private readonly client: ApiTransport) {}

  /** Conta e assinatura do usuário dono da chave */
  async get(): Promise<JsonObject> {
    return this.client.get('/v1/user');
  }
}
